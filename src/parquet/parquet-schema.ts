import { z } from 'zod';
import { SchemaIncompatible } from '../engine/errors';
import type { Column, ColumnSchema, ColumnType, TimeUnit } from '../schema/types';

// DuckDB renders integer metadata as numbers or strings depending on width
const optionalNumericField = z
  .union([z.number(), z.bigint(), z.string().transform(Number)])
  .transform(Number)
  .nullable()
  .optional();

export const SchemaElementRow = z.object({
  name: z.string(),
  type: z.string().nullable(),
  type_length: optionalNumericField,
  repetition_type: z.string().nullable(),
  num_children: optionalNumericField,
  converted_type: z.string().nullable(),
  scale: optionalNumericField,
  precision: optionalNumericField,
  logical_type: z.string().nullable().optional(),
});

export type SchemaElement = z.infer<typeof SchemaElementRow>;

const INTEGER_ANNOTATIONS: Readonly<Record<string, { width: 8 | 16 | 32 | 64; signed: boolean }>> = {
  INT_8: { width: 8, signed: true },
  INT_16: { width: 16, signed: true },
  INT_32: { width: 32, signed: true },
  INT_64: { width: 64, signed: true },
  UINT_8: { width: 8, signed: false },
  UINT_16: { width: 16, signed: false },
  UINT_32: { width: 32, signed: false },
  UINT_64: { width: 64, signed: false },
};

// "unit=TimeUnit(MILLIS=<null>, MICROS=MicroSeconds(), NANOS=<null>)" names every unit; the set one has a value
const LOGICAL_UNIT = /\b(MILLIS|MICROS|NANOS)=(?!<null>)/;
const UNITS: Readonly<Record<string, TimeUnit>> = { MILLIS: 'ms', MICROS: 'us', NANOS: 'ns' };

const logicalUnit = (logical: string): TimeUnit | undefined => {
  const match = LOGICAL_UNIT.exec(logical);
  return match ? UNITS[match[1]] : undefined;
};

const isAdjustedToUtc = (logical: string): boolean => {
  const match = /isAdjustedToUTC=(\w+)/i.exec(logical);
  if (!match) return true;
  return match[1] === '1' || match[1].toLowerCase() === 'true';
};

const decimalOf = (element: SchemaElement): ColumnType | undefined => {
  if (element.converted_type !== 'DECIMAL' && !(element.logical_type ?? '').startsWith('DecimalType')) {
    return undefined;
  }

  const precision = element.precision ?? 0;
  const scale = element.scale ?? 0;
  switch (element.type) {
    case 'INT32':
      return { kind: 'decimal', precision, scale, physical: { type: 'INT32' } };
    case 'INT64':
      return { kind: 'decimal', precision, scale, physical: { type: 'INT64' } };
    case 'FIXED_LEN_BYTE_ARRAY':
      return {
        kind: 'decimal',
        precision,
        scale,
        physical: { type: 'FIXED_LEN_BYTE_ARRAY', length: element.type_length ?? 0 },
      };
    case 'BYTE_ARRAY':
      return { kind: 'decimal', precision, scale, physical: { type: 'BYTE_ARRAY' } };
    default:
      return undefined;
  }
};

const temporalOf = (element: SchemaElement): ColumnType | undefined => {
  const logical = element.logical_type ?? '';

  switch (element.converted_type) {
    case 'DATE':
      return { kind: 'date' };
    case 'TIME_MILLIS':
      return { kind: 'time', unit: 'ms' };
    case 'TIME_MICROS':
      return { kind: 'time', unit: 'us' };
    case 'TIMESTAMP_MILLIS':
      return { kind: 'timestamp', unit: 'ms', adjustedToUtc: isAdjustedToUtc(logical) };
    case 'TIMESTAMP_MICROS':
      return { kind: 'timestamp', unit: 'us', adjustedToUtc: isAdjustedToUtc(logical) };
  }

  const unit = logicalUnit(logical);
  if (logical.startsWith('TimestampType') && unit) {
    return { kind: 'timestamp', unit, adjustedToUtc: isAdjustedToUtc(logical) };
  }
  if (logical.startsWith('TimeType') && unit) {
    return { kind: 'time', unit };
  }
  if (logical.startsWith('DateType')) {
    return { kind: 'date' };
  }
  return undefined;
};

const columnTypeOf = (element: SchemaElement): ColumnType => {
  const annotated = decimalOf(element) ?? temporalOf(element);
  if (annotated) return annotated;

  const integer = element.converted_type ? INTEGER_ANNOTATIONS[element.converted_type] : undefined;

  switch (element.type) {
    case 'BOOLEAN':
      return { kind: 'boolean' };
    case 'INT32':
      return integer ? { kind: 'integer', ...integer } : { kind: 'integer', width: 32, signed: true };
    case 'INT64':
      return integer ? { kind: 'integer', ...integer } : { kind: 'integer', width: 64, signed: true };
    case 'INT96':
      return { kind: 'timestamp', unit: 'ns', adjustedToUtc: false };
    case 'FLOAT':
      return { kind: 'float', width: 32 };
    case 'DOUBLE':
      return { kind: 'float', width: 64 };
    case 'BYTE_ARRAY': {
      const textual = ['UTF8', 'ENUM', 'JSON'].includes(element.converted_type ?? '');
      return textual || (element.logical_type ?? '').startsWith('StringType') ? { kind: 'string' } : { kind: 'binary' };
    }
    case 'FIXED_LEN_BYTE_ARRAY':
      return { kind: 'binary', fixedLength: element.type_length ?? 0 };
    default:
      throw new SchemaIncompatible(`Column '${element.name}' has unknown physical type ${element.type ?? 'none'}`, {
        column: element.name,
      });
  }
};

/**
 * Turn the flattened Parquet schema (root element first, as DuckDB's
 * `parquet_schema()` lists it) into a column schema. Only flat files are
 * supported: groups and repeated fields fail with SchemaIncompatible.
 */
export const columnsFromSchemaElements = (elements: readonly SchemaElement[]): ColumnSchema => {
  const [, ...fields] = elements;
  const columns: Column[] = [];

  for (const element of fields) {
    const isGroup = element.type === null || (element.num_children ?? 0) > 0;
    if (isGroup || element.repetition_type === 'REPEATED') {
      throw new SchemaIncompatible(`Column '${element.name}' is nested; only flat columns are supported`, {
        column: element.name,
      });
    }

    columns.push({
      name: element.name,
      type: columnTypeOf(element),
      nullable: element.repetition_type !== 'REQUIRED',
    });
  }

  return columns;
};
