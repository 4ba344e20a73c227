import { SchemaIncompatible } from '../engine/errors';
import { isWithinBounds } from '../schema/decimal';
import type { DecimalTargets } from '../schema/normalize';
import { describeColumnType, type Column, type ColumnSchema } from '../schema/types';

export type IcebergPrimitive =
  | 'boolean'
  | 'int'
  | 'long'
  | 'float'
  | 'double'
  | 'date'
  | 'time'
  | 'timestamp'
  | 'timestamptz'
  | 'timestamp_ns'
  | 'timestamptz_ns'
  | 'string'
  | 'uuid'
  | 'binary';

export type IcebergType =
  | { kind: 'primitive'; name: IcebergPrimitive }
  | { kind: 'decimal'; precision: number; scale: number }
  | { kind: 'fixed'; length: number }
  | { kind: 'nested'; description: string };

export type TableColumn = {
  id: number;
  name: string;
  required: boolean;
  type: IcebergType;
};

export type TableSchema = {
  schemaId: number;
  columns: readonly TableColumn[];
};

const PRIMITIVES: ReadonlySet<string> = new Set<IcebergPrimitive>([
  'boolean',
  'int',
  'long',
  'float',
  'double',
  'date',
  'time',
  'timestamp',
  'timestamptz',
  'timestamp_ns',
  'timestamptz_ns',
  'string',
  'uuid',
  'binary',
]);

const isPrimitive = (name: string): name is IcebergPrimitive => PRIMITIVES.has(name);

const primitive = (name: IcebergPrimitive): IcebergType => ({ kind: 'primitive', name });

const unsupported = (column: Column, reason: string): SchemaIncompatible =>
  new SchemaIncompatible(`Column '${column.name}' of type ${describeColumnType(column.type)} ${reason}`, {
    column: column.name,
  });

/**
 * Map a file column onto the catalog type it is stored as. Types the catalog
 * cannot hold in a format-version 2 table fail with SchemaIncompatible.
 */
export const toIcebergType = (column: Column): IcebergType => {
  const { type } = column;
  switch (type.kind) {
    case 'boolean':
      return primitive('boolean');
    case 'integer':
      if (type.signed) return primitive(type.width === 64 ? 'long' : 'int');
      if (type.width <= 16) return primitive('int');
      if (type.width === 32) return primitive('long');
      throw unsupported(column, 'has no catalog equivalent');
    case 'float':
      return primitive(type.width === 32 ? 'float' : 'double');
    case 'decimal':
      if (!isWithinBounds(type.precision, type.scale)) {
        throw unsupported(column, 'is outside the supported decimal bounds');
      }
      return { kind: 'decimal', precision: type.precision, scale: type.scale };
    case 'string':
      return primitive('string');
    case 'binary':
      return type.fixedLength === undefined ? primitive('binary') : { kind: 'fixed', length: type.fixedLength };
    case 'date':
      return primitive('date');
    case 'time':
      if (type.unit === 'ns') throw unsupported(column, 'has no catalog equivalent');
      return primitive('time');
    case 'timestamp':
      if (type.unit === 'ns') throw unsupported(column, 'requires table format version 3');
      return primitive(type.adjustedToUtc ? 'timestamptz' : 'timestamp');
    default: {
      const exhaustive: never = type;
      return exhaustive;
    }
  }
};

export const formatIcebergType = (type: IcebergType): string => {
  switch (type.kind) {
    case 'primitive':
      return type.name;
    case 'decimal':
      return `decimal(${type.precision}, ${type.scale})`;
    case 'fixed':
      return `fixed[${type.length}]`;
    case 'nested':
      return type.description;
    default: {
      const exhaustive: never = type;
      return exhaustive;
    }
  }
};

const DECIMAL_PATTERN = /^decimal\(\s*(\d+)\s*,\s*(\d+)\s*\)$/;
const FIXED_PATTERN = /^fixed\[\s*(\d+)\s*\]$/;

/** Parse a type as it appears in a table schema returned by the catalog. */
export const parseIcebergType = (raw: unknown): IcebergType => {
  if (typeof raw !== 'string') {
    const nestedKind =
      raw !== null && typeof raw === 'object' && 'type' in raw && typeof raw.type === 'string' ? raw.type : 'unknown';
    return { kind: 'nested', description: nestedKind };
  }

  const name = raw.trim().toLowerCase();
  if (isPrimitive(name)) return primitive(name);

  const decimal = DECIMAL_PATTERN.exec(name);
  if (decimal) {
    return { kind: 'decimal', precision: Number(decimal[1]), scale: Number(decimal[2]) };
  }

  const fixed = FIXED_PATTERN.exec(name);
  if (fixed) {
    return { kind: 'fixed', length: Number(fixed[1]) };
  }

  return { kind: 'nested', description: name };
};

/**
 * Field ids are assigned 1..n in column order. Every column is optional: a
 * normalized copy rewritten by DuckDB declares all of its columns nullable.
 */
export const toTableSchema = (schema: ColumnSchema): TableSchema => ({
  schemaId: 0,
  columns: schema.map((column, index) => ({
    id: index + 1,
    name: column.name,
    required: false,
    type: toIcebergType(column),
  })),
});

export type NameMapping = Array<{ 'field-id': number; names: string[] }>;

export const buildNameMapping = (table: TableSchema): NameMapping =>
  table.columns.map((column) => ({ 'field-id': column.id, names: [column.name] }));

export const decimalTargetsOf = (table: TableSchema): DecimalTargets => {
  const targets = new Map<string, { precision: number; scale: number }>();
  for (const column of table.columns) {
    if (column.type.kind === 'decimal') {
      targets.set(column.name, { precision: column.type.precision, scale: column.type.scale });
    }
  }
  return targets;
};

export type SchemaJson = {
  type: 'struct';
  'schema-id': number;
  fields: Array<{ id: number; name: string; required: boolean; type: string }>;
};

const serializableType = (column: TableColumn): string => {
  if (column.type.kind === 'nested') {
    throw new Error(`Column '${column.name}' has a nested type and cannot be written`);
  }
  return formatIcebergType(column.type);
};

/** The table schema as the REST protocol and manifest headers carry it. */
export const toSchemaJson = (table: TableSchema): SchemaJson => ({
  type: 'struct',
  'schema-id': table.schemaId,
  fields: table.columns.map((column) => ({
    id: column.id,
    name: column.name,
    required: column.required,
    type: serializableType(column),
  })),
});
