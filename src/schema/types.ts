/**
 * Column schema of a Parquet file, one closed variant per logical type.
 */

export type TimeUnit = 'ms' | 'us' | 'ns';

export type DecimalPhysical =
  | { type: 'INT32' }
  | { type: 'INT64' }
  | { type: 'FIXED_LEN_BYTE_ARRAY'; length: number }
  | { type: 'BYTE_ARRAY' };

export type ColumnType =
  | { kind: 'boolean' }
  | { kind: 'integer'; width: 8 | 16 | 32 | 64; signed: boolean }
  | { kind: 'float'; width: 32 | 64 }
  | { kind: 'decimal'; precision: number; scale: number; physical: DecimalPhysical }
  | { kind: 'string' }
  | { kind: 'binary'; fixedLength?: number }
  | { kind: 'date' }
  | { kind: 'time'; unit: TimeUnit }
  | { kind: 'timestamp'; unit: TimeUnit; adjustedToUtc: boolean };

export type DecimalType = Extract<ColumnType, { kind: 'decimal' }>;

export type Column = {
  name: string;
  type: ColumnType;
  nullable: boolean;
};

export type ColumnSchema = readonly Column[];

/** Unscaled decimal values per column, at the column's declared scale. Nulls are omitted. */
export type ColumnData = ReadonlyMap<string, readonly bigint[]>;

export type DecimalRewrite = {
  column: string;
  from: DecimalType;
  to: DecimalType;
  /** True when the cast could drop digits, so observed values must be checked. */
  needsValueCheck: boolean;
};

export const describeColumnType = (type: ColumnType): string => {
  switch (type.kind) {
    case 'boolean':
    case 'string':
    case 'date':
      return type.kind;
    case 'integer':
      return `${type.signed ? 'int' : 'uint'}${type.width}`;
    case 'float':
      return type.width === 32 ? 'float' : 'double';
    case 'decimal': {
      const physical =
        type.physical.type === 'FIXED_LEN_BYTE_ARRAY'
          ? `FIXED_LEN_BYTE_ARRAY(${type.physical.length})`
          : type.physical.type;
      return `decimal(${type.precision},${type.scale}) as ${physical}`;
    }
    case 'binary':
      return type.fixedLength === undefined ? 'binary' : `fixed(${type.fixedLength})`;
    case 'time':
      return `time(${type.unit})`;
    case 'timestamp':
      return `timestamp(${type.unit}${type.adjustedToUtc ? ', utc' : ''})`;
    default: {
      const exhaustive: never = type;
      return exhaustive;
    }
  }
};
