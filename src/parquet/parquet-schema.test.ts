import { SchemaIncompatible } from '../engine/errors';
import { columnsFromSchemaElements, SchemaElementRow, type SchemaElement } from './parquet-schema';

const root: SchemaElement = {
  name: 'duckdb_schema',
  type: null,
  type_length: null,
  repetition_type: 'REQUIRED',
  num_children: 1,
  converted_type: null,
  scale: null,
  precision: null,
  logical_type: null,
};

const leaf = (overrides: Partial<SchemaElement>): SchemaElement => ({
  ...root,
  name: 'c',
  type: 'INT32',
  repetition_type: 'OPTIONAL',
  num_children: null,
  ...overrides,
});

const typeOf = (element: SchemaElement) => columnsFromSchemaElements([root, element])[0].type;

describe('columnsFromSchemaElements', () => {
  it('skips the root and reads nullability from the repetition type', () => {
    const columns = columnsFromSchemaElements([
      root,
      leaf({ name: 'id', type: 'INT64', repetition_type: 'REQUIRED' }),
      leaf({ name: 'note', type: 'BYTE_ARRAY', converted_type: 'UTF8' }),
    ]);

    expect(columns).toEqual([
      { name: 'id', type: { kind: 'integer', width: 64, signed: true }, nullable: false },
      { name: 'note', type: { kind: 'string' }, nullable: true },
    ]);
  });

  it('reads decimals with their physical storage', () => {
    expect(
      typeOf(leaf({ type: 'FIXED_LEN_BYTE_ARRAY', type_length: 9, converted_type: 'DECIMAL', precision: 20, scale: 2 }))
    ).toEqual({ kind: 'decimal', precision: 20, scale: 2, physical: { type: 'FIXED_LEN_BYTE_ARRAY', length: 9 } });
    expect(typeOf(leaf({ type: 'INT32', logical_type: 'DecimalType(scale=1, precision=5)', precision: 5, scale: 1 }))).toEqual(
      { kind: 'decimal', precision: 5, scale: 1, physical: { type: 'INT32' } }
    );
  });

  it('reads timestamp units and the UTC flag from the logical type', () => {
    expect(
      typeOf(
        leaf({
          type: 'INT64',
          converted_type: 'TIMESTAMP_MICROS',
          logical_type: 'TimestampType(isAdjustedToUTC=0, unit=TimeUnit(MILLIS=<null>, MICROS=MicroSeconds(), NANOS=<null>))',
        })
      )
    ).toEqual({ kind: 'timestamp', unit: 'us', adjustedToUtc: false });

    expect(
      typeOf(
        leaf({
          type: 'INT64',
          logical_type: 'TimestampType(isAdjustedToUTC=1, unit=TimeUnit(MILLIS=<null>, MICROS=<null>, NANOS=NanoSeconds()))',
        })
      )
    ).toEqual({ kind: 'timestamp', unit: 'ns', adjustedToUtc: true });
  });

  it('reads integer annotations, legacy timestamps and binary', () => {
    expect(typeOf(leaf({ converted_type: 'UINT_16' }))).toEqual({ kind: 'integer', width: 16, signed: false });
    expect(typeOf(leaf({ type: 'INT96' }))).toEqual({ kind: 'timestamp', unit: 'ns', adjustedToUtc: false });
    expect(typeOf(leaf({ type: 'BYTE_ARRAY' }))).toEqual({ kind: 'binary' });
    expect(typeOf(leaf({ type: 'FIXED_LEN_BYTE_ARRAY', type_length: 16 }))).toEqual({ kind: 'binary', fixedLength: 16 });
    expect(typeOf(leaf({ converted_type: 'DATE' }))).toEqual({ kind: 'date' });
  });

  it('rejects nested and repeated columns', () => {
    const group = leaf({ name: 'tags', type: null, num_children: 1 });
    expect(() => columnsFromSchemaElements([root, group])).toThrow(
      new SchemaIncompatible("Column 'tags' is nested; only flat columns are supported")
    );
    expect(() => columnsFromSchemaElements([root, leaf({ name: 'list', repetition_type: 'REPEATED' })])).toThrow(
      SchemaIncompatible
    );
  });

  it('rejects unknown physical types', () => {
    expect(() => typeOf(leaf({ name: 'odd', type: 'INT128' }))).toThrow("Column 'odd' has unknown physical type INT128");
  });
});

describe('SchemaElementRow', () => {
  it('accepts numeric metadata rendered as strings or bigints', () => {
    const element = SchemaElementRow.parse({
      name: 'amount',
      type: 'FIXED_LEN_BYTE_ARRAY',
      type_length: '16',
      repetition_type: 'OPTIONAL',
      num_children: null,
      converted_type: 'DECIMAL',
      scale: 4n,
      precision: 38,
      logical_type: null,
    });

    expect(element.type_length).toBe(16);
    expect(element.scale).toBe(4);
    expect(element.precision).toBe(38);
  });
});
