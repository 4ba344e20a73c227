import { Type } from 'avsc';
import { z } from 'zod';
import { encodeBlock, readContainer, writeContainer, type AvroBlock } from './avro';

// Field ids follow the table format's manifest and manifest list definitions.
const manifestEntrySchema = {
  type: 'record' as const,
  name: 'manifest_entry',
  fields: [
    { name: 'status', type: 'int', 'field-id': 0 },
    { name: 'snapshot_id', type: ['null', 'long'], default: null, 'field-id': 1 },
    { name: 'sequence_number', type: ['null', 'long'], default: null, 'field-id': 3 },
    { name: 'file_sequence_number', type: ['null', 'long'], default: null, 'field-id': 4 },
    {
      name: 'data_file',
      type: {
        type: 'record' as const,
        name: 'r2',
        fields: [
          { name: 'content', type: 'int', 'field-id': 134 },
          { name: 'file_path', type: 'string', 'field-id': 100 },
          { name: 'file_format', type: 'string', 'field-id': 101 },
          { name: 'partition', type: { type: 'record' as const, name: 'r102', fields: [] }, 'field-id': 102 },
          { name: 'record_count', type: 'long', 'field-id': 103 },
          { name: 'file_size_in_bytes', type: 'long', 'field-id': 104 },
        ],
      },
      'field-id': 2,
    },
  ],
};

const manifestFileSchema = {
  type: 'record' as const,
  name: 'manifest_file',
  fields: [
    { name: 'manifest_path', type: 'string', 'field-id': 500 },
    { name: 'manifest_length', type: 'long', 'field-id': 501 },
    { name: 'partition_spec_id', type: 'int', 'field-id': 502 },
    { name: 'content', type: 'int', 'field-id': 517 },
    { name: 'sequence_number', type: 'long', 'field-id': 515 },
    { name: 'min_sequence_number', type: 'long', 'field-id': 516 },
    { name: 'added_snapshot_id', type: 'long', 'field-id': 503 },
    { name: 'added_files_count', type: 'int', 'field-id': 504 },
    { name: 'existing_files_count', type: 'int', 'field-id': 505 },
    { name: 'deleted_files_count', type: 'int', 'field-id': 506 },
    { name: 'added_rows_count', type: 'long', 'field-id': 512 },
    { name: 'existing_rows_count', type: 'long', 'field-id': 513 },
    { name: 'deleted_rows_count', type: 'long', 'field-id': 514 },
  ],
};

const manifestEntryType = Type.forSchema(manifestEntrySchema);
const manifestFileType = Type.forSchema(manifestFileSchema);

const ENTRY_ADDED = 1;
const CONTENT_DATA = 0;

const WriterFields = z.object({
  fields: z.array(z.object({ name: z.string(), 'field-id': z.number().optional() })),
});

const toSafeNumber = (value: bigint, label: string): number => {
  const result = Number(value);
  if (!Number.isSafeInteger(result)) {
    throw new Error(`${label} ${value} does not fit in a manifest written by this loader`);
  }
  return result;
};

export type ManifestInput = {
  snapshotId: bigint;
  schemaJson: string;
  schemaId: number;
  dataFile: { path: string; rows: number; sizeBytes: number };
};

/**
 * Manifest for one added data file. Sequence numbers are left null so they
 * are inherited from the snapshot that commits the manifest.
 */
export const writeManifest = (input: ManifestInput): Buffer => {
  const entry = {
    status: ENTRY_ADDED,
    snapshot_id: toSafeNumber(input.snapshotId, 'snapshot id'),
    sequence_number: null,
    file_sequence_number: null,
    data_file: {
      content: CONTENT_DATA,
      file_path: input.dataFile.path,
      file_format: 'PARQUET',
      partition: {},
      record_count: input.dataFile.rows,
      file_size_in_bytes: input.dataFile.sizeBytes,
    },
  };

  return writeContainer(JSON.stringify(manifestEntrySchema), [encodeBlock(manifestEntryType, [entry])], {
    schema: input.schemaJson,
    'schema-id': String(input.schemaId),
    'partition-spec': '[]',
    'partition-spec-id': '0',
    'format-version': '2',
    content: 'data',
  });
};

export type ManifestListInput = {
  snapshotId: bigint;
  parentSnapshotId?: bigint;
  sequenceNumber: bigint;
  manifest: { path: string; length: number; rows: number };
  /** Manifest list of the parent snapshot, whose entries are carried over */
  parentList?: Buffer;
};

/**
 * Manifest list of a new snapshot: the parent's manifests followed by the new
 * one. The parent's blocks are copied as written, under the parent's writer
 * schema, so entries from other writers survive untouched.
 */
export const writeManifestList = (input: ManifestListInput): Buffer => {
  const sequenceNumber = toSafeNumber(input.sequenceNumber, 'sequence number');
  const byFieldId = new Map<number, unknown>([
    [500, input.manifest.path],
    [501, input.manifest.length],
    [502, 0],
    [517, CONTENT_DATA],
    [515, sequenceNumber],
    [516, sequenceNumber],
    [503, toSafeNumber(input.snapshotId, 'snapshot id')],
    [504, 1],
    [505, 0],
    [506, 0],
    [512, input.manifest.rows],
    [513, 0],
    [514, 0],
  ]);

  const metadata = {
    'snapshot-id': input.snapshotId.toString(),
    'parent-snapshot-id': input.parentSnapshotId === undefined ? 'null' : input.parentSnapshotId.toString(),
    'sequence-number': input.sequenceNumber.toString(),
    'format-version': '2',
  };

  if (!input.parentList) {
    const record = Object.fromEntries(manifestFileSchema.fields.map((field) => [field.name, byFieldId.get(field['field-id'])]));
    return writeContainer(JSON.stringify(manifestFileSchema), [encodeBlock(manifestFileType, [record])], metadata);
  }

  const parent = readContainer(input.parentList);
  const writerSchema: unknown = JSON.parse(parent.schemaJson);
  const { fields } = WriterFields.parse(writerSchema);
  const record = Object.fromEntries(
    fields.map((field) => {
      const id = field['field-id'];
      return [field.name, id === undefined ? null : byFieldId.get(id) ?? null];
    })
  );

  const blocks: AvroBlock[] = [...parent.blocks, encodeBlock(Type.forSchema(JSON.parse(parent.schemaJson)), [record])];
  return writeContainer(parent.schemaJson, blocks, metadata);
};
