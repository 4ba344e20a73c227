import { randomBytes } from 'node:crypto';
import { inflateRawSync } from 'node:zlib';
import { Type } from 'avsc';
import { z } from 'zod';

/**
 * Avro object container files, framed here so the writer's schema lands in
 * the header exactly as given (custom attributes such as `field-id` included)
 * and so blocks written by other tools can be copied without decoding them.
 */

const MAGIC = Buffer.from([0x4f, 0x62, 0x6a, 0x01]);

const headerType = Type.forSchema({
  type: 'record',
  name: 'org.apache.avro.file.Header',
  fields: [
    { name: 'magic', type: { type: 'fixed', name: 'Magic', size: 4 } },
    { name: 'meta', type: { type: 'map', values: 'bytes' } },
    { name: 'sync', type: { type: 'fixed', name: 'Sync', size: 16 } },
  ],
});

const longType = Type.forSchema('long');

const Header = z.object({
  magic: z.instanceof(Buffer),
  meta: z.record(z.string(), z.instanceof(Buffer)),
  sync: z.instanceof(Buffer),
});

export type AvroBlock = {
  count: number;
  /** Uncompressed, concatenated binary encodings of `count` records */
  data: Buffer;
};

export type AvroContainer = {
  /** Writer schema, verbatim */
  schemaJson: string;
  metadata: ReadonlyMap<string, string>;
  blocks: readonly AvroBlock[];
};

export const encodeBlock = (type: Type, records: readonly unknown[]): AvroBlock => ({
  count: records.length,
  data: Buffer.concat(records.map((record) => type.toBuffer(record))),
});

/** Write a container with the null codec. */
export const writeContainer = (
  schemaJson: string,
  blocks: readonly AvroBlock[],
  metadata: Readonly<Record<string, string>> = {}
): Buffer => {
  const sync = randomBytes(16);
  const meta: Record<string, Buffer> = {};
  for (const [key, value] of Object.entries(metadata)) {
    meta[key] = Buffer.from(value, 'utf8');
  }
  meta['avro.schema'] = Buffer.from(schemaJson, 'utf8');
  meta['avro.codec'] = Buffer.from('null', 'utf8');

  const chunks = [headerType.toBuffer({ magic: MAGIC, meta, sync })];
  for (const block of blocks) {
    if (block.count === 0) continue;
    chunks.push(longType.toBuffer(block.count), longType.toBuffer(block.data.length), block.data, sync);
  }
  return Buffer.concat(chunks);
};

const readLong = (buffer: Buffer, position: number): { value: number; offset: number } => {
  const { value, offset } = longType.decode(buffer, position);
  if (offset < 0 || typeof value !== 'number') {
    throw new Error(`Truncated avro container at byte ${position}`);
  }
  return { value, offset };
};

/** Read a container's header and blocks; deflate blocks are inflated. */
export const readContainer = (buffer: Buffer): AvroContainer => {
  const decoded = headerType.decode(buffer, 0);
  if (decoded.offset < 0) {
    throw new Error('Truncated avro container header');
  }
  const header = Header.parse(decoded.value);
  if (!header.magic.equals(MAGIC)) {
    throw new Error('Not an avro container file');
  }

  const metadata = new Map<string, string>();
  for (const [key, value] of Object.entries(header.meta)) {
    metadata.set(key, value.toString('utf8'));
  }

  const schemaJson = metadata.get('avro.schema');
  if (schemaJson === undefined) {
    throw new Error('Avro container has no schema');
  }

  const codec = metadata.get('avro.codec') ?? 'null';
  if (codec !== 'null' && codec !== 'deflate') {
    throw new Error(`Unsupported avro codec ${codec}`);
  }

  const blocks: AvroBlock[] = [];
  let position = decoded.offset;
  while (position < buffer.length) {
    const count = readLong(buffer, position);
    const size = readLong(buffer, count.offset);
    const end = size.offset + size.value;
    if (end + 16 > buffer.length) {
      throw new Error(`Truncated avro block at byte ${position}`);
    }

    const raw = buffer.subarray(size.offset, end);
    if (!buffer.subarray(end, end + 16).equals(header.sync)) {
      throw new Error(`Avro sync marker mismatch at byte ${end}`);
    }

    blocks.push({ count: count.value, data: codec === 'deflate' ? inflateRawSync(raw) : Buffer.from(raw) });
    position = end + 16;
  }

  return { schemaJson, metadata, blocks };
};

/** Decode every record of a container with its writer schema. */
export const decodeRecords = (container: AvroContainer): unknown[] => {
  const type = Type.forSchema(JSON.parse(container.schemaJson));
  const records: unknown[] = [];

  for (const block of container.blocks) {
    let position = 0;
    for (let i = 0; i < block.count; i++) {
      const { value, offset } = type.decode(block.data, position);
      if (offset < 0) {
        throw new Error('Truncated avro record');
      }
      records.push(value);
      position = offset;
    }
  }
  return records;
};
