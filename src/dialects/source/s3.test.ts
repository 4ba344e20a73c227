import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { FetchFailed, SourceUnavailable } from '../../engine/errors';
import { MemoryObjectStore } from '../../testing/memory-object-store';
import type { FileLocator, S3SourceConfig } from '../source';
import { createSource } from '..';
import { S3Source, stagingPathFor } from './s3';

const config: S3SourceConfig = {
  type: 's3',
  bucket: 'test-bucket',
  prefix: 'data/',
  region: 'us-east-1',
  forcePathStyle: false,
  anonymous: false,
};

const collect = async (files: AsyncIterable<FileLocator>): Promise<string[]> => {
  const keys: string[] = [];
  for await (const locator of files) {
    if (locator.kind === 's3') keys.push(locator.key);
  }
  return keys;
};

const createStore = (): MemoryObjectStore => {
  const store = new MemoryObjectStore(2);
  store.put('test-bucket', 'data/a.parquet', 'a');
  store.put('test-bucket', 'data/b.parquet', 'b');
  store.put('test-bucket', 'data/c.txt', 'c');
  store.put('test-bucket', 'data/d.parquet', 'd');
  store.put('test-bucket', 'data/dir.parquet/', '');
  store.put('test-bucket', 'other/e.parquet', 'e');
  return store;
};

describe('S3Source', () => {
  let staging: string;

  beforeEach(async () => {
    staging = await fs.mkdtemp(path.join(os.tmpdir(), 's3-source-test-'));
  });

  afterEach(async () => {
    await fs.rm(staging, { recursive: true, force: true });
  });

  it('pages through the prefix and keeps parquet objects only', async () => {
    const store = createStore();
    const source = new S3Source(config, store);

    expect(await collect(source.listFiles())).toEqual(['data/a.parquet', 'data/b.parquet', 'data/d.parquet']);
    expect(store.calls).toEqual(['list test-bucket/data/', 'list test-bucket/data/', 'list test-bucket/data/']);
    expect(source.location).toBe('s3://test-bucket/data/');
  });

  it('reports a listing failure as an unavailable source', async () => {
    const store = createStore();
    store.failures.set('list test-bucket/data/', new Error('AccessDenied'));
    const source = new S3Source(config, store);

    const err = await collect(source.listFiles()).catch((error: unknown) => error);

    expect(err).toBeInstanceOf(SourceUnavailable);
    expect(err).toMatchObject({ code: 'SOURCE_UNAVAILABLE', message: 'Cannot list s3://test-bucket/data/: AccessDenied' });
  });

  it('fetches an object under the staging directory', async () => {
    const source = new S3Source(config, createStore());

    const file = await source.materialize({ kind: 's3', bucket: 'test-bucket', key: 'data/a.parquet' }, staging);

    expect(file.localPath).toBe(path.join(staging, 'test-bucket', 'data', 'a.parquet'));
    expect(file.temporary).toBe(true);
    expect(await fs.readFile(file.localPath, 'utf8')).toBe('a');
  });

  it('leaves nothing behind when a fetch fails', async () => {
    const source = new S3Source(config, createStore());

    const err = await source
      .materialize({ kind: 's3', bucket: 'test-bucket', key: 'data/missing.parquet' }, staging)
      .catch((error: unknown) => error);

    expect(err).toBeInstanceOf(FetchFailed);
    expect(err).toMatchObject({
      code: 'FETCH_FAILED',
      message: 'Cannot fetch s3://test-bucket/data/missing.parquet: NoSuchKey: test-bucket/data/missing.parquet',
    });
    expect(await fs.readdir(path.join(staging, 'test-bucket', 'data'))).toEqual([]);
  });
});

describe('createSource', () => {
  it('builds an S3 source for an s3 configuration', () => {
    const source = createSource(config);

    expect(source).toBeInstanceOf(S3Source);
    expect(source.location).toBe('s3://test-bucket/data/');
  });
});

describe('stagingPathFor', () => {
  it('places the key under the bucket directory', () => {
    expect(stagingPathFor('/staging', 'bucket', 'a//b/c.parquet')).toBe(path.resolve('/staging/bucket/a/b/c.parquet'));
  });

  it('refuses keys that escape the staging directory', () => {
    expect(() => stagingPathFor('/staging', 'bucket', '../../../outside.parquet')).toThrow(FetchFailed);
  });
});
