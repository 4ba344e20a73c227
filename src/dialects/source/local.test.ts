import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { SourceUnavailable } from '../../engine/errors';
import { createSource, type FileLocator } from '..';
import { LocalSource } from './local';

const collect = async (files: AsyncIterable<FileLocator>): Promise<string[]> => {
  const paths: string[] = [];
  for await (const locator of files) {
    if (locator.kind === 'local') paths.push(locator.path);
  }
  return paths;
};

describe('LocalSource', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'local-source-test-'));
    await fs.writeFile(path.join(dir, 'b.parquet'), 'b');
    await fs.writeFile(path.join(dir, 'a.parquet'), 'a');
    await fs.writeFile(path.join(dir, 'c.txt'), 'c');
    await fs.mkdir(path.join(dir, 'nested'));
    await fs.writeFile(path.join(dir, 'nested', 'd.PARQUET'), 'd');
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('lists parquet files of the directory in name order', async () => {
    const source = new LocalSource({ type: 'local', path: dir, recursive: false });

    expect(await collect(source.listFiles())).toEqual([path.join(dir, 'a.parquet'), path.join(dir, 'b.parquet')]);
  });

  it('walks subdirectories when recursive', async () => {
    const source = new LocalSource({ type: 'local', path: dir, recursive: true });

    expect(await collect(source.listFiles())).toEqual([
      path.join(dir, 'a.parquet'),
      path.join(dir, 'b.parquet'),
      path.join(dir, 'nested', 'd.PARQUET'),
    ]);
  });

  it('orders names by code point', async () => {
    const ordered = await fs.mkdtemp(path.join(os.tmpdir(), 'local-source-order-'));
    // U+1F600 sorts before U+FFFD by UTF-16 code unit but after it by code point
    await fs.writeFile(path.join(ordered, '\u{1F600}.parquet'), 'x');
    await fs.writeFile(path.join(ordered, '\uFFFD.parquet'), 'y');
    await fs.writeFile(path.join(ordered, 'z.parquet'), 'z');

    try {
      const source = new LocalSource({ type: 'local', path: ordered, recursive: false });

      expect(await collect(source.listFiles())).toEqual([
        path.join(ordered, 'z.parquet'),
        path.join(ordered, '\uFFFD.parquet'),
        path.join(ordered, '\u{1F600}.parquet'),
      ]);
    } finally {
      await fs.rm(ordered, { recursive: true, force: true });
    }
  });

  it('restarts the listing on every iteration', async () => {
    const source = new LocalSource({ type: 'local', path: dir, recursive: false });
    const files = source.listFiles();

    expect(await collect(files)).toEqual(await collect(files));
  });

  it('materializes files in place', async () => {
    const source = new LocalSource({ type: 'local', path: dir, recursive: false });
    const locator: FileLocator = { kind: 'local', path: path.join(dir, 'a.parquet') };

    expect(await source.materialize(locator)).toEqual({ locator, localPath: locator.path, temporary: false });
  });

  it('fails when the directory is missing', async () => {
    const source = new LocalSource({ type: 'local', path: path.join(dir, 'missing'), recursive: false });

    await expect(collect(source.listFiles())).rejects.toBeInstanceOf(SourceUnavailable);
  });

  it('fails when the path is a file', async () => {
    const file = path.join(dir, 'a.parquet');
    const source = new LocalSource({ type: 'local', path: file, recursive: false });

    await expect(collect(source.listFiles())).rejects.toThrow(`${file} is not a directory`);
  });

  it('is registered under its type', () => {
    expect(createSource({ type: 'local', path: dir, recursive: false })).toBeInstanceOf(LocalSource);
  });
});
