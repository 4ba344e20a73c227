import fs from 'node:fs/promises';
import type { Dirent, Stats } from 'node:fs';
import path from 'node:path';
import { SourceUnavailable } from '../../engine/errors';
import { formatError } from '../../engine/logger';
import { isParquetName, type FileLocator, type LocalSourceConfig, type MaterializedFile, type SourceDialect } from '../source';

// UTF-8 byte order is code point order, and the order S3 lists keys in
const byName = (a: Dirent, b: Dirent): number => Buffer.compare(Buffer.from(a.name), Buffer.from(b.name));

/**
 * Local directory source dialect.
 * Files are already readable, so materializing is the identity.
 */
export class LocalSource implements SourceDialect {
  readonly name = 'local';

  readonly location: string;
  private readonly root: string;
  private readonly recursive: boolean;

  constructor(config: LocalSourceConfig) {
    this.root = path.resolve(config.path);
    this.recursive = config.recursive;
    this.location = this.root;
  }

  listFiles(): AsyncIterable<FileLocator> {
    return { [Symbol.asyncIterator]: () => this.walk() };
  }

  async materialize(locator: FileLocator): Promise<MaterializedFile> {
    if (locator.kind !== 'local') {
      throw new Error(`Local source cannot materialize a ${locator.kind} locator`);
    }
    return { locator, localPath: locator.path, temporary: false };
  }

  private async *walk(): AsyncGenerator<FileLocator> {
    let rootStat: Stats;
    try {
      rootStat = await fs.stat(this.root);
    } catch (err) {
      throw new SourceUnavailable(`Cannot read directory ${this.root}: ${formatError(err)}`, {
        cause: err,
        context: { path: this.root },
      });
    }
    if (!rootStat.isDirectory()) {
      throw new SourceUnavailable(`${this.root} is not a directory`, { context: { path: this.root } });
    }

    yield* this.walkDirectory(this.root);
  }

  private async *walkDirectory(directory: string): AsyncGenerator<FileLocator> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(directory, { withFileTypes: true });
    } catch (err) {
      throw new SourceUnavailable(`Cannot read directory ${directory}: ${formatError(err)}`, {
        cause: err,
        context: { path: directory },
      });
    }

    entries.sort(byName);

    for (const entry of entries) {
      const entryPath = path.join(directory, entry.name);

      if (entry.isDirectory()) {
        if (this.recursive) {
          yield* this.walkDirectory(entryPath);
        }
        continue;
      }

      if (!isParquetName(entry.name)) continue;

      if (entry.isFile() || (entry.isSymbolicLink() && (await isRegularFile(entryPath)))) {
        yield { kind: 'local', path: entryPath };
      }
    }
  }
}

const isRegularFile = async (filePath: string): Promise<boolean> => {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    // dangling link
    return false;
  }
};
