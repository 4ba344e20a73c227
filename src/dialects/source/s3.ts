import { randomUUID } from 'node:crypto';
import { createWriteStream } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import { FetchFailed, SourceUnavailable } from '../../engine/errors';
import { formatError } from '../../engine/logger';
import { createS3Client, S3ObjectStore, type ObjectPage, type ObjectStore } from '../../storage/object-store';
import {
  describeLocator,
  isParquetName,
  type FileLocator,
  type MaterializedFile,
  type S3SourceConfig,
  type SourceDialect,
} from '../source';

/**
 * Where a fetched object lands: `<staging>/<bucket>/<key>`, so keys from
 * different prefixes never collide. Keys that would escape the staging
 * directory are refused.
 */
export const stagingPathFor = (stagingDir: string, bucket: string, key: string): string => {
  const root = path.resolve(stagingDir);
  const destination = path.resolve(root, bucket, ...key.split('/').filter((segment) => segment !== ''));
  const relative = path.relative(root, destination);
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new FetchFailed(`Object key ${key} does not map to a file inside ${root}`, { context: { bucket, key } });
  }
  return destination;
};

/**
 * S3 source dialect.
 * Pages through ListObjectsV2 and downloads objects on demand.
 */
export class S3Source implements SourceDialect {
  readonly name = 's3';

  readonly location: string;
  private readonly store: ObjectStore;
  private readonly bucket: string;
  private readonly prefix: string;

  constructor(config: S3SourceConfig, store?: ObjectStore) {
    this.store =
      store ??
      new S3ObjectStore(
        createS3Client({
          region: config.region,
          endpoint: config.endpoint,
          forcePathStyle: config.forcePathStyle,
          anonymous: config.anonymous,
        })
      );
    this.bucket = config.bucket;
    this.prefix = config.prefix;
    this.location = `s3://${config.bucket}/${config.prefix}`;
  }

  listFiles(): AsyncIterable<FileLocator> {
    return { [Symbol.asyncIterator]: () => this.listPages() };
  }

  async materialize(locator: FileLocator, stagingDir: string): Promise<MaterializedFile> {
    if (locator.kind !== 's3') {
      throw new Error(`S3 source cannot materialize a ${locator.kind} locator`);
    }

    const destination = stagingPathFor(stagingDir, locator.bucket, locator.key);
    const partial = `${destination}.${randomUUID().slice(0, 8)}.partial`;

    try {
      await fs.mkdir(path.dirname(destination), { recursive: true });
      const body = await this.store.get(locator.bucket, locator.key);
      await pipeline(body, createWriteStream(partial));
      await fs.rename(partial, destination);
    } catch (err) {
      await fs.rm(partial, { force: true });
      throw new FetchFailed(`Cannot fetch ${describeLocator(locator)}: ${formatError(err)}`, {
        cause: err,
        context: { bucket: locator.bucket, key: locator.key },
      });
    }

    return { locator, localPath: destination, temporary: true };
  }

  private async *listPages(): AsyncGenerator<FileLocator> {
    const seen = new Set<string>();
    let continuationToken: string | undefined;

    do {
      let page: ObjectPage;
      try {
        page = await this.store.list(this.bucket, this.prefix, continuationToken);
      } catch (err) {
        throw new SourceUnavailable(`Cannot list ${this.location}: ${formatError(err)}`, {
          cause: err,
          context: { bucket: this.bucket, prefix: this.prefix },
        });
      }

      for (const key of page.keys) {
        if (key.endsWith('/') || !isParquetName(key) || seen.has(key)) continue;
        seen.add(key);
        yield { kind: 's3', bucket: this.bucket, key };
      }

      continuationToken = page.nextToken;
    } while (continuationToken);
  }
}
