/**
 * One input file: a path on the local filesystem or an object in a bucket.
 */
export type FileLocator = { kind: 'local'; path: string } | { kind: 's3'; bucket: string; key: string };

/**
 * A locator whose bytes are readable at `localPath`. `temporary` is true when
 * the bytes were fetched into the staging directory.
 */
export type MaterializedFile = {
  locator: FileLocator;
  localPath: string;
  temporary: boolean;
};

/**
 * Source dialect interface.
 * Implement this to enumerate and fetch input files from a storage location.
 */
export interface SourceDialect {
  /** Unique name for logging and diagnostics */
  readonly name: string;

  /** Where the files come from, e.g. `s3://bucket/prefix` */
  readonly location: string;

  /**
   * Parquet files under the location. Every iteration restarts the listing;
   * a single iteration never yields the same locator twice.
   */
  listFiles(): AsyncIterable<FileLocator>;

  /** Make the file readable locally, fetching it into `stagingDir` when needed */
  materialize(locator: FileLocator, stagingDir: string): Promise<MaterializedFile>;
}

/**
 * Configuration for source dialects
 */
export type LocalSourceConfig = { type: 'local'; path: string; recursive: boolean };

export type S3SourceConfig = {
  type: 's3';
  bucket: string;
  prefix: string;
  region: string;
  endpoint?: string;
  forcePathStyle: boolean;
  anonymous: boolean;
};

export type SourceConfig = LocalSourceConfig | S3SourceConfig;

export const PARQUET_EXTENSION = '.parquet';

export const isParquetName = (name: string): boolean => name.toLowerCase().endsWith(PARQUET_EXTENSION);

export const describeLocator = (locator: FileLocator): string =>
  locator.kind === 'local' ? locator.path : `s3://${locator.bucket}/${locator.key}`;
