import type { TableSchema } from './iceberg-types';

/** Where files are appended: a table inside a (possibly multi-level) namespace of a warehouse. */
export type CatalogTarget = {
  endpoint: string;
  warehouse: string;
  namespace: readonly string[];
  table: string;
  token?: string;
};

export const describeTarget = (target: CatalogTarget): string =>
  `${target.warehouse}.${target.namespace.join('.')}.${target.table}`;

/** Snapshot summary key holding the source file a snapshot was appended from. */
export const SOURCE_FILE_PROPERTY = 'lakeload.source-file';

export const NAME_MAPPING_PROPERTY = 'schema.name-mapping.default';

export type Snapshot = {
  snapshotId: bigint;
  parentSnapshotId?: bigint;
  sequenceNumber: bigint;
  manifestList?: string;
  summary: Readonly<Record<string, string>>;
};

export type LoadedTable = {
  namespace: readonly string[];
  name: string;
  metadataLocation?: string;
  formatVersion: number;
  uuid: string;
  location: string;
  lastSequenceNumber: bigint;
  currentSnapshotId?: bigint;
  schema: TableSchema;
  /** Current schema as the catalog returned it, for manifest headers */
  schemaJson: string;
  snapshots: readonly Snapshot[];
  properties: Readonly<Record<string, string>>;
  /** Per-table client configuration, e.g. vended storage credentials */
  config: Readonly<Record<string, string>>;
};

export type AppendRequest = {
  /** Local Parquet file to upload */
  localPath: string;
  rows: number;
  /** Recorded in the snapshot summary under SOURCE_FILE_PROPERTY */
  sourceFile: string;
  snapshotId: bigint;
};

/**
 * Error answered by the catalog, or raised when it could not be reached
 * (`status` undefined).
 */
export class CatalogRequestError extends Error {
  public readonly status: number | undefined;
  public readonly errorType: string | undefined;

  constructor(message: string, options: { status?: number; errorType?: string; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'CatalogRequestError';
    this.status = options.status;
    this.errorType = options.errorType;
  }
}

export const isCatalogRequestError = (err: unknown): err is CatalogRequestError => err instanceof CatalogRequestError;

/**
 * Catalog operations the gateway drives. Implementations throw
 * CatalogRequestError for catalog failures.
 */
export interface CatalogClient {
  /** Resolve the warehouse configuration; must succeed before any other call */
  connect(): Promise<void>;
  namespaceExists(namespace: readonly string[]): Promise<boolean>;
  /** Throws CatalogRequestError with status 409 when the namespace already exists */
  createNamespace(namespace: readonly string[]): Promise<void>;
  loadTable(namespace: readonly string[], name: string): Promise<LoadedTable | undefined>;
  /** Throws CatalogRequestError with status 409 when the table already exists */
  createTable(namespace: readonly string[], name: string, schema: TableSchema): Promise<LoadedTable>;
  /** Upload the file, write manifests and commit one snapshot; returns the table after the commit */
  appendFile(table: LoadedTable, request: AppendRequest): Promise<LoadedTable>;
}
