import type { CatalogTarget } from '../catalog/types';
import type { SourceConfig } from '../dialects/source';
import type { S3ConnectionOptions } from '../storage/object-store';
import type { IngestErrorCode } from './errors';

export type CleanupPolicy = 'delete' | 'retain';

/**
 * Everything a run needs, resolved from arguments and environment.
 */
export type IngestConfig = {
  source: SourceConfig;
  /** Absent in list-only mode */
  target?: CatalogTarget;
  /** Staging directory; undefined means a fresh directory under the OS temp dir */
  stagingDir?: string;
  cleanup: CleanupPolicy;
  listOnly: boolean;
  /** Object-store client settings for table storage where the catalog vends none */
  storage: S3ConnectionOptions;
};

export type IngestResult =
  | { status: 'succeeded'; file: string; rows: number; snapshotId: bigint; normalized: boolean }
  | { status: 'skipped'; file: string; reason: string }
  | { status: 'failed'; file: string; error: { code: IngestErrorCode | 'UNEXPECTED'; message: string } };

export type RunReport = {
  /** One entry per enumerated file, in enumeration order */
  results: IngestResult[];
  /** Files found by enumeration */
  files: string[];
  succeeded: number;
  skipped: number;
  failed: number;
  rows: number;
  /** Fatal error that stopped the run, if any */
  fatal?: { code: IngestErrorCode | 'UNEXPECTED'; message: string };
  /** False when the run stopped before every file was attempted */
  completed: boolean;
  exitCode: number;
  elapsedMs: number;
};

/**
 * Progress hooks for monitoring a run.
 */
export type IngestHooks = {
  /** Called once enumeration finished */
  onStart?: (params: { source: string; target?: string; fileCount: number; listOnly: boolean }) => void;

  /** Called after each file, whatever its outcome */
  onFileComplete?: (params: { fileIndex: number; fileTotal: number; result: IngestResult }) => void;

  /** Called when the run ends (success or failure) */
  onComplete?: (report: RunReport) => void;
};
