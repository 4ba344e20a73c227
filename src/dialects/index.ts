import type { SourceConfig, SourceDialect } from './source';
import { LocalSource } from './source/local';
import { S3Source } from './source/s3';

export type {
  FileLocator,
  LocalSourceConfig,
  MaterializedFile,
  S3SourceConfig,
  SourceConfig,
  SourceDialect,
} from './source';
export { describeLocator, isParquetName } from './source';
export { LocalSource, S3Source };

/**
 * Create the source dialect for a configuration
 */
export const createSource = (config: SourceConfig): SourceDialect => {
  switch (config.type) {
    case 'local':
      return new LocalSource(config);
    case 's3':
      return new S3Source(config);
  }
};
