import type { CatalogTarget } from '../catalog/types';
import type { SourceConfig } from '../dialects/source';
import { parseS3Location, type S3ConnectionOptions } from '../storage/object-store';
import { ConfigError } from './errors';
import type { CleanupPolicy, IngestConfig } from './types';

/** Option values as `parseArgs` returns them for the CLI's options. */
export type CliValues = {
  'local-path'?: string;
  bucket?: string;
  prefix?: string;
  recursive?: boolean;
  endpoint?: string;
  token?: string;
  warehouse?: string;
  namespace?: string;
  'table-name'?: string;
  directory?: string;
  'keep-files'?: boolean;
  'delete-files'?: boolean;
  'list-only'?: boolean;
  'no-sign-request'?: boolean;
};

export type Env = Readonly<Record<string, string | undefined>>;

export const DEFAULT_REGION = 'us-east-1';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['', '0', 'false', 'no', 'off']);

const pick = (...candidates: Array<string | undefined>): string | undefined => {
  for (const candidate of candidates) {
    const trimmed = candidate?.trim();
    if (trimmed) return trimmed;
  }
  return undefined;
};

const parseBoolean = (name: string, raw: string | undefined): boolean => {
  if (raw === undefined) return false;
  const value = raw.trim().toLowerCase();
  if (TRUE_VALUES.has(value)) return true;
  if (FALSE_VALUES.has(value)) return false;
  throw new ConfigError(name, `${name} must be true or false, got "${raw}"`);
};

const required = (parameter: string, envName: string, value: string | undefined): string => {
  if (value === undefined) {
    throw new ConfigError(parameter, `--${parameter} (or ${envName}) is required`);
  }
  return value;
};

const buildStorage = (env: Env): S3ConnectionOptions => ({
  region: pick(env.AWS_REGION, env.AWS_DEFAULT_REGION) ?? DEFAULT_REGION,
  endpoint: pick(env.S3_ENDPOINT),
  forcePathStyle: parseBoolean('S3_FORCE_PATH_STYLE', env.S3_FORCE_PATH_STYLE),
});

const buildSource = (values: CliValues, env: Env, storage: S3ConnectionOptions): SourceConfig => {
  const localPath = pick(values['local-path'], env.LOCAL_PATH);
  if (localPath) {
    return { type: 'local', path: localPath, recursive: values.recursive ?? false };
  }

  const rawBucket = pick(values.bucket, env.S3_BUCKET);
  if (!rawBucket) {
    throw new ConfigError('bucket', 'A source is required: --local-path (LOCAL_PATH) or --bucket (S3_BUCKET)');
  }

  // --bucket s3://bucket/prefix is accepted as a shorthand
  const location = parseS3Location(rawBucket);
  const bucket = location ? location.bucket : rawBucket;
  const prefix = pick(values.prefix, env.S3_PREFIX) ?? location?.key ?? '';

  if (!/^[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]$/.test(bucket)) {
    throw new ConfigError('bucket', `"${bucket}" is not a valid bucket name`);
  }

  return {
    type: 's3',
    bucket,
    prefix,
    region: storage.region,
    endpoint: storage.endpoint,
    forcePathStyle: storage.forcePathStyle ?? false,
    anonymous: values['no-sign-request'] === true || parseBoolean('S3_NO_SIGN_REQUEST', env.S3_NO_SIGN_REQUEST),
  };
};

const parseEndpoint = (raw: string): string => {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ConfigError('endpoint', `"${raw}" is not a valid URL`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigError('endpoint', `"${raw}" must be an http or https URL`);
  }
  return raw.replace(/\/+$/, '');
};

const parseNamespace = (raw: string): string[] => {
  const levels = raw.split('.').map((level) => level.trim());
  if (levels.some((level) => level === '')) {
    throw new ConfigError('namespace', `"${raw}" is not a valid namespace`);
  }
  return levels;
};

const buildTarget = (values: CliValues, env: Env): CatalogTarget => {
  const endpoint = required('endpoint', 'CATALOG_ENDPOINT', pick(values.endpoint, env.CATALOG_ENDPOINT));
  const warehouse = required('warehouse', 'CATALOG_WAREHOUSE', pick(values.warehouse, env.CATALOG_WAREHOUSE));
  const namespace = required('namespace', 'CATALOG_NAMESPACE', pick(values.namespace, env.CATALOG_NAMESPACE));
  const table = required('table-name', 'CATALOG_TABLE', pick(values['table-name'], env.CATALOG_TABLE));

  return {
    endpoint: parseEndpoint(endpoint),
    warehouse,
    namespace: parseNamespace(namespace),
    table,
    token: pick(values.token, env.CATALOG_TOKEN),
  };
};

const buildCleanup = (values: CliValues, stagingDir: string | undefined): CleanupPolicy => {
  if (values['keep-files'] && values['delete-files']) {
    throw new ConfigError('keep-files', '--keep-files and --delete-files cannot be combined');
  }
  if (values['keep-files']) return 'retain';
  if (values['delete-files']) return 'delete';
  return stagingDir === undefined ? 'delete' : 'retain';
};

/**
 * Resolve command-line values and environment into a run configuration.
 * Command-line values win over environment variables.
 */
export const buildIngestConfig = (values: CliValues, env: Env): IngestConfig => {
  const listOnly = values['list-only'] === true;
  const stagingDir = pick(values.directory, env.STAGING_DIR);
  const storage = buildStorage(env);

  return Object.freeze({
    source: buildSource(values, env, storage),
    target: listOnly ? undefined : buildTarget(values, env),
    stagingDir,
    cleanup: buildCleanup(values, stagingDir),
    listOnly,
    storage,
  });
};
