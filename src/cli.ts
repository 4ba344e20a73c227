#!/usr/bin/env node
import fs from 'node:fs/promises';
import os from 'node:os';
import { parseArgs } from 'node:util';
import { CatalogGateway } from './catalog/gateway';
import { createCatalogHttp, RestCatalogClient } from './catalog/rest-client';
import { createSource } from './dialects';
import { buildIngestConfig } from './engine/config';
import { ConfigError } from './engine/errors';
import { formatError, log } from './engine/logger';
import { resolveStagingDir, run } from './engine/runner';
import type { IngestConfig } from './engine/types';
import { DuckDbInspector } from './parquet/inspect';

import 'dotenv/config';

const EXIT_CONFIG_ERROR = 2;
const EXIT_INTERRUPTED = 130;

const OPTIONS = {
  'local-path': { type: 'string', short: 'L' },
  bucket: { type: 'string', short: 'b' },
  prefix: { type: 'string', short: 'p' },
  recursive: { type: 'boolean', short: 'r' },
  endpoint: { type: 'string', short: 'E' },
  token: { type: 'string', short: 'T' },
  warehouse: { type: 'string', short: 'w' },
  namespace: { type: 'string', short: 'N' },
  'table-name': { type: 'string', short: 't' },
  directory: { type: 'string', short: 'd' },
  'keep-files': { type: 'boolean' },
  'delete-files': { type: 'boolean' },
  'list-only': { type: 'boolean', short: 'l' },
  'no-sign-request': { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const;

const parseCli = (args: string[]) => parseArgs({ args, options: OPTIONS, strict: true, allowPositionals: false }).values;

const printUsage = (): void => {
  console.info(`
Usage: lakeload [options]
       tsx src/cli.ts [options]

Load Parquet files from a local directory or an S3 bucket into an Iceberg
REST catalog table. Each file is appended as its own snapshot; files already
recorded in the table's snapshots are skipped.

Source:
  -L, --local-path <dir>     Local directory of parquet files (wins over --bucket)
  -r, --recursive            Walk subdirectories of --local-path
  -b, --bucket <name>        Source bucket (also s3://bucket/prefix)
  -p, --prefix <prefix>      Key prefix inside the bucket
      --no-sign-request      Read a public bucket without credentials

Catalog:
  -E, --endpoint <url>       Catalog REST endpoint, e.g. http://localhost:8181/catalog
  -T, --token <token>        Bearer token
  -w, --warehouse <name>     Warehouse
  -N, --namespace <name>     Namespace, dots separate levels
  -t, --table-name <name>    Table

Run:
  -d, --directory <dir>      Staging directory for fetched and normalized files
                             (default: a temporary directory removed at the end)
      --keep-files           Keep staged files after a successful append
      --delete-files         Delete staged files after a successful append
  -l, --list-only            List the files that would be loaded and exit
  -h, --help                 Show this help

Environment:
  LOCAL_PATH, S3_BUCKET, S3_PREFIX, S3_NO_SIGN_REQUEST
  CATALOG_ENDPOINT, CATALOG_TOKEN, CATALOG_WAREHOUSE, CATALOG_NAMESPACE, CATALOG_TABLE
  STAGING_DIR
  AWS_REGION         Object store region (default: us-east-1)
  S3_ENDPOINT        S3-compatible endpoint, e.g. http://localhost:9000
  S3_FORCE_PATH_STYLE  Use path-style bucket addressing

Exit codes: 0 success, 1 failed files or run error, 2 configuration error, 130 interrupted twice.
`);
};

const ingest = async (config: IngestConfig, shouldStop: () => boolean): Promise<number> => {
  const source = createSource(config.source);

  if (config.listOnly || !config.target) {
    const report = await run(config, { source, stagingDir: config.stagingDir ?? os.tmpdir() }, shouldStop);
    return report.exitCode;
  }

  const { target } = config;
  const staging = await resolveStagingDir(config, os.tmpdir());
  const inspector = await DuckDbInspector.create();
  const gateway = new CatalogGateway(
    new RestCatalogClient({
      warehouse: target.warehouse,
      http: createCatalogHttp({ endpoint: target.endpoint, token: target.token }),
      storage: config.storage,
    })
  );

  try {
    const report = await run(config, { source, gateway, inspector, stagingDir: staging.dir }, shouldStop);
    return report.exitCode;
  } finally {
    inspector.close();
    if (staging.temporary) {
      await fs.rm(staging.dir, { recursive: true, force: true });
    }
  }
};

const main = async (): Promise<number> => {
  let values: ReturnType<typeof parseCli>;
  try {
    values = parseCli(process.argv.slice(2));
  } catch (err) {
    log.error(formatError(err));
    printUsage();
    return EXIT_CONFIG_ERROR;
  }

  if (values.help) {
    printUsage();
    return 0;
  }

  let config: IngestConfig;
  try {
    config = buildIngestConfig(values, process.env);
  } catch (err) {
    if (err instanceof ConfigError) {
      log.error(err.message);
      return EXIT_CONFIG_ERROR;
    }
    throw err;
  }

  if (config.source.type === 'local' && (values.bucket ?? process.env.S3_BUCKET)) {
    log.warn('Both a local path and a bucket were given; reading the local path');
  }

  const abortController = new AbortController();
  const shouldStop = () => abortController.signal.aborted;

  const onSignal = () => {
    if (abortController.signal.aborted) {
      log.error('Interrupted again, exiting now');
      process.exit(EXIT_INTERRUPTED);
    }
    abortController.abort();
    log.warn('Stopping after the current step (interrupt again to exit now)');
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    return await ingest(config, shouldStop);
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
};

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
