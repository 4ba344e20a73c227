import fs from 'node:fs/promises';
import path from 'node:path';
import type { CatalogGateway } from '../catalog/gateway';
import { describeTarget } from '../catalog/types';
import { describeLocator, type FileLocator, type SourceDialect } from '../dialects/source';
import type { ParquetInspector } from '../parquet/inspect';
import { checkCompatibility } from '../schema/compat';
import { Interrupted, isIngestError, SchemaIncompatible, SourceUnavailable, type IngestError } from './errors';
import { formatError, log } from './logger';
import { prepareFile } from './prepare';
import type { IngestConfig, IngestHooks, IngestResult, RunReport } from './types';

export type IngestDeps = {
  source: SourceDialect;
  /** Required unless the run is list-only */
  gateway?: CatalogGateway;
  /** Required unless the run is list-only */
  inspector?: ParquetInspector;
  /** Resolved staging directory */
  stagingDir: string;
  hooks?: IngestHooks;
};

type ReportError = { code: IngestError['code'] | 'UNEXPECTED'; message: string };

const toReportError = (err: unknown): ReportError =>
  isIngestError(err) ? { code: err.code, message: err.message } : { code: 'UNEXPECTED', message: formatError(err) };

const shortName = (file: string): string => file.split('/').pop() ?? file;

const checkStop = (shouldStop: () => boolean): void => {
  if (shouldStop()) throw new Interrupted();
};

const removeQuietly = async (filePath: string): Promise<void> => {
  try {
    await fs.rm(filePath, { force: true });
  } catch (err) {
    log.warn(`Could not remove ${filePath}: ${formatError(err)}`);
  }
};

const buildReport = (
  files: string[],
  results: IngestResult[],
  startTime: number,
  outcome: { completed: boolean; fatal?: ReportError }
): RunReport => {
  let succeeded = 0;
  let skipped = 0;
  let failed = 0;
  let rows = 0;
  for (const result of results) {
    if (result.status === 'succeeded') {
      succeeded++;
      rows += result.rows;
    } else if (result.status === 'skipped') {
      skipped++;
    } else {
      failed++;
    }
  }

  const clean = outcome.completed && outcome.fatal === undefined && failed === 0;
  return {
    results,
    files,
    succeeded,
    skipped,
    failed,
    rows,
    fatal: outcome.fatal,
    completed: outcome.completed,
    exitCode: clean ? 0 : 1,
    elapsedMs: Date.now() - startTime,
  };
};

const enumerate = async (source: SourceDialect, listOnly: boolean): Promise<FileLocator[]> => {
  const locators: FileLocator[] = [];
  for await (const locator of source.listFiles()) {
    locators.push(locator);
  }
  // an empty listing is only an error when there is something to load
  if (locators.length === 0 && !listOnly) {
    throw new SourceUnavailable(`No parquet files found in ${source.location}`, {
      context: { location: source.location },
    });
  }
  return locators;
};

/**
 * Ingest every file of the source into the target table, one file and one
 * snapshot at a time. Per-file failures are recorded and the run moves on;
 * fatal errors stop it.
 */
export const run = async (config: IngestConfig, deps: IngestDeps, shouldStop: () => boolean): Promise<RunReport> => {
  const startTime = Date.now();
  const { source, hooks } = deps;
  const results: IngestResult[] = [];
  let files: string[] = [];

  const finish = (outcome: { completed: boolean; fatal?: ReportError }): RunReport => {
    const report = buildReport(files, results, startTime, outcome);
    if (!config.listOnly) {
      if (report.fatal) {
        log.error(report.fatal.message);
      }
      log.ingest.summary({
        succeeded: report.succeeded,
        skipped: report.skipped,
        failed: report.failed,
        rows: report.rows,
        completed: report.completed,
        elapsed: report.elapsedMs,
        failures: results.flatMap((result) =>
          result.status === 'failed' ? [{ file: result.file, reason: result.error.message }] : []
        ),
      });
    }
    hooks?.onComplete?.(report);
    return report;
  };

  // 1. Enumerate
  let locators: FileLocator[];
  try {
    log.info(`Listing parquet files via ${source.name} source`);
    locators = await enumerate(source, config.listOnly);
  } catch (err) {
    if (config.listOnly) log.error(formatError(err));
    return finish({ completed: false, fatal: toReportError(err) });
  }
  files = locators.map(describeLocator);

  if (config.listOnly) {
    log.ingest.listing(source.location, files);
    hooks?.onStart?.({ source: source.location, fileCount: files.length, listOnly: true });
    return finish({ completed: true });
  }

  const { gateway, inspector } = deps;
  const { target } = config;
  if (!gateway || !inspector || !target) {
    throw new Error('A catalog target, gateway and inspector are required to ingest');
  }

  log.ingest.start({
    source: source.location,
    target: `${target.endpoint} ${describeTarget(target)}`,
    staging: deps.stagingDir,
    cleanup: config.cleanup,
  });
  hooks?.onStart?.({ source: source.location, target: describeTarget(target), fileCount: files.length, listOnly: false });

  // 2. Catalog setup, once per run
  try {
    await gateway.connect(target);
    await gateway.ensureNamespace(target);
    await gateway.existingTable(target);
  } catch (err) {
    return finish({ completed: false, fatal: toReportError(err) });
  }

  // 3. One file at a time
  const total = locators.length;
  for (const [index, locator] of locators.entries()) {
    if (shouldStop()) {
      log.warn('Stopping before the next file');
      return finish({ completed: false });
    }

    const file = files[index];
    const name = shortName(file);
    const counter = (message: string): void => log.fileCounter(index + 1, total, name, message);

    let result: IngestResult;
    let stopError: IngestError | undefined;
    try {
      result = await ingestFile(locator, file, config, { ...deps, gateway, inspector, target }, shouldStop, counter);
    } catch (err) {
      result = { status: 'failed', file, error: toReportError(err) };
      counter(`failed: ${result.error.message}`);
      if (isIngestError(err) && (err.fatal || err instanceof Interrupted)) {
        stopError = err;
      }
    }

    results.push(result);
    hooks?.onFileComplete?.({ fileIndex: index + 1, fileTotal: total, result });

    if (stopError) {
      const fatal = stopError.fatal ? toReportError(stopError) : undefined;
      return finish({ completed: false, fatal });
    }

    const report = buildReport(files, results, startTime, { completed: false });
    log.runningTotal({ succeeded: report.succeeded, skipped: report.skipped, failed: report.failed, rows: report.rows });
  }

  return finish({ completed: true });
};

const ingestFile = async (
  locator: FileLocator,
  file: string,
  config: IngestConfig,
  deps: IngestDeps & {
    gateway: CatalogGateway;
    inspector: ParquetInspector;
    target: NonNullable<IngestConfig['target']>;
  },
  shouldStop: () => boolean,
  counter: (message: string) => void
): Promise<IngestResult> => {
  const { source, gateway, inspector, target, stagingDir } = deps;

  if (await gateway.isApplied(target, file)) {
    counter('already applied, skipping');
    return { status: 'skipped', file, reason: 'already applied' };
  }

  checkStop(shouldStop);
  if (locator.kind === 's3') counter('fetching...');
  const materialized = await source.materialize(locator, stagingDir);

  checkStop(shouldStop);
  const prepared = await prepareFile(materialized.localPath, {
    inspector,
    stagingDir,
    targets: await gateway.decimalTargets(target),
  });
  if (prepared.rewrites.length > 0) {
    const columns = prepared.rewrites.map((rewrite) => rewrite.column).join(', ');
    counter(`normalized decimal columns: ${columns}`);
  }

  checkStop(shouldStop);
  const table = await gateway.ensureTable(target, prepared.schema);
  const mismatches = checkCompatibility(prepared.schema, table.schema);
  if (mismatches.length > 0) {
    throw new SchemaIncompatible(`${file} cannot be appended to ${describeTarget(target)}: ${mismatches.join('; ')}`, {
      file,
      mismatches,
    });
  }

  checkStop(shouldStop);
  const appended = await gateway.appendRows(target, {
    localPath: prepared.path,
    rows: prepared.rows,
    sourceFile: file,
  });
  counter(`appended ${prepared.rows.toLocaleString('en-US')} rows as snapshot ${appended.snapshotId}`);

  if (config.cleanup === 'delete') {
    if (materialized.temporary) await removeQuietly(materialized.localPath);
    if (prepared.normalizedCopy) await removeQuietly(prepared.normalizedCopy);
  }

  return {
    status: 'succeeded',
    file,
    rows: prepared.rows,
    snapshotId: appended.snapshotId,
    normalized: prepared.normalizedCopy !== undefined,
  };
};

/** Staging directory for a run: the configured one, or a fresh temporary directory. */
export const resolveStagingDir = async (
  config: IngestConfig,
  tempRoot: string
): Promise<{ dir: string; temporary: boolean }> => {
  if (config.stagingDir) {
    const dir = path.resolve(config.stagingDir);
    await fs.mkdir(dir, { recursive: true });
    return { dir, temporary: false };
  }
  return { dir: await fs.mkdtemp(path.join(tempRoot, 'lakeload-')), temporary: true };
};
