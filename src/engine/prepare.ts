import { createHash } from 'node:crypto';
import path from 'node:path';
import type { ParquetInspector } from '../parquet/inspect';
import { normalize, planNormalization, type DecimalTargets } from '../schema/normalize';
import type { ColumnSchema, DecimalRewrite } from '../schema/types';

export type PreparedFile = {
  /** File to append: the input itself, or its normalized copy */
  path: string;
  schema: ColumnSchema;
  rows: number;
  rewrites: readonly DecimalRewrite[];
  /** Set when a normalized copy was written into the staging directory */
  normalizedCopy?: string;
};

export type PrepareOptions = {
  inspector: ParquetInspector;
  stagingDir: string;
  targets?: DecimalTargets;
};

/** Where the normalized copy of `localPath` is written. Stable for a given input path. */
export const normalizedPathFor = (stagingDir: string, localPath: string): string => {
  const digest = createHash('sha1').update(path.resolve(localPath)).digest('hex').slice(0, 12);
  return path.join(stagingDir, 'normalized', `${digest}-${path.basename(localPath)}`);
};

/**
 * Inspect a local Parquet file and, when its decimals need it, write a
 * normalized copy. Values are checked before any rewrite that could drop
 * digits, so a lossy file fails before anything is written.
 */
export const prepareFile = async (localPath: string, options: PrepareOptions): Promise<PreparedFile> => {
  const { inspector, targets } = options;

  const schema = await inspector.readSchema(localPath);
  const plan = planNormalization(schema, { targets });

  if (plan.rewrites.length === 0) {
    return { path: localPath, schema, rows: await inspector.countRows(localPath), rewrites: [] };
  }

  const observed = new Map<string, bigint[]>();
  for (const rewrite of plan.rewrites) {
    if (rewrite.needsValueCheck) {
      observed.set(rewrite.column, await inspector.readDecimalValues(localPath, rewrite.column, rewrite.from));
    }
  }
  normalize(schema, observed, { targets });

  const destination = normalizedPathFor(options.stagingDir, localPath);
  await inspector.writeNormalized(localPath, destination, plan);

  return {
    path: destination,
    schema: await inspector.readSchema(destination),
    rows: await inspector.countRows(destination),
    rewrites: plan.rewrites,
    normalizedCopy: destination,
  };
};
