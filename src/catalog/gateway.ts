import { randomInt } from 'node:crypto';
import {
  AppendFailed,
  CatalogUnreachable,
  CreateFailed,
  SchemaConflict,
  type IngestError,
} from '../engine/errors';
import { formatError, log } from '../engine/logger';
import type { DecimalTargets } from '../schema/normalize';
import type { ColumnSchema } from '../schema/types';
import { decimalTargetsOf, toTableSchema } from './iceberg-types';
import {
  describeTarget,
  isCatalogRequestError,
  SOURCE_FILE_PROPERTY,
  type CatalogClient,
  type CatalogTarget,
  type LoadedTable,
} from './types';

export type Readiness =
  | { state: 'ABSENT' }
  | { state: 'NAMESPACE_READY' }
  | { state: 'TABLE_READY'; table: LoadedTable }
  | { state: 'CREATE_FAILED'; error: IngestError }
  | { state: 'SCHEMA_CONFLICT'; error: IngestError };

type TargetState = {
  readiness: Readiness;
  /** Result of the first table lookup; `null` when the table did not exist */
  probed?: LoadedTable | null;
  applied: Set<string>;
};

export type AppendedFile = {
  snapshotId: bigint;
  /** True when the first attempt's outcome was unknown and the snapshot was found on reload */
  recovered: boolean;
};

export type GatewayOptions = {
  newSnapshotId?: () => bigint;
};

const SUPPORTED_FORMAT_VERSION = 2;

// Random ids below 2^48 stay exact as JSON numbers and as avro longs.
const defaultSnapshotId = (): bigint => BigInt(randomInt(1, 2 ** 48 - 1));

const appliedFilesOf = (table: LoadedTable): Set<string> => {
  const applied = new Set<string>();
  for (const snapshot of table.snapshots) {
    const source = snapshot.summary[SOURCE_FILE_PROPERTY];
    if (source !== undefined) applied.add(source);
  }
  return applied;
};

const targetKey = (target: CatalogTarget): string =>
  JSON.stringify([target.endpoint, target.warehouse, target.namespace, target.table]);

const timed = async <T>(action: string, subject: string, fn: () => Promise<T>): Promise<T> => {
  const start = Date.now();
  const result = await fn();
  log.catalog(action, subject, Date.now() - start);
  return result;
};

/**
 * Drives a target table through `ABSENT -> NAMESPACE_READY -> TABLE_READY`.
 * Each transition happens at most once per target; terminal failures are
 * remembered and rethrown without further catalog calls.
 */
export class CatalogGateway {
  private connected = false;
  private readonly targets = new Map<string, TargetState>();
  private readonly newSnapshotId: () => bigint;

  constructor(
    private readonly client: CatalogClient,
    options: GatewayOptions = {}
  ) {
    this.newSnapshotId = options.newSnapshotId ?? defaultSnapshotId;
  }

  async connect(target: CatalogTarget): Promise<void> {
    if (this.connected) return;
    try {
      await timed('connect', target.endpoint, () => this.client.connect());
    } catch (err) {
      throw new CatalogUnreachable(`Cannot reach catalog at ${target.endpoint}: ${formatError(err)}`, {
        cause: err,
        context: { endpoint: target.endpoint, warehouse: target.warehouse },
      });
    }
    this.connected = true;
  }

  readiness(target: CatalogTarget): Readiness {
    return this.stateOf(target).readiness;
  }

  async ensureNamespace(target: CatalogTarget): Promise<void> {
    const state = this.stateOf(target);
    this.rethrowTerminal(state);
    if (state.readiness.state !== 'ABSENT') return;

    const subject = target.namespace.join('.');
    try {
      const exists = await timed('load namespace', subject, () => this.client.namespaceExists(target.namespace));
      if (!exists) {
        await timed('create namespace', subject, () => this.createNamespace(target.namespace));
      }
    } catch (err) {
      throw this.fail(state, target, `Cannot create namespace '${subject}'`, err);
    }
    state.readiness = { state: 'NAMESPACE_READY' };
  }

  /**
   * The table as first found in the catalog, or undefined when it does not
   * exist yet. Looked up once per target.
   */
  async existingTable(target: CatalogTarget): Promise<LoadedTable | undefined> {
    const state = this.stateOf(target);
    if (state.readiness.state === 'TABLE_READY') return state.readiness.table;
    if (state.probed !== undefined) return state.probed ?? undefined;

    let table: LoadedTable | undefined;
    try {
      table = await timed('load table', describeTarget(target), () =>
        this.client.loadTable(target.namespace, target.table)
      );
    } catch (err) {
      throw this.unreachable(target, err);
    }
    state.probed = table ?? null;
    if (table) state.applied = appliedFilesOf(table);
    return table;
  }

  /** Decimal types of the target table's columns, once the table is known. */
  async decimalTargets(target: CatalogTarget): Promise<DecimalTargets | undefined> {
    const table = await this.existingTable(target);
    return table && decimalTargetsOf(table.schema);
  }

  /** Whether a snapshot of the table already records `sourceFile`. */
  async isApplied(target: CatalogTarget, sourceFile: string): Promise<boolean> {
    await this.existingTable(target);
    return this.stateOf(target).applied.has(sourceFile);
  }

  /**
   * Create the table from `schema` if absent. Whether a given file fits an
   * existing table is checked per file by the caller; only a table this
   * loader cannot write at all puts the target in conflict.
   */
  async ensureTable(target: CatalogTarget, schema: ColumnSchema): Promise<LoadedTable> {
    const state = this.stateOf(target);
    this.rethrowTerminal(state);
    if (state.readiness.state === 'TABLE_READY') return state.readiness.table;
    if (state.readiness.state === 'ABSENT') {
      await this.ensureNamespace(target);
    }

    const existing = await this.existingTable(target);
    const table = existing ?? (await this.createTable(state, target, schema));

    if (table.formatVersion !== SUPPORTED_FORMAT_VERSION) {
      throw this.conflict(state, target, [`table format version is ${table.formatVersion}, expected ${SUPPORTED_FORMAT_VERSION}`]);
    }

    state.readiness = { state: 'TABLE_READY', table };
    return table;
  }

  /**
   * Append one file as one snapshot. A failed attempt is retried once,
   * immediately, after reloading the table; if the reload shows the first
   * attempt's snapshot, that attempt is taken as committed.
   */
  async appendRows(
    target: CatalogTarget,
    file: { localPath: string; rows: number; sourceFile: string }
  ): Promise<AppendedFile> {
    const state = this.stateOf(target);
    if (state.readiness.state !== 'TABLE_READY') {
      throw new Error(`Table ${describeTarget(target)} is not ready for appends`);
    }

    const firstId = this.newSnapshotId();
    try {
      await this.commit(state, target, state.readiness.table, file, firstId);
      return { snapshotId: firstId, recovered: false };
    } catch (err) {
      log.warn(`Append of ${file.sourceFile} failed (${formatError(err)}), retrying once`);
    }

    let reloaded: LoadedTable | undefined;
    try {
      reloaded = await this.client.loadTable(target.namespace, target.table);
    } catch (err) {
      throw new AppendFailed(`Cannot append ${file.sourceFile}: reload failed: ${formatError(err)}`, {
        cause: err,
        context: { table: describeTarget(target) },
      });
    }
    if (!reloaded) {
      throw new AppendFailed(`Cannot append ${file.sourceFile}: table ${describeTarget(target)} disappeared`);
    }

    this.remember(state, reloaded);
    if (reloaded.snapshots.some((snapshot) => snapshot.snapshotId === firstId)) {
      return { snapshotId: firstId, recovered: true };
    }

    const secondId = this.newSnapshotId();
    try {
      await this.commit(state, target, reloaded, file, secondId);
    } catch (err) {
      throw new AppendFailed(`Cannot append ${file.sourceFile}: ${formatError(err)}`, {
        cause: err,
        context: { table: describeTarget(target) },
      });
    }
    return { snapshotId: secondId, recovered: false };
  }

  private async commit(
    state: TargetState,
    target: CatalogTarget,
    table: LoadedTable,
    file: { localPath: string; rows: number; sourceFile: string },
    snapshotId: bigint
  ): Promise<void> {
    const committed = await timed('append', describeTarget(target), () =>
      this.client.appendFile(table, { ...file, snapshotId })
    );
    this.remember(state, committed);
  }

  private remember(state: TargetState, table: LoadedTable): void {
    state.readiness = { state: 'TABLE_READY', table };
    for (const source of appliedFilesOf(table)) {
      state.applied.add(source);
    }
  }

  private async createNamespace(namespace: readonly string[]): Promise<void> {
    try {
      await this.client.createNamespace(namespace);
    } catch (err) {
      // created concurrently
      if (isCatalogRequestError(err) && err.status === 409) return;
      throw err;
    }
  }

  private async createTable(state: TargetState, target: CatalogTarget, schema: ColumnSchema): Promise<LoadedTable> {
    const tableSchema = toTableSchema(schema);
    const subject = describeTarget(target);

    try {
      return await timed('create table', subject, () =>
        this.client.createTable(target.namespace, target.table, tableSchema)
      );
    } catch (err) {
      if (!isCatalogRequestError(err) || err.status !== 409) {
        throw this.fail(state, target, `Cannot create table ${subject}`, err);
      }
    }

    // Lost a creation race: use the table the other writer created
    let raced: LoadedTable | undefined;
    try {
      raced = await this.client.loadTable(target.namespace, target.table);
    } catch (err) {
      throw this.fail(state, target, `Cannot load table ${subject}`, err);
    }
    if (!raced) {
      throw this.fail(state, target, `Cannot create table ${subject}`, new Error('table exists but cannot be loaded'));
    }
    state.probed = raced;
    state.applied = appliedFilesOf(raced);
    return raced;
  }

  private stateOf(target: CatalogTarget): TargetState {
    const key = targetKey(target);
    let state = this.targets.get(key);
    if (!state) {
      state = { readiness: { state: 'ABSENT' }, applied: new Set() };
      this.targets.set(key, state);
    }
    return state;
  }

  private rethrowTerminal(state: TargetState): void {
    if (state.readiness.state === 'CREATE_FAILED' || state.readiness.state === 'SCHEMA_CONFLICT') {
      throw state.readiness.error;
    }
  }

  private unreachable(target: CatalogTarget, err: unknown): IngestError {
    return new CatalogUnreachable(`Catalog request for ${describeTarget(target)} failed: ${formatError(err)}`, {
      cause: err,
      context: { table: describeTarget(target) },
    });
  }

  private fail(state: TargetState, target: CatalogTarget, message: string, err: unknown): IngestError {
    // no status: the catalog never answered
    if (isCatalogRequestError(err) && err.status === undefined) {
      return this.unreachable(target, err);
    }
    const error = new CreateFailed(`${message}: ${formatError(err)}`, {
      cause: err,
      context: { table: describeTarget(target) },
    });
    state.readiness = { state: 'CREATE_FAILED', error };
    return error;
  }

  private conflict(state: TargetState, target: CatalogTarget, mismatches: readonly string[]): IngestError {
    const error = new SchemaConflict(describeTarget(target), mismatches);
    state.readiness = { state: 'SCHEMA_CONFLICT', error };
    return error;
  }
}
