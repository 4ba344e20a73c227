/**
 * Error taxonomy for an ingest run.
 *
 * Fatal errors stop the run; the others are recorded against the file being
 * processed and the run moves on to the next one.
 */

export type IngestErrorCode =
  | 'CONFIG_ERROR'
  | 'SOURCE_UNAVAILABLE'
  | 'FETCH_FAILED'
  | 'SCHEMA_INCOMPATIBLE'
  | 'SCHEMA_CONFLICT'
  | 'CREATE_FAILED'
  | 'CATALOG_UNREACHABLE'
  | 'APPEND_FAILED'
  | 'INTERRUPTED';

export class IngestError extends Error {
  public readonly code: IngestErrorCode;
  public readonly fatal: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: IngestErrorCode,
    fatal: boolean,
    options?: { cause?: unknown; context?: Record<string, unknown> }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
    this.code = code;
    this.fatal = fatal;
    this.context = options?.context;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends IngestError {
  public readonly parameter: string;

  constructor(parameter: string, message: string) {
    super(message, 'CONFIG_ERROR', true, { context: { parameter } });
    this.parameter = parameter;
  }
}

export class SourceUnavailable extends IngestError {
  constructor(message: string, options?: { cause?: unknown; context?: Record<string, unknown> }) {
    super(message, 'SOURCE_UNAVAILABLE', true, options);
  }
}

export class FetchFailed extends IngestError {
  constructor(message: string, options?: { cause?: unknown; context?: Record<string, unknown> }) {
    super(message, 'FETCH_FAILED', false, options);
  }
}

export class SchemaIncompatible extends IngestError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'SCHEMA_INCOMPATIBLE', false, { context });
  }
}

export class SchemaConflict extends IngestError {
  public readonly mismatches: readonly string[];

  constructor(table: string, mismatches: readonly string[]) {
    super(`Table '${table}' exists with an incompatible schema: ${mismatches.join('; ')}`, 'SCHEMA_CONFLICT', true, {
      context: { table, mismatches },
    });
    this.mismatches = mismatches;
  }
}

export class CreateFailed extends IngestError {
  constructor(message: string, options?: { cause?: unknown; context?: Record<string, unknown> }) {
    super(message, 'CREATE_FAILED', true, options);
  }
}

export class CatalogUnreachable extends IngestError {
  constructor(message: string, options?: { cause?: unknown; context?: Record<string, unknown> }) {
    super(message, 'CATALOG_UNREACHABLE', true, options);
  }
}

export class AppendFailed extends IngestError {
  constructor(message: string, options?: { cause?: unknown; context?: Record<string, unknown> }) {
    super(message, 'APPEND_FAILED', false, options);
  }
}

export class Interrupted extends IngestError {
  constructor(message = 'Interrupted by user') {
    super(message, 'INTERRUPTED', false);
  }
}

export const isIngestError = (err: unknown): err is IngestError => err instanceof IngestError;
