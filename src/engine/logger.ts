type AnsiColor = {
  reset: string;
  dim: string;
  bold: string;
  red: string;
  green: string;
  yellow: string;
  blue: string;
  cyan: string;
};

const COLORS: Readonly<AnsiColor> = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  bold: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
};

const pad = (n: number, len = 2): string => String(n).padStart(len, '0');

const timestamp = (): string => {
  const d = new Date();
  return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
};

const formatNumber = (n: number): string => n.toLocaleString('en-US');

export const formatElapsed = (elapsedMs: number): string => {
  if (elapsedMs < 60_000) {
    return `${(elapsedMs / 1000).toFixed(1)}s`;
  }

  const minutes = Math.floor(elapsedMs / 60_000);
  const seconds = Math.round((elapsedMs % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
};

export const log = {
  info: (message: string) => {
    console.info(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${message}`);
  },

  success: (message: string) => {
    console.info(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${COLORS.green}${message}${COLORS.reset}`);
  },

  warn: (message: string) => {
    console.warn(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${COLORS.yellow}WARN${COLORS.reset}  ${message}`);
  },

  error: (message: string) => {
    console.error(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${COLORS.red}ERR${COLORS.reset}   ${message}`);
  },

  fileCounter: (index: number, total: number, name: string, message: string) => {
    const counter = `${COLORS.blue}[${pad(index, String(total).length)}/${total}]${COLORS.reset}`;
    console.info(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${counter} ${COLORS.bold}${name}${COLORS.reset}  ${message}`);
  },

  runningTotal: (stats: { succeeded: number; skipped: number; failed: number; rows: number }) => {
    const parts: string[] = [
      `appended ${COLORS.green}${formatNumber(stats.succeeded)}${COLORS.reset}`,
      `rows ${COLORS.bold}${formatNumber(stats.rows)}${COLORS.reset}`,
    ];

    if (stats.skipped > 0) {
      parts.push(`skipped ${COLORS.yellow}${formatNumber(stats.skipped)}${COLORS.reset}`);
    }

    if (stats.failed > 0) {
      parts.push(`failed ${COLORS.red}${formatNumber(stats.failed)}${COLORS.reset}`);
    }
    console.info(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${COLORS.dim}total${COLORS.reset}  ${parts.join('  ')}`);
  },

  catalog: (action: string, subject: string, elapsed: number) => {
    const tag = `${COLORS.cyan}catalog${COLORS.reset}`;
    const time = (() => {
      if (elapsed > 1000) {
        return `${COLORS.yellow}${elapsed}ms${COLORS.reset}`;
      }
      return `${COLORS.dim}${elapsed}ms${COLORS.reset}`;
    })();
    console.info(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${tag}  ${action} ${COLORS.bold}${subject}${COLORS.reset}  ${time}`);
  },

  ingest: {
    start: (config: { source: string; target: string; staging: string; cleanup: string }) => {
      const lines = [
        '',
        `${COLORS.bold}Ingest started${COLORS.reset}`,
        `  source:   ${config.source}`,
        `  target:   ${config.target}`,
        `  staging:  ${config.staging}`,
        `  cleanup:  ${config.cleanup}`,
        '',
      ];
      console.info(lines.join('\n'));
    },

    listing: (source: string, files: readonly string[]) => {
      const lines = [
        '',
        `${COLORS.bold}Found ${formatNumber(files.length)} parquet files${COLORS.reset} ${COLORS.dim}in ${source}${COLORS.reset}`,
        ...files.map((file) => `  ${file}`),
        '',
      ];
      console.info(lines.join('\n'));
    },

    summary: (stats: {
      succeeded: number;
      skipped: number;
      failed: number;
      rows: number;
      completed: boolean;
      elapsed: number;
      failures: ReadonlyArray<{ file: string; reason: string }>;
    }) => {
      const status = (() => {
        if (stats.completed && stats.failed === 0) {
          return `${COLORS.green}${COLORS.bold}COMPLETED${COLORS.reset}`;
        }
        if (stats.completed) {
          return `${COLORS.red}${COLORS.bold}COMPLETED WITH FAILURES${COLORS.reset}`;
        }

        return `${COLORS.yellow}${COLORS.bold}INCOMPLETE${COLORS.reset}`;
      })();

      const failed = (() => {
        if (stats.failed > 0) {
          return `${COLORS.red}${formatNumber(stats.failed)}${COLORS.reset}`;
        }
        return `0${COLORS.reset}`;
      })();

      const lines = [
        '',
        `${COLORS.dim}${'─'.repeat(50)}${COLORS.reset}`,
        `  ${status}  ${COLORS.dim}(${formatElapsed(stats.elapsed)})${COLORS.reset}`,
        '',
        `  appended: ${COLORS.green}${formatNumber(stats.succeeded)}${COLORS.reset}`,
        `  rows:     ${COLORS.bold}${formatNumber(stats.rows)}${COLORS.reset}`,
        `  skipped:  ${COLORS.yellow}${formatNumber(stats.skipped)}${COLORS.reset}`,
        `  failed:   ${failed}`,
        ...stats.failures.map(({ file, reason }) => `    ${COLORS.red}✗${COLORS.reset} ${file}: ${reason}`),
        `${COLORS.dim}${'─'.repeat(50)}${COLORS.reset}`,
        '',
      ];
      console.info(lines.join('\n'));
    },
  },
};

interface CatalogErrorPayload {
  status?: number;
  errorType?: string;
  message: string;
}

interface AwsServiceError {
  name: string;
  message: string;
  $metadata?: { httpStatusCode?: number; requestId?: string };
}

const isCatalogErrorPayload = (err: unknown): err is CatalogErrorPayload =>
  err instanceof Error && 'errorType' in err && 'status' in err;

const isAwsServiceError = (err: unknown): err is AwsServiceError =>
  err instanceof Error && '$metadata' in err && typeof err.$metadata === 'object';

/**
 * One-line rendering of an error coming from a collaborator (catalog, S3, DuckDB).
 */
export const formatError = (err: unknown): string => {
  if (isCatalogErrorPayload(err)) {
    const status = err.status === undefined ? 'no response' : `HTTP ${err.status}`;
    const type = err.errorType ? ` ${err.errorType}` : '';
    return `${status}${type}: ${err.message}`;
  }

  if (isAwsServiceError(err)) {
    const status = err.$metadata?.httpStatusCode;
    return status === undefined ? `${err.name}: ${err.message}` : `${err.name} (HTTP ${status}): ${err.message}`;
  }

  const msg = err instanceof Error ? err.message : String(err);
  return msg.split('\n')[0].slice(0, 200);
};
