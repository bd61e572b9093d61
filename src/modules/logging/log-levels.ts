/**
 * Structured Log Levels — follows RFC 5424 / OpenTelemetry severity conventions.
 *
 * Levels (ascending severity):
 *   TRACE → DEBUG → INFO → WARN → ERROR → FATAL → OFF
 *
 * Use cases:
 *   TRACE  — Wire detail: request bodies (secrets redacted), raw service responses.
 *   DEBUG  — Operational detail: credential mode, scopes, column mapping, throttle pauses.
 *   INFO   — One line per created account, run summary.
 *   WARN   — Recoverable anomalies: unknown CSV columns, ignored settings.
 *   ERROR  — Failed account creations; failed connect or input read.
 *   FATAL  — Threshold only: hides ERROR output.
 *   OFF    — Silence the console. Per-record results still reach the log file.
 */

export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
  FATAL = 5,
  OFF = 6,
}

/** String → enum mapping (case-insensitive). */
export function parseLogLevel(value: string | undefined): LogLevel {
  if (!value) return LogLevel.INFO;
  const upper = value.toUpperCase().trim();
  // typeof check avoids numeric enum reverse-mapping ('0' → 'TRACE')
  const mapped: unknown = LogLevel[upper as keyof typeof LogLevel];
  if (typeof mapped === 'number') return mapped;
  const num = Number(upper);
  if (upper !== '' && Number.isInteger(num) && num >= (LogLevel.TRACE as number) && num <= (LogLevel.OFF as number)) {
    return num;
  }
  return LogLevel.INFO;
}

export function logLevelName(level: LogLevel): string {
  return LogLevel[level] ?? 'UNKNOWN';
}

/** Log categories map to the stages of a provisioning run. */
export enum LogCategory {
  /** Credential acquisition and session setup */
  AUTH = 'auth',
  /** Input file reading and parsing */
  SOURCE = 'source',
  /** Per-record account creation and batch summary */
  PROVISION = 'provision',
  /** Identity service HTTP calls */
  GRAPH = 'graph',
  /** General / uncategorized */
  GENERAL = 'general',
}

/** Looks a setting up by name; `process.env` by default. */
export type EnvLookup = (key: string) => string | undefined;

export const processEnv: EnvLookup = (key) => process.env[key];

export const DEFAULT_LOG_FILE = 'logs/bulk-user-provisioning.log';

export interface LogConfig {
  /** Global minimum log level (LOG_LEVEL, default INFO). */
  globalLevel: LogLevel;

  /**
   * Per-category level overrides.
   * Example: { graph: LogLevel.TRACE }
   */
  categoryLevels: Partial<Record<LogCategory, LogLevel>>;

  /** Keep `error.stack` on entries written as JSON (default: true). */
  includeStackTraces: boolean;

  /** Maximum serialized size of a structured data value; longer values are truncated. */
  maxPayloadSizeBytes: number;

  /** Console format: 'json' for one object per line, 'pretty' for operators. */
  format: 'json' | 'pretty';

  /** Append-only log file. `null` disables the file sink. */
  filePath: string | null;
}

export function buildDefaultLogConfig(env: EnvLookup = processEnv): LogConfig {
  const format = env('LOG_FORMAT')?.toLowerCase();
  const file = env('PROVISION_LOG_FILE')?.trim();
  return {
    globalLevel: parseLogLevel(env('LOG_LEVEL')),
    categoryLevels: parseCategoryLevels(env('LOG_CATEGORY_LEVELS')),
    includeStackTraces: env('LOG_INCLUDE_STACKS') !== 'false',
    maxPayloadSizeBytes: Number(env('LOG_MAX_PAYLOAD_SIZE')) || 8192,
    format: format === 'json' ? 'json' : 'pretty',
    filePath: file ? file : DEFAULT_LOG_FILE,
  };
}

/**
 * Parse LOG_CATEGORY_LEVELS.
 * Format: "graph=TRACE,source=DEBUG"
 */
export function parseCategoryLevels(raw: string | undefined): Partial<Record<LogCategory, LogLevel>> {
  if (!raw) return {};
  const categories: string[] = Object.values(LogCategory);
  const result: Partial<Record<LogCategory, LogLevel>> = {};
  for (const pair of raw.split(',')) {
    const [cat, level] = pair.trim().split('=');
    if (!cat || !level) continue;
    const name = cat.trim();
    if (isLogCategory(name, categories)) {
      result[name] = parseLogLevel(level.trim());
    }
  }
  return result;
}

function isLogCategory(value: string, categories: string[]): value is LogCategory {
  return categories.includes(value);
}
