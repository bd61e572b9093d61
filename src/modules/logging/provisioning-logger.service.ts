import { Inject, Injectable, Optional } from '@nestjs/common';
import { AsyncLocalStorage } from 'async_hooks';
import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { LOG_CONFIG } from '../../domain/ports/provisioning.tokens';
import {
  LogLevel,
  LogCategory,
  LogConfig,
  buildDefaultLogConfig,
  logLevelName,
} from './log-levels';

/**
 * Record context attached to every log entry emitted while one input row is
 * being provisioned.
 */
export interface RecordContext {
  rowNumber: number;
  userPrincipalName: string;
}

/**
 * A single structured log entry.
 * In JSON format mode these are emitted as one JSON line per entry.
 */
export interface StructuredLogEntry {
  /** ISO-8601 timestamp */
  timestamp: string;
  level: string;
  category: string;
  message: string;
  /** Input row being provisioned, when inside a record context */
  row?: number;
  userPrincipalName?: string;
  error?: {
    message: string;
    name?: string;
    stack?: string;
  };
  data?: Record<string, unknown>;
}

const recordStorage = new AsyncLocalStorage<RecordContext>();

/**
 * ProvisioningLogger — structured, leveled logger for a provisioning run.
 *
 * Entries that pass the level check go to the console (pretty or JSON) and to
 * the append-only log file as one `{timestamp} [{LEVEL}] {message}` line.
 * Per-record results (`provision` category, INFO and up) always reach the
 * file, whatever the configured levels, so the trail keeps one line per record.
 *
 * Usage:
 *   this.logger.info(LogCategory.PROVISION, 'Created user Jane Doe (jdoe@contoso.com)');
 *   this.logger.error(LogCategory.AUTH, 'Failed to connect to the identity service', err);
 *   this.logger.trace(LogCategory.GRAPH, 'Create user payload', { body });
 */
@Injectable()
export class ProvisioningLogger {
  private readonly config: LogConfig;

  private fileReady = false;
  private fileSinkFailed = false;

  constructor(@Optional() @Inject(LOG_CONFIG) config?: LogConfig) {
    const base = config ?? buildDefaultLogConfig();
    this.config = { ...base, categoryLevels: { ...base.categoryLevels } };
  }

  // ─── Record Context ───────────────────────────────────────────────

  /** Run a function with every log entry inside it tagged with the given record. */
  runWithContext<T>(ctx: RecordContext, fn: () => T): T {
    return recordStorage.run(ctx, fn);
  }

  // ─── Level-specific methods ───────────────────────────────────────

  trace(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.TRACE, category, message, data);
  }

  debug(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, category, message, data);
  }

  info(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, category, message, data);
  }

  warn(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, category, message, data);
  }

  error(category: LogCategory, message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, category, message, data, this.formatError(error));
  }

  // ─── Core logging logic ───────────────────────────────────────────

  private log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    data?: Record<string, unknown>,
    errorInfo?: StructuredLogEntry['error'],
  ): void {
    const enabled = this.isEnabled(level, category);
    if (!enabled && !isRecordTrail(level, category)) return;

    const ctx = recordStorage.getStore();
    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level: logLevelName(level),
      category,
      message,
    };

    if (ctx) {
      entry.row = ctx.rowNumber;
      entry.userPrincipalName = ctx.userPrincipalName;
    }

    if (errorInfo) {
      entry.error = errorInfo;
      if (!this.config.includeStackTraces) {
        delete entry.error.stack;
      }
    }

    if (data) {
      entry.data = this.sanitizeData(data);
    }

    this.appendToFile(entry);
    if (enabled) this.emit(level, entry);
  }

  private isEnabled(level: LogLevel, category: LogCategory): boolean {
    const override = this.config.categoryLevels[category];
    if (override !== undefined) return level >= override;
    return level >= this.config.globalLevel;
  }

  private formatError(error: unknown): StructuredLogEntry['error'] | undefined {
    if (error === undefined || error === null) return undefined;
    if (error instanceof Error) {
      return {
        message: error.message,
        name: error.name,
        stack: error.stack,
      };
    }
    return { message: String(error) };
  }

  /** Truncate large values and redact secrets. */
  private sanitizeData(data: Record<string, unknown>): Record<string, unknown> {
    const max = this.config.maxPayloadSizeBytes;
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (/secret|password|token|authorization|bearer/i.test(key)) {
        result[key] = '[REDACTED]';
        continue;
      }

      if (typeof value === 'string' && value.length > max) {
        result[key] = value.slice(0, max) + `...[truncated ${value.length - max}B]`;
      } else if (typeof value === 'object' && value !== null) {
        const serialized = JSON.stringify(value, (k, v: unknown) =>
          /secret|password|token|authorization|bearer/i.test(k) ? '[REDACTED]' : v,
        );
        result[key] = serialized.length > max ? serialized.slice(0, max) + '...[truncated]' : JSON.parse(serialized);
      } else {
        result[key] = value;
      }
    }
    return result;
  }

  // ─── Sinks ────────────────────────────────────────────────────────

  /** One line per entry; the file is only ever appended to. */
  private appendToFile(entry: StructuredLogEntry): void {
    const filePath = this.config.filePath;
    if (!filePath || this.fileSinkFailed) return;

    let line = `${entry.timestamp} [${entry.level}] ${entry.message}`;
    if (entry.error && !entry.message.includes(entry.error.message)) {
      line += ` | ${entry.error.message}`;
    }
    line = toSingleLine(line);

    try {
      if (!this.fileReady) {
        mkdirSync(dirname(filePath), { recursive: true });
        this.fileReady = true;
      }
      appendFileSync(filePath, line + '\n', 'utf8');
    } catch (e) {
      // Console output continues; report the broken sink once.
      this.fileSinkFailed = true;
      const reason = e instanceof Error ? e.message : String(e);
      process.stderr.write(`Log file ${filePath} is not writable: ${reason}\n`);
    }
  }

  private emit(level: LogLevel, entry: StructuredLogEntry): void {
    if (this.config.format === 'json') {
      this.emitJson(level, entry);
    } else {
      this.emitPretty(level, entry);
    }
  }

  private emitJson(level: LogLevel, entry: StructuredLogEntry): void {
    const line = JSON.stringify(entry) + '\n';
    if (level >= LogLevel.WARN) {
      process.stderr.write(line);
    } else {
      process.stdout.write(line);
    }
  }

  private emitPretty(level: LogLevel, entry: StructuredLogEntry): void {
    const ts = entry.timestamp.slice(11, 23); // HH:mm:ss.SSS
    const lvl = entry.level.padEnd(5);
    const cat = entry.category.padEnd(9);
    const row = entry.row !== undefined ? ` [row ${entry.row}]` : '';

    let line = `${ts} ${this.colorize(level, lvl)} ${cat}${row} ${entry.message}`;

    if (entry.error) {
      if (!entry.message.includes(entry.error.message)) {
        line += ` | ERROR: ${entry.error.message}`;
      }
    }

    if (entry.data && Object.keys(entry.data).length > 0) {
      if (level <= LogLevel.DEBUG) {
        line += `\n  ${JSON.stringify(entry.data, null, 2).replace(/\n/g, '\n  ')}`;
      } else {
        const compact = JSON.stringify(entry.data);
        if (compact.length <= 200) {
          line += ` | ${compact}`;
        }
      }
    }

    switch (level) {
      case LogLevel.TRACE:
      case LogLevel.DEBUG:
        // eslint-disable-next-line no-console
        console.debug(line);
        break;
      case LogLevel.INFO:
        // eslint-disable-next-line no-console
        console.log(line);
        break;
      case LogLevel.WARN:
        // eslint-disable-next-line no-console
        console.warn(line);
        break;
      default:
        // eslint-disable-next-line no-console
        console.error(line);
        break;
    }
  }

  /** ANSI colorize for terminal output. */
  private colorize(level: LogLevel, text: string): string {
    if (!process.stdout.isTTY) return text;
    switch (level) {
      case LogLevel.TRACE: return `\x1b[90m${text}\x1b[0m`;  // gray
      case LogLevel.DEBUG: return `\x1b[36m${text}\x1b[0m`;  // cyan
      case LogLevel.INFO:  return `\x1b[32m${text}\x1b[0m`;  // green
      case LogLevel.WARN:  return `\x1b[33m${text}\x1b[0m`;  // yellow
      case LogLevel.ERROR: return `\x1b[31m${text}\x1b[0m`;  // red
      default: return text;
    }
  }
}

function isRecordTrail(level: LogLevel, category: LogCategory): boolean {
  return category === LogCategory.PROVISION && level >= LogLevel.INFO && level < LogLevel.OFF;
}

/** Service messages can carry raw multi-line bodies; the file keeps one line per entry. */
function toSingleLine(text: string): string {
  return text.replace(/\s*\r?\n\s*/g, ' ');
}
