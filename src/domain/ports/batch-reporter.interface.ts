/**
 * BatchReporter — log, status and progress sink for the batch loop.
 *
 * Implementations:
 *   - ConsoleBatchReporter (log file + console + terminal progress bar)
 */
export type ReportLevel = 'INFO' | 'ERROR';

export interface ProgressUpdate {
  activity: string;
  status: string;
  /** 0–100, two decimals. */
  percent: number;
  currentOperation: string;
  completed: boolean;
}

export interface BatchReporter {
  log(level: ReportLevel, message: string, error?: unknown, data?: Record<string, unknown>): void;

  /** Plain operator status line; not part of the log trail. */
  status(line: string): void;

  progress(update: ProgressUpdate): void;
}
