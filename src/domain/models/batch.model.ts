import type { UserRecord } from './user-record.model';

/**
 * Result of a single create attempt. Exactly one per input record; a failed
 * outcome never aborts the batch.
 */
export type ProvisionOutcome =
  | { readonly status: 'created'; readonly record: UserRecord; readonly userId: string }
  | { readonly status: 'failed'; readonly record: UserRecord; readonly reason: string; readonly error: unknown };

/** Counters owned by the single batch loop. */
export interface BatchProgress {
  readonly totalCount: number;
  createdCount: number;
}

export interface BatchSummary {
  totalCount: number;
  createdCount: number;
  failedCount: number;
  startedAt: Date;
  endedAt: Date;
  durationMs: number;
}
