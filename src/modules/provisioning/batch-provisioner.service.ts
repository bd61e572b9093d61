import { Inject, Injectable, Optional } from '@nestjs/common';
import { setTimeout as sleep } from 'node:timers/promises';
import type { BatchReporter } from '../../domain/ports/batch-reporter.interface';
import type { IIdentitySession } from '../../domain/ports/identity-session.interface';
import type { UserRecord } from '../../domain/models/user-record.model';
import type { BatchProgress, BatchSummary, ProvisionOutcome } from '../../domain/models/batch.model';
import { BATCH_REPORTER, PROVISIONING_CONFIG, THROTTLE_DELAY } from '../../domain/ports/provisioning.tokens';
import { describeError } from '../../domain/errors/provisioning-errors';
import type { ProvisioningConfig, ThrottleConfig } from '../config/provisioning.config';
import { ProvisioningLogger } from '../logging/provisioning-logger.service';
import { LogCategory } from '../logging/log-levels';
import { buildCreateUserRequest } from './create-user-request';

export type DelayFn = (ms: number) => Promise<unknown>;

export const PROGRESS_ACTIVITY = 'Creating users';

/** round(created / total × 100, 2); 0 for an empty batch. */
export function percentComplete(progress: BatchProgress): number {
  if (progress.totalCount === 0) return 0;
  return Math.round((progress.createdCount / progress.totalCount) * 10_000) / 100;
}

/** True when the success count just reached a positive multiple of `every`. */
export function shouldThrottle(createdCount: number, every: number): boolean {
  return every > 0 && createdCount > 0 && createdCount % every === 0;
}

/**
 * BatchProvisioner — creates one account per record, strictly in input order.
 *
 * A failure on one record is reported and the loop moves on; the only thing
 * a caller learns about failures is the summary counts and the log trail.
 * After every `throttle.every`-th successful creation the loop pauses for
 * `throttle.delayMs`.
 */
@Injectable()
export class BatchProvisioner {
  private readonly throttle: ThrottleConfig;

  constructor(
    @Inject(BATCH_REPORTER) private readonly reporter: BatchReporter,
    @Inject(PROVISIONING_CONFIG) config: ProvisioningConfig,
    private readonly logger: ProvisioningLogger,
    @Optional() @Inject(THROTTLE_DELAY) private readonly delay: DelayFn = sleep,
  ) {
    this.throttle = config.throttle;
  }

  async run(session: IIdentitySession, records: readonly UserRecord[]): Promise<BatchSummary> {
    const startedAt = new Date();
    const progress: BatchProgress = { totalCount: records.length, createdCount: 0 };

    for (const record of records) {
      const percent = percentComplete(progress);
      this.reporter.progress({
        activity: PROGRESS_ACTIVITY,
        status: `${percent}% Complete`,
        percent,
        currentOperation: `Creating user: ${record.displayName}`,
        completed: false,
      });

      const outcome = await this.provisionRecord(session, record);
      if (outcome.status === 'created') {
        progress.createdCount++;
      }
      this.reportOutcome(outcome);
      this.reporter.status(`Created ${progress.createdCount} out of ${progress.totalCount} users`);

      if (outcome.status === 'created' && shouldThrottle(progress.createdCount, this.throttle.every)) {
        this.logger.debug(LogCategory.PROVISION, `Pausing ${this.throttle.delayMs}ms after ${progress.createdCount} created users`);
        await this.delay(this.throttle.delayMs);
      }
    }

    this.reporter.progress({
      activity: PROGRESS_ACTIVITY,
      status: '100% Complete',
      percent: 100,
      currentOperation: 'Completed creating all users',
      completed: true,
    });
    this.reporter.log(
      'INFO',
      `Completed creating ${progress.createdCount} users out of ${progress.totalCount} users.`,
    );

    const endedAt = new Date();
    return {
      totalCount: progress.totalCount,
      createdCount: progress.createdCount,
      failedCount: progress.totalCount - progress.createdCount,
      startedAt,
      endedAt,
      durationMs: endedAt.getTime() - startedAt.getTime(),
    };
  }

  /** One create attempt. Never rejects: every error becomes a failed outcome. */
  async provisionRecord(session: IIdentitySession, record: UserRecord): Promise<ProvisionOutcome> {
    const context = { rowNumber: record.rowNumber, userPrincipalName: record.userPrincipalName };
    return this.logger.runWithContext(context, async (): Promise<ProvisionOutcome> => {
      try {
        const created = await session.createUser(buildCreateUserRequest(record));
        return { status: 'created', record, userId: created.id };
      } catch (error) {
        return { status: 'failed', record, reason: describeError(error), error };
      }
    });
  }

  private reportOutcome(outcome: ProvisionOutcome): void {
    const { displayName, userPrincipalName, rowNumber } = outcome.record;
    if (outcome.status === 'created') {
      this.reporter.log('INFO', `Created user ${displayName} (${userPrincipalName})`, undefined, {
        row: rowNumber,
        userId: outcome.userId,
      });
    } else {
      this.reporter.log(
        'ERROR',
        `Failed to create user ${displayName} (${userPrincipalName}): ${outcome.reason}`,
        outcome.error,
        { row: rowNumber },
      );
    }
  }
}
