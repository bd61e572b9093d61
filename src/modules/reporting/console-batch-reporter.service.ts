import { Injectable } from '@nestjs/common';
import type { BatchReporter, ProgressUpdate, ReportLevel } from '../../domain/ports/batch-reporter.interface';
import { ProvisioningLogger } from '../logging/provisioning-logger.service';
import { LogCategory } from '../logging/log-levels';
import { ProgressRenderer } from '../progress/progress-renderer.service';

/**
 * Operator-facing BatchReporter: log events go through the ProvisioningLogger
 * (log file + console), status lines to stdout, progress to the terminal bar.
 */
@Injectable()
export class ConsoleBatchReporter implements BatchReporter {
  constructor(
    private readonly logger: ProvisioningLogger,
    private readonly renderer: ProgressRenderer,
  ) {}

  log(level: ReportLevel, message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.renderer.clear();
    if (level === 'ERROR') {
      this.logger.error(LogCategory.PROVISION, message, error, data);
    } else {
      this.logger.info(LogCategory.PROVISION, message, data);
    }
  }

  status(line: string): void {
    this.renderer.clear();
    process.stdout.write(line + '\n');
  }

  progress(update: ProgressUpdate): void {
    this.renderer.render(update);
  }
}
