import { Module } from '@nestjs/common';

import { BATCH_REPORTER } from '../../domain/ports/provisioning.tokens';
import { ProgressModule } from '../progress/progress.module';
import { ConsoleBatchReporter } from './console-batch-reporter.service';

@Module({
  imports: [ProgressModule],
  providers: [{ provide: BATCH_REPORTER, useClass: ConsoleBatchReporter }],
  exports: [BATCH_REPORTER],
})
export class ReportingModule {}
