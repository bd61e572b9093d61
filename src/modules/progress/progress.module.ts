import { Module } from '@nestjs/common';

import { ProgressRenderer } from './progress-renderer.service';

@Module({
  providers: [ProgressRenderer],
  exports: [ProgressRenderer],
})
export class ProgressModule {}
