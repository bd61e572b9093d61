import { Module } from '@nestjs/common';

import { RECORD_SOURCE } from '../../domain/ports/provisioning.tokens';
import { CsvRecordSource } from './csv-record-source';

@Module({
  providers: [{ provide: RECORD_SOURCE, useClass: CsvRecordSource }],
  exports: [RECORD_SOURCE],
})
export class RecordSourceModule {}
