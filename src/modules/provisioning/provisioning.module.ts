import { Module } from '@nestjs/common';

import { IdentityModule } from '../../infrastructure/identity/identity.module';
import { RecordSourceModule } from '../../infrastructure/record-source/record-source.module';
import { ReportingModule } from '../reporting/reporting.module';
import { BatchProvisioner } from './batch-provisioner.service';
import { ProvisioningRunner } from './provisioning-runner.service';

@Module({
  imports: [IdentityModule, RecordSourceModule, ReportingModule],
  providers: [BatchProvisioner, ProvisioningRunner],
  exports: [ProvisioningRunner],
})
export class ProvisioningModule {}
