import { Global, Module } from '@nestjs/common';

import { ProvisioningLogger } from './provisioning-logger.service';

@Global()
@Module({
  providers: [ProvisioningLogger],
  exports: [ProvisioningLogger],
})
export class LoggingModule {}
