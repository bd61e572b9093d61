import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { ProvisioningConfigModule } from '../config/provisioning-config.module';
import { LoggingModule } from '../logging/logging.module';
import { ProvisioningModule } from '../provisioning/provisioning.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    ProvisioningConfigModule,
    LoggingModule,
    ProvisioningModule
  ]
})
export class AppModule {}
