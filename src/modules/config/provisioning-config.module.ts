import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LOG_CONFIG, PROVISIONING_CONFIG } from '../../domain/ports/provisioning.tokens';
import { buildProvisioningConfig, type ProvisioningConfig } from './provisioning.config';

@Global()
@Module({
  providers: [
    {
      provide: PROVISIONING_CONFIG,
      inject: [ConfigService],
      useFactory: (config: ConfigService): ProvisioningConfig =>
        buildProvisioningConfig((key) => config.get<string>(key)),
    },
    {
      provide: LOG_CONFIG,
      inject: [PROVISIONING_CONFIG],
      useFactory: (config: ProvisioningConfig) => config.logging,
    },
  ],
  exports: [PROVISIONING_CONFIG, LOG_CONFIG],
})
export class ProvisioningConfigModule {}
