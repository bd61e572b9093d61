import { Module } from '@nestjs/common';

import { IDENTITY_CONNECTOR } from '../../domain/ports/provisioning.tokens';
import { GraphIdentityConnector } from './graph-identity.connector';

@Module({
  providers: [{ provide: IDENTITY_CONNECTOR, useClass: GraphIdentityConnector }],
  exports: [IDENTITY_CONNECTOR],
})
export class IdentityModule {}
