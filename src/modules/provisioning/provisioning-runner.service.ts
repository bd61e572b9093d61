import { Inject, Injectable } from '@nestjs/common';
import type { IIdentityConnector, IIdentitySession } from '../../domain/ports/identity-session.interface';
import type { IRecordSource } from '../../domain/ports/record-source.interface';
import type { UserRecord } from '../../domain/models/user-record.model';
import type { BatchSummary } from '../../domain/models/batch.model';
import { IDENTITY_CONNECTOR, RECORD_SOURCE } from '../../domain/ports/provisioning.tokens';
import { AuthError, ProvisioningError, SourceReadError } from '../../domain/errors/provisioning-errors';
import { ProvisioningLogger } from '../logging/provisioning-logger.service';
import { LogCategory } from '../logging/log-levels';
import { BatchProvisioner } from './batch-provisioner.service';

/** Permission the session needs to create accounts. */
export const REQUIRED_SCOPES: readonly string[] = ['User.ReadWrite.All'];

/**
 * ProvisioningRunner — one run of the tool: connect, read every record, then
 * hand both to the BatchProvisioner.
 *
 * Connect and read failures are fatal: logged once as ERROR and rethrown
 * before any record is attempted, so no summary is written.
 */
@Injectable()
export class ProvisioningRunner {
  constructor(
    @Inject(IDENTITY_CONNECTOR) private readonly connector: IIdentityConnector,
    @Inject(RECORD_SOURCE) private readonly recordSource: IRecordSource,
    private readonly provisioner: BatchProvisioner,
    private readonly logger: ProvisioningLogger,
  ) {}

  async execute(inputPath: string): Promise<BatchSummary> {
    const session = await this.connect();
    const records = await this.readRecords(inputPath);
    return this.provisioner.run(session, records);
  }

  private async connect(): Promise<IIdentitySession> {
    this.logger.debug(LogCategory.AUTH, 'Connecting to the identity service', { scopes: REQUIRED_SCOPES });
    try {
      return await this.connector.connect(REQUIRED_SCOPES);
    } catch (error) {
      this.logger.error(LogCategory.AUTH, 'Failed to connect to the identity service', error);
      if (error instanceof ProvisioningError) throw error;
      throw new AuthError('Failed to connect to the identity service', { cause: error });
    }
  }

  private async readRecords(inputPath: string): Promise<UserRecord[]> {
    this.logger.debug(LogCategory.SOURCE, `Reading user records from ${inputPath}`);
    try {
      return await this.recordSource.parse(inputPath);
    } catch (error) {
      this.logger.error(LogCategory.SOURCE, `Failed to read user records from ${inputPath}`, error);
      if (error instanceof ProvisioningError) throw error;
      throw new SourceReadError(`Failed to read user records from ${inputPath}`, { cause: error });
    }
  }
}
