/**
 * NestJS injection tokens for the provisioning ports.
 *
 * Usage:
 *   @Inject(IDENTITY_CONNECTOR) private readonly connector: IIdentityConnector
 */
export const IDENTITY_CONNECTOR = 'IDENTITY_CONNECTOR';
export const RECORD_SOURCE = 'RECORD_SOURCE';
export const BATCH_REPORTER = 'BATCH_REPORTER';
export const PROVISIONING_CONFIG = 'PROVISIONING_CONFIG';
export const LOG_CONFIG = 'LOG_CONFIG';
export const GRAPH_FETCH = 'GRAPH_FETCH';
export const THROTTLE_DELAY = 'THROTTLE_DELAY';
export const PROGRESS_OUTPUT = 'PROGRESS_OUTPUT';
