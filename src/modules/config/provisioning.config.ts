import { ConfigurationError } from '../../domain/errors/provisioning-errors';
import { buildDefaultLogConfig, processEnv, type EnvLookup, type LogConfig } from '../logging/log-levels';

export const GRAPH_AUTH_MODES = ['device-code', 'client-secret', 'default'] as const;

export type GraphAuthMode = typeof GRAPH_AUTH_MODES[number];

export interface GraphConfig {
  /** How the session acquires its token. */
  authMode: GraphAuthMode;
  tenantId: string;
  /** Required for client-secret; optional for device-code (SDK public client is used). */
  clientId?: string;
  clientSecret?: string;
  /** Graph root without trailing slash, e.g. https://graph.microsoft.com */
  baseUrl: string;
}

export interface ThrottleConfig {
  /** Pause after every Nth successful creation; 0 disables throttling. */
  every: number;
  delayMs: number;
}

/**
 * Everything a run needs, assembled once at startup and injected under
 * PROVISIONING_CONFIG.
 */
export interface ProvisioningConfig {
  graph: GraphConfig;
  throttle: ThrottleConfig;
  logging: LogConfig;
}

export const DEFAULT_GRAPH_BASE_URL = 'https://graph.microsoft.com';
export const DEFAULT_THROTTLE_EVERY = 20;
export const DEFAULT_THROTTLE_DELAY_MS = 3000;

export function buildProvisioningConfig(env: EnvLookup = processEnv): ProvisioningConfig {
  return {
    graph: buildGraphConfig(env),
    throttle: {
      every: readNonNegativeInt(env, 'PROVISION_THROTTLE_EVERY', DEFAULT_THROTTLE_EVERY),
      delayMs: readNonNegativeInt(env, 'PROVISION_THROTTLE_DELAY_MS', DEFAULT_THROTTLE_DELAY_MS),
    },
    logging: buildDefaultLogConfig(env),
  };
}

function buildGraphConfig(env: EnvLookup): GraphConfig {
  const mode = (env('GRAPH_AUTH_MODE') ?? 'device-code').trim().toLowerCase();
  if (!isGraphAuthMode(mode)) {
    throw new ConfigurationError(
      `GRAPH_AUTH_MODE must be one of ${GRAPH_AUTH_MODES.join(', ')} (got "${mode}")`,
    );
  }

  const clientId = nonEmpty(env('GRAPH_CLIENT_ID'));
  const clientSecret = nonEmpty(env('GRAPH_CLIENT_SECRET'));
  const tenantId = nonEmpty(env('GRAPH_TENANT_ID'));

  if (mode === 'client-secret') {
    if (!tenantId || !clientId || !clientSecret) {
      throw new ConfigurationError(
        'GRAPH_TENANT_ID, GRAPH_CLIENT_ID and GRAPH_CLIENT_SECRET are required when GRAPH_AUTH_MODE=client-secret',
      );
    }
  }

  return {
    authMode: mode,
    tenantId: tenantId ?? 'organizations',
    clientId,
    clientSecret,
    baseUrl: (nonEmpty(env('GRAPH_BASE_URL')) ?? DEFAULT_GRAPH_BASE_URL).replace(/\/+$/, ''),
  };
}

function isGraphAuthMode(value: string): value is GraphAuthMode {
  return (GRAPH_AUTH_MODES as readonly string[]).includes(value);
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function readNonNegativeInt(env: EnvLookup, key: string, fallback: number): number {
  const raw = nonEmpty(env(key));
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${key} must be a non-negative integer (got "${raw}")`);
  }
  return value;
}
