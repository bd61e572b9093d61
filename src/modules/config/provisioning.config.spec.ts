import { ConfigurationError } from '../../domain/errors/provisioning-errors';
import { LogLevel } from '../logging/log-levels';
import {
  buildProvisioningConfig,
  DEFAULT_GRAPH_BASE_URL,
  DEFAULT_THROTTLE_DELAY_MS,
  DEFAULT_THROTTLE_EVERY,
} from './provisioning.config';

function envOf(values: Record<string, string>) {
  return (key: string): string | undefined => values[key];
}

describe('buildProvisioningConfig', () => {
  it('should default to device-code sign-in, 20/3000ms throttling and INFO logging', () => {
    const config = buildProvisioningConfig(envOf({}));
    expect(config.graph).toEqual({
      authMode: 'device-code',
      tenantId: 'organizations',
      clientId: undefined,
      clientSecret: undefined,
      baseUrl: DEFAULT_GRAPH_BASE_URL,
    });
    expect(config.throttle).toEqual({ every: DEFAULT_THROTTLE_EVERY, delayMs: DEFAULT_THROTTLE_DELAY_MS });
    expect(config.throttle).toEqual({ every: 20, delayMs: 3000 });
    expect(config.logging.globalLevel).toBe(LogLevel.INFO);
  });

  it('should accept client-secret mode with all three settings', () => {
    const config = buildProvisioningConfig(
      envOf({
        GRAPH_AUTH_MODE: 'Client-Secret',
        GRAPH_TENANT_ID: 'tenant-1',
        GRAPH_CLIENT_ID: 'client-1',
        GRAPH_CLIENT_SECRET: 'test-secret',
      }),
    );
    expect(config.graph).toMatchObject({
      authMode: 'client-secret',
      tenantId: 'tenant-1',
      clientId: 'client-1',
      clientSecret: 'test-secret',
    });
  });

  it('should reject client-secret mode without a secret', () => {
    expect(() =>
      buildProvisioningConfig(envOf({ GRAPH_AUTH_MODE: 'client-secret', GRAPH_TENANT_ID: 't', GRAPH_CLIENT_ID: 'c' })),
    ).toThrow(ConfigurationError);
  });

  it('should reject an unknown auth mode', () => {
    expect(() => buildProvisioningConfig(envOf({ GRAPH_AUTH_MODE: 'password' }))).toThrow(
      'GRAPH_AUTH_MODE must be one of device-code, client-secret, default (got "password")',
    );
  });

  it('should strip trailing slashes from the Graph base URL', () => {
    const config = buildProvisioningConfig(envOf({ GRAPH_BASE_URL: 'https://graph.microsoft.us//' }));
    expect(config.graph.baseUrl).toBe('https://graph.microsoft.us');
  });

  it('should read throttle overrides, allowing 0 to disable pauses', () => {
    const config = buildProvisioningConfig(
      envOf({ PROVISION_THROTTLE_EVERY: '0', PROVISION_THROTTLE_DELAY_MS: '500' }),
    );
    expect(config.throttle).toEqual({ every: 0, delayMs: 500 });
  });

  it('should reject negative or fractional throttle values', () => {
    expect(() => buildProvisioningConfig(envOf({ PROVISION_THROTTLE_EVERY: '-5' }))).toThrow(
      'PROVISION_THROTTLE_EVERY must be a non-negative integer (got "-5")',
    );
    expect(() => buildProvisioningConfig(envOf({ PROVISION_THROTTLE_DELAY_MS: '1.5' }))).toThrow(ConfigurationError);
  });

  it('should pass the same lookup to the log configuration', () => {
    const config = buildProvisioningConfig(envOf({ PROVISION_LOG_FILE: 'out/run.log', LOG_LEVEL: 'ERROR' }));
    expect(config.logging.filePath).toBe('out/run.log');
    expect(config.logging.globalLevel).toBe(LogLevel.ERROR);
  });
});
