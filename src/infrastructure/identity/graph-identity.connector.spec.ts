const mockGetToken = jest.fn();

jest.mock('@azure/identity', () => ({
  ClientSecretCredential: jest.fn().mockImplementation(() => ({ getToken: mockGetToken })),
  DefaultAzureCredential: jest.fn().mockImplementation(() => ({ getToken: mockGetToken })),
  DeviceCodeCredential: jest.fn().mockImplementation(() => ({ getToken: mockGetToken })),
}));

import { Test, TestingModule } from '@nestjs/testing';
import { ClientSecretCredential, DefaultAzureCredential, DeviceCodeCredential } from '@azure/identity';
import { GraphIdentityConnector } from './graph-identity.connector';
import { GraphIdentitySession, type FetchLike } from './graph-identity.session';
import { GRAPH_FETCH, PROVISIONING_CONFIG } from '../../domain/ports/provisioning.tokens';
import { AuthError } from '../../domain/errors/provisioning-errors';
import { ProvisioningLogger } from '../../modules/logging/provisioning-logger.service';
import { buildProvisioningConfig, type ProvisioningConfig } from '../../modules/config/provisioning.config';

describe('GraphIdentityConnector', () => {
  const mockLogger = {
    trace: jest.fn(),
    debug: jest.fn(),
    info: jest.fn(),
  };
  const fetchMock = jest.fn<ReturnType<FetchLike>, Parameters<FetchLike>>();

  async function createConnector(env: Record<string, string>): Promise<GraphIdentityConnector> {
    const config: ProvisioningConfig = buildProvisioningConfig((key) => env[key]);
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        GraphIdentityConnector,
        { provide: PROVISIONING_CONFIG, useValue: config },
        { provide: ProvisioningLogger, useValue: mockLogger },
        { provide: GRAPH_FETCH, useValue: fetchMock },
      ],
    }).compile();
    return module.get(GraphIdentityConnector);
  }

  beforeEach(() => {
    jest.clearAllMocks();
    mockGetToken.mockResolvedValue({ token: 'test-token', expiresOnTimestamp: Date.now() + 3_600_000 });
  });

  it('should sign in with a device code for the delegated scopes by default', async () => {
    const connector = await createConnector({ GRAPH_TENANT_ID: 'tenant-1' });

    const session = await connector.connect(['User.ReadWrite.All']);

    expect(session).toBeInstanceOf(GraphIdentitySession);
    expect(DeviceCodeCredential).toHaveBeenCalledWith(
      expect.objectContaining({ tenantId: 'tenant-1', clientId: undefined }),
    );
    expect(mockGetToken).toHaveBeenCalledWith(['https://graph.microsoft.com/User.ReadWrite.All']);
  });

  it('should use client credentials and the .default scope in client-secret mode', async () => {
    const connector = await createConnector({
      GRAPH_AUTH_MODE: 'client-secret',
      GRAPH_TENANT_ID: 'tenant-1',
      GRAPH_CLIENT_ID: 'client-1',
      GRAPH_CLIENT_SECRET: 'test-secret',
    });

    await connector.connect(['User.ReadWrite.All']);

    expect(ClientSecretCredential).toHaveBeenCalledWith('tenant-1', 'client-1', 'test-secret');
    expect(mockGetToken).toHaveBeenCalledWith(['https://graph.microsoft.com/.default']);
  });

  it('should use the default credential chain in default mode', async () => {
    const connector = await createConnector({ GRAPH_AUTH_MODE: 'default', GRAPH_BASE_URL: 'https://graph.microsoft.us' });

    await connector.connect(['User.ReadWrite.All']);

    expect(DefaultAzureCredential).toHaveBeenCalledTimes(1);
    expect(mockGetToken).toHaveBeenCalledWith(['https://graph.microsoft.us/.default']);
  });

  it('should hand the acquired token and fetch to the session', async () => {
    fetchMock.mockResolvedValue(new Response(JSON.stringify({ id: 'user-1' }), { status: 201 }));
    const connector = await createConnector({});

    const session = await connector.connect(['User.ReadWrite.All']);
    await session.createUser({
      accountEnabled: true,
      displayName: 'Jane Doe',
      mailNickname: 'jdoe',
      userPrincipalName: 'jdoe@contoso.com',
      passwordProfile: { password: 'test-password', forceChangePasswordNextSignIn: true },
      givenName: '',
      surname: '',
      jobTitle: '',
      department: '',
      usageLocation: '',
      officeLocation: '',
      city: '',
      state: '',
      country: '',
      postalCode: '',
    });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://graph.microsoft.com/v1.0/users');
    expect(init.headers).toMatchObject({ Authorization: 'Bearer test-token' });
  });

  it('should fail with AuthError when sign-in is rejected', async () => {
    mockGetToken.mockRejectedValue(new Error('AADSTS50126: Invalid username or password'));
    const connector = await createConnector({});

    const err = await connector.connect(['User.ReadWrite.All']).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AuthError);
    expect(err).toMatchObject({
      message: 'Could not sign in to Microsoft Graph: AADSTS50126: Invalid username or password',
    });
  });

  it('should fail with AuthError when no token is returned', async () => {
    mockGetToken.mockResolvedValue(null);
    const connector = await createConnector({});

    await expect(connector.connect(['User.ReadWrite.All'])).rejects.toThrow(
      new AuthError('Identity provider returned no access token'),
    );
  });

  it('should route the device code prompt to the console', async () => {
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation();
    const connector = await createConnector({});
    await connector.connect(['User.ReadWrite.All']);

    const [[options]] = jest.mocked(DeviceCodeCredential).mock.calls;
    options?.userPromptCallback?.({
      userCode: 'ABC123',
      verificationUri: 'https://microsoft.com/devicelogin',
      message: 'To sign in, enter the code ABC123',
    });

    expect(warnSpy).toHaveBeenCalledWith('To sign in, enter the code ABC123');
    expect(mockLogger.info).not.toHaveBeenCalled();
    expect(mockLogger.debug).not.toHaveBeenCalledWith(expect.anything(), 'To sign in, enter the code ABC123');
    warnSpy.mockRestore();
  });
});
