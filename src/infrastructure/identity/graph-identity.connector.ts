import { Inject, Injectable, Optional } from '@nestjs/common';
import {
  ClientSecretCredential,
  DefaultAzureCredential,
  DeviceCodeCredential,
  type DeviceCodeInfo,
  type TokenCredential,
} from '@azure/identity';
import type { IIdentityConnector, IIdentitySession } from '../../domain/ports/identity-session.interface';
import { GRAPH_FETCH, PROVISIONING_CONFIG } from '../../domain/ports/provisioning.tokens';
import { AuthError } from '../../domain/errors/provisioning-errors';
import type { GraphConfig, ProvisioningConfig } from '../../modules/config/provisioning.config';
import { ProvisioningLogger } from '../../modules/logging/provisioning-logger.service';
import { LogCategory } from '../../modules/logging/log-levels';
import { GraphIdentitySession, type FetchLike } from './graph-identity.session';

/**
 * GraphIdentityConnector — establishes the one Graph session a run uses.
 *
 * Credential by GRAPH_AUTH_MODE:
 *   device-code   → DeviceCodeCredential, delegated scopes (User.ReadWrite.All)
 *   client-secret → ClientSecretCredential, app-only `.default` scope
 *   default       → DefaultAzureCredential (managed identity, Azure CLI, env), `.default` scope
 */
@Injectable()
export class GraphIdentityConnector implements IIdentityConnector {
  private readonly graph: GraphConfig;

  constructor(
    @Inject(PROVISIONING_CONFIG) config: ProvisioningConfig,
    private readonly logger: ProvisioningLogger,
    @Optional() @Inject(GRAPH_FETCH) private readonly fetchImpl?: FetchLike,
  ) {
    this.graph = config.graph;
  }

  async connect(scopes: readonly string[]): Promise<IIdentitySession> {
    const tokenScopes = this.resolveScopes(scopes);
    this.logger.debug(LogCategory.AUTH, 'Requesting access token', {
      authMode: this.graph.authMode,
      tenantId: this.graph.tenantId,
      scopes: tokenScopes,
    });

    let token: string;
    try {
      const accessToken = await this.createCredential().getToken(tokenScopes);
      if (!accessToken) {
        throw new AuthError('Identity provider returned no access token');
      }
      token = accessToken.token;
    } catch (err) {
      if (err instanceof AuthError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new AuthError(`Could not sign in to Microsoft Graph: ${reason}`, { cause: err });
    }

    this.logger.debug(LogCategory.AUTH, 'Connected to Microsoft Graph', { baseUrl: this.graph.baseUrl });
    return new GraphIdentitySession(token, this.graph.baseUrl, this.logger, this.fetchImpl);
  }

  /** Delegated sign-in asks for the named permissions; app-only asks for `.default`. */
  resolveScopes(scopes: readonly string[]): string[] {
    if (this.graph.authMode === 'device-code') {
      return scopes.map((scope) => `${this.graph.baseUrl}/${scope}`);
    }
    return [`${this.graph.baseUrl}/.default`];
  }

  private createCredential(): TokenCredential {
    const { authMode, tenantId, clientId, clientSecret } = this.graph;
    switch (authMode) {
      case 'client-secret':
        if (!clientId || !clientSecret) {
          throw new AuthError('Client id and secret are required for client-secret sign-in');
        }
        return new ClientSecretCredential(tenantId, clientId, clientSecret);
      case 'default':
        return new DefaultAzureCredential();
      case 'device-code':
        return new DeviceCodeCredential({
          tenantId,
          clientId,
          userPromptCallback: (info: DeviceCodeInfo) => {
            // The sign-in prompt is for the operator, not the log trail.
            // eslint-disable-next-line no-console
            console.warn(info.message);
          },
        });
    }
  }
}
