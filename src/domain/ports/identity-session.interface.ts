/**
 * Identity service ports.
 *
 * Implementations:
 *   - GraphIdentityConnector / GraphIdentitySession (Microsoft Graph via @azure/identity)
 */
import type { CreateUserRequest, CreatedUser } from '../models/user-record.model';

/** Authenticated handle, established once per run and never refreshed. */
export interface IIdentitySession {
  /**
   * Create one account. Rejects with the service's error for any failure
   * (duplicate principal name, invalid field, expired token, network fault).
   */
  createUser(request: CreateUserRequest): Promise<CreatedUser>;
}

export interface IIdentityConnector {
  /** Authenticate for the given permission scopes. Rejects with AuthError. */
  connect(scopes: readonly string[]): Promise<IIdentitySession>;
}
