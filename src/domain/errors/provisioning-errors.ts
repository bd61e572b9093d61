/**
 * Error taxonomy for a provisioning run.
 *
 * Fatal (abort before any record is processed): AuthError, SourceReadError,
 * ConfigurationError. Recoverable (one record fails, the batch continues):
 * IdentityServiceError.
 */
export class ProvisioningError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class AuthError extends ProvisioningError {}

export class SourceReadError extends ProvisioningError {}

export class ConfigurationError extends ProvisioningError {}

export interface IdentityServiceErrorDetails {
  /** HTTP status; 0 when no response was received. */
  status: number;
  code?: string;
  requestId?: string;
  cause?: unknown;
}

/** Raised by an identity session when the service rejects or cannot be reached. */
export class IdentityServiceError extends ProvisioningError {
  readonly status: number;
  readonly code?: string;
  readonly requestId?: string;

  constructor(message: string, details: IdentityServiceErrorDetails) {
    super(message, { cause: details.cause });
    this.status = details.status;
    this.code = details.code;
    this.requestId = details.requestId;
  }
}

/** Best-effort human-readable detail for any thrown value. */
export function describeError(error: unknown): string {
  if (error instanceof IdentityServiceError) {
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
