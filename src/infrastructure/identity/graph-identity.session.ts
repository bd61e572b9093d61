/**
 * GraphIdentitySession — IIdentitySession over the Microsoft Graph REST API.
 *
 * Holds the access token acquired at connect time. The token is never
 * refreshed; once it expires every create call fails with 401 and the
 * batch reports those rows as failed.
 */
import type { IIdentitySession } from '../../domain/ports/identity-session.interface';
import type { CreateUserRequest, CreatedUser } from '../../domain/models/user-record.model';
import { IdentityServiceError } from '../../domain/errors/provisioning-errors';
import { ProvisioningLogger } from '../../modules/logging/provisioning-logger.service';
import { LogCategory } from '../../modules/logging/log-levels';

/** Raw error bodies (gateway pages) are cut to this many characters. */
export const MAX_ERROR_BODY_LENGTH = 300;

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

/** Graph error envelope: { error: { code, message, innerError: { 'request-id' } } } */
interface GraphErrorBody {
  error?: {
    code?: string;
    message?: string;
    innerError?: Record<string, unknown>;
  };
}

/** Profile attributes Graph accepts as absent but not as empty strings. */
const OPTIONAL_PROFILE_FIELDS = [
  'givenName',
  'surname',
  'jobTitle',
  'department',
  'usageLocation',
  'officeLocation',
  'city',
  'state',
  'country',
  'postalCode',
] as const;

export class GraphIdentitySession implements IIdentitySession {
  private readonly usersUrl: string;

  constructor(
    private readonly accessToken: string,
    baseUrl: string,
    private readonly logger: ProvisioningLogger,
    private readonly fetchImpl: FetchLike = fetch,
  ) {
    this.usersUrl = `${baseUrl}/v1.0/users`;
  }

  async createUser(request: CreateUserRequest): Promise<CreatedUser> {
    const body = toGraphUserBody(request);
    this.logger.trace(LogCategory.GRAPH, 'POST /v1.0/users', { body });

    let response: Response;
    try {
      response = await this.fetchImpl(this.usersUrl, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.accessToken}`,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: JSON.stringify(body),
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new IdentityServiceError(reason, { status: 0, cause: err });
    }

    const text = await response.text();
    this.logger.debug(LogCategory.GRAPH, `POST /v1.0/users → ${response.status}`);

    if (!response.ok) {
      throw toServiceError(response, text);
    }

    const created = parseJson(text);
    const id = readString(created, 'id');
    if (!id) {
      throw new IdentityServiceError('Identity service response did not include the new user id', {
        status: response.status,
      });
    }
    return { id, userPrincipalName: readString(created, 'userPrincipalName') ?? request.userPrincipalName };
  }
}

/** Graph wire shape; empty optional attributes are left out. */
export function toGraphUserBody(request: CreateUserRequest): Record<string, unknown> {
  const body: Record<string, unknown> = {
    accountEnabled: request.accountEnabled,
    displayName: request.displayName,
    mailNickname: request.mailNickname,
    userPrincipalName: request.userPrincipalName,
    passwordProfile: {
      password: request.passwordProfile.password,
      forceChangePasswordNextSignIn: request.passwordProfile.forceChangePasswordNextSignIn,
    },
  };
  for (const field of OPTIONAL_PROFILE_FIELDS) {
    const value = request[field];
    if (value !== '') body[field] = value;
  }
  return body;
}

function toServiceError(response: Response, text: string): IdentityServiceError {
  const parsed = parseJson(text);
  const graphError = isGraphErrorBody(parsed) ? parsed.error : undefined;
  const requestId =
    readString(graphError?.innerError, 'request-id') ?? response.headers.get('request-id') ?? undefined;
  const message = graphError?.message || summarizeBody(text) || `HTTP ${response.status} ${response.statusText}`.trim();
  return new IdentityServiceError(message, {
    status: response.status,
    code: graphError?.code,
    requestId,
  });
}

function summarizeBody(text: string): string {
  const body = text.trim().replace(/\s*\r?\n\s*/g, ' ');
  return body.length > MAX_ERROR_BODY_LENGTH ? `${body.slice(0, MAX_ERROR_BODY_LENGTH)}...[truncated]` : body;
}

function parseJson(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function isGraphErrorBody(value: unknown): value is GraphErrorBody {
  return typeof value === 'object' && value !== null && 'error' in value;
}

function readString(source: unknown, key: string): string | undefined {
  if (typeof source !== 'object' || source === null) return undefined;
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : undefined;
}
