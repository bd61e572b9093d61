import type { CreateUserRequest, UserRecord } from '../../domain/models/user-record.model';

/**
 * Local part of a principal name: everything before the first '@'.
 * A value without '@' is returned whole; the identity service then rejects
 * the principal name and the row fails like any other service error.
 */
export function deriveMailNickname(userPrincipalName: string): string {
  const at = userPrincipalName.indexOf('@');
  return at === -1 ? userPrincipalName : userPrincipalName.slice(0, at);
}

export function buildCreateUserRequest(record: UserRecord): CreateUserRequest {
  return Object.freeze({
    accountEnabled: true,
    displayName: record.displayName,
    mailNickname: deriveMailNickname(record.userPrincipalName),
    userPrincipalName: record.userPrincipalName,
    passwordProfile: Object.freeze({
      password: record.password,
      forceChangePasswordNextSignIn: true,
    }),
    givenName: record.givenName,
    surname: record.surname,
    jobTitle: record.jobTitle,
    department: record.department,
    usageLocation: record.usageLocation,
    officeLocation: record.officeLocation,
    city: record.city,
    state: record.state,
    country: record.country,
    postalCode: record.postalCode,
  } as const);
}
