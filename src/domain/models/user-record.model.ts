/**
 * Domain model for one row of the bulk-provisioning input file.
 *
 * Records are produced once by a record source, read-only thereafter, and
 * dropped after the create attempt for that row completes.
 */
export interface UserRecord {
  /** 1-based data row number in the source file (header excluded). */
  readonly rowNumber: number;
  readonly displayName: string;
  /** Expected as "local@domain"; passed through unvalidated. */
  readonly userPrincipalName: string;
  readonly password: string;
  readonly givenName: string;
  readonly surname: string;
  readonly jobTitle: string;
  readonly department: string;
  readonly usageLocation: string;
  readonly officeLocation: string;
  readonly city: string;
  readonly state: string;
  readonly country: string;
  readonly postalCode: string;
}

export interface PasswordProfile {
  readonly password: string;
  readonly forceChangePasswordNextSignIn: true;
}

/**
 * Create-account payload sent to the identity service.
 * Built by `buildCreateUserRequest`; instances are frozen.
 */
export interface CreateUserRequest {
  readonly accountEnabled: true;
  readonly displayName: string;
  readonly mailNickname: string;
  readonly userPrincipalName: string;
  readonly passwordProfile: PasswordProfile;
  readonly givenName: string;
  readonly surname: string;
  readonly jobTitle: string;
  readonly department: string;
  readonly usageLocation: string;
  readonly officeLocation: string;
  readonly city: string;
  readonly state: string;
  readonly country: string;
  readonly postalCode: string;
}

/** Identity-service view of an account it just created. */
export interface CreatedUser {
  id: string;
  userPrincipalName: string;
}
