/**
 * User domain entity (minimal for auth).
 * The username is unique and never changes after creation.
 */
export interface User {
  readonly id: number;
  readonly username: string;
  readonly passwordHash: string;
}

/**
 * What a valid session resolves to.
 */
export interface UserIdentity {
  readonly userId: number;
  readonly username: string;
  readonly sessionId: string;
}
