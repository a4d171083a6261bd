import { Password } from '../../domain/auth/password.js';
import { User } from '../../domain/auth/user.js';
import { UserRepo } from '../../infra/db/userRepo.js';
import { DuplicateUsernameError } from '../errors.js';

const DUMMY_PASSWORD = 'not-a-real-password';

/**
 * Users and their Argon2 password hashes.
 */
export class CredentialStore {
  private dummyHash: Promise<string> | null = null;

  constructor(private userRepo: UserRepo) {
    this.prepareDummyHash();
  }

  async createUser(username: string, plaintextPassword: string): Promise<User> {
    const existing = await this.userRepo.findByUsername(username);
    if (existing) {
      throw new DuplicateUsernameError(username);
    }

    const passwordHash = await Password.hash(plaintextPassword);
    return this.userRepo.create(username, passwordHash);
  }

  async hasUser(username: string): Promise<boolean> {
    return (await this.userRepo.findByUsername(username)) !== null;
  }

  /**
   * Resolve the user when the password matches, null otherwise.
   * Unknown usernames still pay for one hash verification.
   */
  async verify(username: string, plaintextPassword: string): Promise<User | null> {
    const user = await this.userRepo.findByUsername(username);
    if (!user) {
      await Password.verify(plaintextPassword, await this.getDummyHash());
      return null;
    }

    const isValid = await Password.verify(plaintextPassword, user.passwordHash);
    return isValid ? user : null;
  }

  private getDummyHash(): Promise<string> {
    return this.dummyHash ?? this.prepareDummyHash();
  }

  /**
   * Hash the dummy password ahead of the first unknown-user login. A failed
   * hash is dropped so the next call tries again.
   */
  private prepareDummyHash(): Promise<string> {
    const pending = Password.hash(DUMMY_PASSWORD);
    this.dummyHash = pending;
    pending.catch((error: unknown) => {
      console.error('Failed to prepare dummy password hash:', error);
      if (this.dummyHash === pending) {
        this.dummyHash = null;
      }
    });
    return pending;
  }
}
