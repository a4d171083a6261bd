import jwt, { type JwtPayload } from 'jsonwebtoken';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import { User, UserIdentity } from '../../domain/auth/user.js';
import { SessionRepo } from '../../infra/db/sessionRepo.js';
import { CredentialStore } from './credentialStore.js';
import { AuthenticationError, AuthorizationError } from '../errors.js';

const tokenPayloadSchema = z.object({
  sid: z.string().min(1),
  userId: z.number().int(),
  username: z.string(),
});

export interface LoginResult {
  token: string;
  user: Pick<User, 'id' | 'username'>;
}

export interface SessionAuthenticatorOptions {
  secret: string;
  ttlSeconds: number;
}

/**
 * Sessions are a signed JWT naming a row in the sessions table. The signature
 * proves the token was issued here; the row lets logout revoke it. Rows carry
 * the same lifetime as the token and expired ones are purged on each login.
 */
export class SessionAuthenticator {
  constructor(
    private credentials: CredentialStore,
    private sessions: SessionRepo,
    private options: SessionAuthenticatorOptions
  ) {}

  async login(username: string, password: string): Promise<LoginResult> {
    const user = await this.credentials.verify(username, password);
    if (!user) {
      throw new AuthenticationError();
    }

    const now = new Date();
    await this.sessions.deleteExpired(now);

    const expiresAt = new Date(now.getTime() + this.options.ttlSeconds * 1000);
    const session = await this.sessions.create(randomUUID(), user.id, expiresAt);
    const token = jwt.sign(
      {
        sid: session.id,
        userId: user.id,
        username: user.username,
      },
      this.options.secret,
      {
        expiresIn: this.options.ttlSeconds,
      }
    );

    return {
      token,
      user: { id: user.id, username: user.username },
    };
  }

  async requireSession(token: string | undefined): Promise<UserIdentity> {
    const identity = await this.findSession(token);
    if (!identity) {
      throw new AuthorizationError();
    }
    return identity;
  }

  /** Like requireSession, but resolves null instead of throwing. */
  async findSession(token: string | undefined): Promise<UserIdentity | null> {
    const payload = this.decode(token);
    if (!payload) {
      return null;
    }

    const session = await this.sessions.findById(payload.sid);
    if (!session || session.userId !== payload.userId) {
      return null;
    }

    return {
      userId: payload.userId,
      username: payload.username,
      sessionId: payload.sid,
    };
  }

  /** Revoke the session behind `token`. Unknown or invalid tokens are ignored. */
  async logout(token: string | undefined): Promise<void> {
    const payload = this.decode(token);
    if (payload) {
      await this.sessions.delete(payload.sid);
    }
  }

  private decode(token: string | undefined): z.infer<typeof tokenPayloadSchema> | null {
    if (!token) {
      return null;
    }

    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.options.secret);
    } catch (error) {
      if (error instanceof jwt.JsonWebTokenError) {
        return null;
      }
      throw error;
    }

    const parsed = tokenPayloadSchema.safeParse(decoded);
    return parsed.success ? parsed.data : null;
  }
}
