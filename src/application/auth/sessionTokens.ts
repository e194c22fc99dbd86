import jwt from 'jsonwebtoken';
import { z } from 'zod';
import type { UserId } from '../../domain/auth/user.js';

/**
 * Binds the opaque session cookie value to a user id.
 */
export interface SessionTokens {
  issue(userId: UserId): string;
  /** User id carried by `token`, or null when it is invalid or expired. */
  resolve(token: string): UserId | null;
}

const sessionPayload = z.object({
  sub: z.string().min(1),
  idType: z.enum(['string', 'number']),
});

/**
 * Signed, self-contained session tokens. Nothing is stored server side;
 * logging out only removes the cookie.
 */
export class JwtSessionTokens implements SessionTokens {
  constructor(
    private readonly secret: string,
    private readonly ttlSeconds: number
  ) {}

  issue(userId: UserId): string {
    return jwt.sign({ idType: typeof userId === 'number' ? 'number' : 'string' }, this.secret, {
      subject: String(userId),
      expiresIn: this.ttlSeconds,
    });
  }

  resolve(token: string): UserId | null {
    let decoded: unknown;
    try {
      decoded = jwt.verify(token, this.secret);
    } catch {
      return null;
    }

    const payload = sessionPayload.safeParse(decoded);
    if (!payload.success) {
      return null;
    }
    if (payload.data.idType === 'string') {
      return payload.data.sub;
    }
    const numericId = Number(payload.data.sub);
    return Number.isFinite(numericId) ? numericId : null;
  }
}
