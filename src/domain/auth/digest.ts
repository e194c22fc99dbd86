import { argon2id, hash, verify } from 'argon2';

/**
 * One-way password hashing. `validate` resolves false on any mismatch and
 * never rejects for a bad candidate or a malformed stored hash.
 */
export interface Digest {
  generate(password: string): Promise<string>;
  validate(storedHash: string, candidatePassword: string): Promise<boolean>;
}

export interface Argon2DigestOptions {
  /** Iterations. Default 3. */
  timeCost?: number;
  /** Memory in KiB. Default 65536. */
  memoryCost?: number;
  parallelism?: number;
}

/**
 * Argon2id digest with a random salt per password.
 */
export class Argon2Digest implements Digest {
  private readonly options: Required<Argon2DigestOptions>;

  constructor(options: Argon2DigestOptions = {}) {
    this.options = {
      timeCost: options.timeCost ?? 3,
      memoryCost: options.memoryCost ?? 65536,
      parallelism: options.parallelism ?? 4,
    };
  }

  async generate(password: string): Promise<string> {
    return await hash(password, { type: argon2id, ...this.options });
  }

  async validate(storedHash: string, candidatePassword: string): Promise<boolean> {
    if (!storedHash) {
      return false;
    }
    try {
      return await verify(storedHash, candidatePassword);
    } catch {
      return false;
    }
  }
}
