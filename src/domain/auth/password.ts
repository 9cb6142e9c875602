import { hash, verify } from 'argon2';
import { createHash, timingSafeEqual } from 'crypto';

export const PASSWORD_HASH_MODES = ['argon2', 'sha256'] as const;

export type PasswordHashMode = (typeof PASSWORD_HASH_MODES)[number];

const ARGON2_PREFIX = '$argon2';
const SHA256_HEX = /^[0-9a-f]{64}$/;

/**
 * Password hashing.
 * argon2 is the default. sha256 is an unsalted single-round digest kept for
 * directory files written with it.
 */
export class Password {
  /**
   * Hash a plain text password with the given mode.
   */
  static async hash(
    plainPassword: string,
    mode: PasswordHashMode = 'argon2'
  ): Promise<string> {
    if (mode === 'sha256') {
      return Password.sha256(plainPassword);
    }
    return await hash(plainPassword);
  }

  /**
   * Verify a plain password against a stored hash.
   * The algorithm is taken from the stored hash, not from the configured mode.
   */
  static async verify(plainPassword: string, storedHash: string): Promise<boolean> {
    if (storedHash.startsWith(ARGON2_PREFIX)) {
      try {
        return await verify(storedHash, plainPassword);
      } catch {
        return false;
      }
    }

    if (!SHA256_HEX.test(storedHash)) {
      return false;
    }

    const expected = Buffer.from(storedHash, 'hex');
    const actual = Buffer.from(Password.sha256(plainPassword), 'hex');
    return timingSafeEqual(expected, actual);
  }

  static sha256(plainPassword: string): string {
    return createHash('sha256').update(plainPassword, 'utf8').digest('hex');
  }
}

/**
 * Algorithm a stored hash was produced with.
 */
export function hashModeOf(storedHash: string): PasswordHashMode {
  return storedHash.startsWith(ARGON2_PREFIX) ? 'argon2' : 'sha256';
}

/**
 * Hashing seam used by the directory store.
 */
export interface PasswordHasher {
  hash(plainPassword: string): Promise<string>;
  verify(plainPassword: string, storedHash: string): Promise<boolean>;
}

export function createPasswordHasher(mode: PasswordHashMode): PasswordHasher {
  return {
    hash: (plainPassword) => Password.hash(plainPassword, mode),
    verify: (plainPassword, storedHash) => Password.verify(plainPassword, storedHash),
  };
}
