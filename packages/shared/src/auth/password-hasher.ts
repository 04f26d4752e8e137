import { randomBytes, timingSafeEqual } from 'node:crypto';
import { hashRaw } from '@node-rs/argon2';
import { type PasswordHasher } from '@faretrack/domain';

export const SALT_LENGTH = 32;

const ARGON2_OPTIONS = {
  memoryCost: 19456,
  timeCost: 2,
  outputLen: 32,
  parallelism: 1,
};

/**
 * Argon2id over an explicit per-user salt. The salt is stored beside the raw
 * digest rather than inside an encoded hash string.
 */
export class Argon2PasswordHasher implements PasswordHasher {
  generateSalt(): Uint8Array {
    return randomBytes(SALT_LENGTH);
  }

  async hash(password: string, salt: Uint8Array): Promise<Uint8Array> {
    return hashRaw(password, { ...ARGON2_OPTIONS, salt: Buffer.from(salt) });
  }

  async verify(password: string, salt: Uint8Array, digest: Uint8Array): Promise<boolean> {
    if (digest.length !== ARGON2_OPTIONS.outputLen) return false;
    const candidate = await this.hash(password, salt);
    return timingSafeEqual(candidate, digest);
  }
}
