import { type User } from './user';

export interface UserRepository {
  /** Returns null when the username is already taken. */
  create(
    tx: unknown,
    user: { username: string; salt: Uint8Array; hashedPassword: Uint8Array },
  ): Promise<User | null>;
  findByUsername(tx: unknown, username: string): Promise<User | null>;
  updateCredentials(
    tx: unknown,
    id: string,
    credentials: { salt: Uint8Array; hashedPassword: Uint8Array },
  ): Promise<void>;
}

export interface PasswordHasher {
  generateSalt(): Uint8Array;
  hash(password: string, salt: Uint8Array): Promise<Uint8Array>;
  verify(password: string, salt: Uint8Array, digest: Uint8Array): Promise<boolean>;
}
