import { type User, type UserSummary } from './user';
import { type UserRepository, type PasswordHasher } from './ports';

export interface AuthServiceDeps {
  userRepo: UserRepository;
  passwordHasher: PasswordHasher;
  withTransaction: <T>(fn: (tx: unknown) => Promise<T>) => Promise<T>;
}

export class AuthService {
  constructor(private readonly deps: AuthServiceDeps) {}

  async createAccount(input: { username: string; password: string }): Promise<UserSummary> {
    const { userRepo, passwordHasher } = this.deps;
    assertPresent(input.username, 'Username is required');
    assertPresent(input.password, 'Password is required');

    return this.deps.withTransaction(async (tx) => {
      const existing = await userRepo.findByUsername(tx, input.username);
      if (existing) {
        throw new AuthError('DUPLICATE_USERNAME', 'Username already exists');
      }

      const salt = passwordHasher.generateSalt();
      const hashedPassword = await passwordHasher.hash(input.password, salt);

      // The unique index still wins a race between two creates of the same name.
      const user = await userRepo.create(tx, { username: input.username, salt, hashedPassword });
      if (!user) {
        throw new AuthError('DUPLICATE_USERNAME', 'Username already exists');
      }

      return { id: user.id, username: user.username };
    });
  }

  async login(input: { username: string; password: string }): Promise<UserSummary> {
    return this.deps.withTransaction(async (tx) => {
      const user = await this.deps.userRepo.findByUsername(tx, input.username);
      if (!user) {
        throw new AuthError('INVALID_CREDENTIALS', 'Invalid username or password');
      }

      if (!(await this.verifyPassword(user, input.password))) {
        throw new AuthError('INVALID_CREDENTIALS', 'Invalid username or password');
      }

      return { id: user.id, username: user.username };
    });
  }

  async updatePassword(input: {
    username: string;
    currentPassword: string;
    newPassword: string;
  }): Promise<void> {
    const { userRepo, passwordHasher } = this.deps;
    assertPresent(input.newPassword, 'New password is required');

    return this.deps.withTransaction(async (tx) => {
      const user = await userRepo.findByUsername(tx, input.username);
      if (!user) {
        throw new AuthError('USER_NOT_FOUND', 'User not found');
      }

      if (!(await this.verifyPassword(user, input.currentPassword))) {
        throw new AuthError('INVALID_CURRENT_PASSWORD', 'Current password is incorrect');
      }

      const salt = passwordHasher.generateSalt();
      const hashedPassword = await passwordHasher.hash(input.newPassword, salt);
      await userRepo.updateCredentials(tx, user.id, { salt, hashedPassword });
    });
  }

  private async verifyPassword(user: User, password: string): Promise<boolean> {
    if (password.length === 0) return false;
    return this.deps.passwordHasher.verify(password, user.salt, user.hashedPassword);
  }
}

function assertPresent(value: string, message: string): void {
  if (value.length === 0) {
    throw new AuthError('VALIDATION', message);
  }
}

export type AuthErrorKind =
  | 'DUPLICATE_USERNAME'
  | 'INVALID_CREDENTIALS'
  | 'USER_NOT_FOUND'
  | 'INVALID_CURRENT_PASSWORD'
  | 'VALIDATION';

export class AuthError extends Error {
  constructor(
    public readonly kind: AuthErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'AuthError';
  }
}
