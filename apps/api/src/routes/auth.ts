import { type FastifyInstance } from 'fastify';
import { type ZodError } from 'zod';
import { AppError, ErrorCode } from '@faretrack/shared';
import { AuthError, type AuthErrorKind, type AuthService } from '@faretrack/domain';
import {
  CreateAccountRequestSchema,
  LoginRequestSchema,
  UpdatePasswordRequestSchema,
} from '@faretrack/proto';
import { type createRateLimiter } from '../plugins/rate-limit';

interface AuthRouteDeps {
  authService: AuthService;
  authRateLimit: ReturnType<typeof createRateLimiter>;
}

const AUTH_ERROR_CODES: Record<AuthErrorKind, ErrorCode> = {
  DUPLICATE_USERNAME: ErrorCode.CONFLICT,
  INVALID_CREDENTIALS: ErrorCode.UNAUTHORIZED,
  USER_NOT_FOUND: ErrorCode.NOT_FOUND,
  INVALID_CURRENT_PASSWORD: ErrorCode.UNAUTHORIZED,
  VALIDATION: ErrorCode.VALIDATION,
};

function mapAuthError(err: unknown): never {
  if (err instanceof AuthError) {
    throw new AppError(AUTH_ERROR_CODES[err.kind], err.message);
  }
  throw err;
}

function validationError(message: string, error: ZodError): AppError {
  return new AppError(ErrorCode.VALIDATION, message, {
    issues: error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
  });
}

export function registerAuthRoutes(app: FastifyInstance, deps: AuthRouteDeps): void {
  const { authService, authRateLimit } = deps;

  app.post('/create-account', { preHandler: [authRateLimit] }, async (request, reply) => {
    const parsed = CreateAccountRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      throw validationError('Username and password are required', parsed.error);
    }

    try {
      await authService.createAccount(parsed.data);
      return reply.status(201).send({ message: 'Account created successfully' });
    } catch (err) {
      return mapAuthError(err);
    }
  });

  app.post('/login', { preHandler: [authRateLimit] }, async (request, reply) => {
    const parsed = LoginRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      throw validationError('Username and password are required', parsed.error);
    }

    try {
      await authService.login(parsed.data);
      return reply.status(200).send({ message: 'Login successful' });
    } catch (err) {
      return mapAuthError(err);
    }
  });

  app.put('/update-password', { preHandler: [authRateLimit] }, async (request, reply) => {
    const parsed = UpdatePasswordRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      throw validationError('All fields are required', parsed.error);
    }

    try {
      await authService.updatePassword({
        username: parsed.data.username,
        currentPassword: parsed.data.current_password,
        newPassword: parsed.data.new_password,
      });
      return reply.status(200).send({ message: 'Password updated successfully' });
    } catch (err) {
      return mapAuthError(err);
    }
  });
}
