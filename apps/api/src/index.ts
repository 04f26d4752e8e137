import { buildServer } from './server';
import {
  loadConfig,
  ApiConfigSchema,
  createLogger,
  Argon2PasswordHasher,
  AmadeusFlightProvider,
} from '@faretrack/shared';
import { AuthService, FlightCache, FlightService } from '@faretrack/domain';
import { initPool, closePool, withTransaction, checkDatabase, PgUserRepository } from '@faretrack/db';

const logger = createLogger({ name: 'api' });

async function main() {
  const config = loadConfig(ApiConfigSchema);

  initPool({ connectionString: config.DATABASE_URL });

  const authService = new AuthService({
    userRepo: new PgUserRepository(),
    passwordHasher: new Argon2PasswordHasher(),
    withTransaction,
  });

  const flightCache = new FlightCache();
  const flightService = new FlightService({
    provider: new AmadeusFlightProvider({
      baseUrl: config.AMADEUS_BASE_URL,
      apiKey: config.AMADEUS_API_KEY,
      apiSecret: config.AMADEUS_API_SECRET,
      timeoutMs: config.PROVIDER_TIMEOUT_MS,
    }),
    cache: flightCache,
  });

  const app = buildServer({
    authService,
    flightService,
    flightCache,
    checkDatabase,
    authRateLimit: { windowMs: 60_000, maxRequests: config.AUTH_RATE_LIMIT_PER_MINUTE },
  });

  await app.listen({ host: config.API_HOST, port: config.API_PORT });
  logger.info({ port: config.API_PORT, env: config.NODE_ENV }, 'API server started');

  const shutdown = async () => {
    logger.info({}, 'Shutting down API server');
    await app.close();
    await closePool();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start API');
  process.exit(1);
});
