import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@faretrack/shared';

const logger = createLogger({ name: 'api:health' });

interface HealthRouteDeps {
  checkDatabase: () => Promise<void>;
}

export function registerHealthRoutes(app: FastifyInstance, deps: HealthRouteDeps): void {
  app.get('/api/health', async () => {
    return { status: 'healthy' };
  });

  app.get('/api/db-check', async () => {
    try {
      await deps.checkDatabase();
    } catch (err) {
      logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Database check failed');
      throw new AppError(ErrorCode.SERVICE_UNAVAILABLE, 'Database check failed', {
        database_status: 'unhealthy',
      });
    }
    return { database_status: 'healthy' };
  });
}
