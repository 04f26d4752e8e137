import Fastify, { type FastifyInstance } from 'fastify';
import { createLogger } from '@faretrack/shared';
import { type AuthService, type FlightCache, type FlightService } from '@faretrack/domain';
import { registerErrorHandler } from './plugins/error-handler';
import { createRateLimiter, type RateLimitOptions } from './plugins/rate-limit';
import { registerAuthRoutes } from './routes/auth';
import { registerFlightRoutes } from './routes/flights';
import { registerHealthRoutes } from './routes/health';

const logger = createLogger({ name: 'api' });

export interface ServerDeps {
  authService: AuthService;
  flightService: FlightService;
  /** The one cache instance the search service appends to. */
  flightCache: FlightCache;
  checkDatabase: () => Promise<void>;
  authRateLimit?: RateLimitOptions;
}

export function buildServer(deps: ServerDeps): FastifyInstance {
  const app = Fastify({
    logger: false,
    bodyLimit: 65_536,
  });

  registerErrorHandler(app);

  const authRateLimit = createRateLimiter(deps.authRateLimit ?? { windowMs: 60_000, maxRequests: 20 });

  registerHealthRoutes(app, { checkDatabase: deps.checkDatabase });
  registerAuthRoutes(app, { authService: deps.authService, authRateLimit });
  registerFlightRoutes(app, { flightService: deps.flightService, flightCache: deps.flightCache });

  app.addHook('onRequest', (request, _reply, done) => {
    logger.info(
      { method: request.method, url: request.url, requestId: request.id },
      'Incoming request',
    );
    done();
  });

  app.addHook('onResponse', (request, reply, done) => {
    logger.info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        requestId: request.id,
        durationMs: Math.round(reply.elapsedTime),
      },
      'Request completed',
    );
    done();
  });

  return app;
}
