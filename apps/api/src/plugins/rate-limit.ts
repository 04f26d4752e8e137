import { type FastifyRequest, type FastifyReply } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@faretrack/shared';

const logger = createLogger({ name: 'api:rate-limit' });

export interface RateLimitOptions {
  windowMs: number;
  maxRequests: number;
}

interface RateWindow {
  count: number;
  resetAt: number;
}

/**
 * Throttles the account routes per client IP in fixed windows.
 * The API runs as a single process, so the windows are kept in memory.
 */
export function createRateLimiter(opts: RateLimitOptions) {
  const windows = new Map<string, RateWindow>();

  setInterval(() => {
    const now = Date.now();
    for (const [ip, entry] of windows) {
      if (entry.resetAt <= now) windows.delete(ip);
    }
  }, opts.windowMs).unref();

  /** Counts one request; returns the seconds to wait when over the limit, else null. */
  function consume(ip: string, now: number): number | null {
    const current = windows.get(ip);
    const entry = current && current.resetAt > now ? current : { count: 0, resetAt: now + opts.windowMs };
    entry.count += 1;
    windows.set(ip, entry);
    return entry.count > opts.maxRequests ? Math.ceil((entry.resetAt - now) / 1000) : null;
  }

  return async function rateLimit(request: FastifyRequest, reply: FastifyReply) {
    const retryAfterSeconds = consume(request.ip, Date.now());
    if (retryAfterSeconds === null) return;

    logger.warn({ requestId: request.id, route: request.url, retryAfterSeconds }, 'Rate limit exceeded');
    reply.header('Retry-After', String(retryAfterSeconds));
    throw new AppError(ErrorCode.RATE_LIMITED, 'Too many requests, please try again later', {
      retryAfterSeconds,
    });
  };
}
