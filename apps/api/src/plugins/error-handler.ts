import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@faretrack/shared';

const logger = createLogger({ name: 'api:error' });

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      logger.warn(
        { code: error.code, requestId: request.id, ...error.safeMeta },
        error.message,
      );
      return reply.status(error.httpStatus).send(error.toJSON());
    }

    // Fastify's own request errors (malformed JSON, unsupported media type).
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      logger.warn({ code: error.code, requestId: request.id }, error.message);
      return reply.status(error.statusCode).send({
        error: error.message,
        code: ErrorCode.BAD_REQUEST,
      });
    }

    logger.error({ err: error.message, requestId: request.id }, 'Unhandled error');

    return reply.status(500).send({
      error: 'Internal server error',
      code: ErrorCode.INTERNAL,
    });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      error: `Route ${request.method} ${request.url} not found`,
      code: ErrorCode.NOT_FOUND,
    });
  });
}
