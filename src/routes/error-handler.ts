import { FastifyError, FastifyInstance } from 'fastify';
import { DomainError } from '../errors';
import { logger } from '../observability/logger';

export function registerErrorHandler(app: FastifyInstance): void {
  const log = logger.child({ component: 'http' });

  app.setErrorHandler((error: FastifyError, req, reply) => {
    // Domain errors already have status codes
    if (error instanceof DomainError) {
      if (error.statusCode >= 500) {
        log.error({ err: error, requestId: req.id, url: req.url }, 'Request failed');
      }
      return reply.status(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          statusCode: error.statusCode,
        },
        timestamp: new Date().toISOString(),
      });
    }

    // Schema validation failures from route definitions
    if (error.validation) {
      return reply.status(400).send({
        error: {
          code: 'VALIDATION_ERROR',
          message: error.message,
          statusCode: 400,
        },
        timestamp: new Date().toISOString(),
      });
    }

    // Malformed JSON and other client errors raised by Fastify itself
    if (error.statusCode && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: {
          code: error.code || 'BAD_REQUEST',
          message: error.message,
          statusCode: error.statusCode,
        },
        timestamp: new Date().toISOString(),
      });
    }

    log.error({ err: error, requestId: req.id, url: req.url }, 'Unhandled error');
    return reply.status(500).send({
      error: {
        code: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
        statusCode: 500,
      },
      timestamp: new Date().toISOString(),
    });
  });

  app.setNotFoundHandler((req, reply) => {
    return reply.status(404).send({
      error: {
        code: 'ROUTE_NOT_FOUND',
        message: `Route ${req.method} ${req.url} not found`,
        statusCode: 404,
      },
      timestamp: new Date().toISOString(),
    });
  });
}
