import { FastifyInstance } from 'fastify';
import { NotFoundError, ValidationError } from './errors';
import { childLogger } from '../observability/logger';

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err, req, reply) => {
    const log = childLogger(req.id, { method: req.method, url: req.url });

    if (err instanceof NotFoundError) {
      log.info({ entity: err.entity, id: err.id }, 'Referenced entity not found');
      return reply.status(404).send({ error: err.message, entity: err.entity, id: err.id });
    }

    if (err instanceof ValidationError) {
      log.info({ reason: err.message }, 'Request rejected');
      return reply.status(400).send({ error: err.message });
    }

    // Fastify's own client errors (malformed JSON, unsupported media type)
    if (err.statusCode && err.statusCode < 500) {
      return reply.status(err.statusCode).send({ error: err.message });
    }

    log.error({ err }, 'Unhandled error');
    return reply.status(500).send({ error: 'Internal server error' });
  });
}
