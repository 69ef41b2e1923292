/**
 * Review Routes
 *
 * HTTP surface of the review service. Service errors are thrown through to
 * the app-level error handler, which maps them to 404 / 400.
 */

import { FastifyInstance, FastifyReply } from 'fastify';
import { ValidateFunction } from 'ajv';
import { ReviewService } from './review-service';
import { UserStore } from '../users/types';
import {
  describeErrors,
  validateApproveQuery,
  validateCreateReview,
  validateFilterQuery,
  validateReviewId,
  validateUpdateReview,
} from './review-schemas';
import { logger } from '../observability/logger';

function rejectInvalid(reply: FastifyReply, validate: ValidateFunction): FastifyReply {
  return reply.status(400).send({ error: 'Invalid request', details: describeErrors(validate) });
}

export function registerReviewRoutes(
  app: FastifyInstance,
  service: ReviewService,
  userStore: UserStore,
): void {
  /** List all reviews */
  app.get('/api/reviews', async (_req, reply) => {
    return reply.send(await service.getAll());
  });

  /** Reviews of one POS filtered by approval state */
  app.get('/api/reviews/filter', async (req, reply) => {
    const query = req.query;
    if (!validateFilterQuery(query)) return rejectInvalid(reply, validateFilterQuery);

    return reply.send(await service.filter(query.pos_id, query.approved));
  });

  app.get('/api/reviews/:id', async (req, reply) => {
    const params = req.params;
    if (!validateReviewId(params)) return rejectInvalid(reply, validateReviewId);

    return reply.send(await service.getById(params.id));
  });

  /** Submit a new review; it starts without approvals */
  app.post('/api/reviews', async (req, reply) => {
    const body = req.body;
    if (!validateCreateReview(body)) return rejectInvalid(reply, validateCreateReview);

    // The service resolves and checks the POS; only the author is loaded here
    const author = await userStore.getById(body.authorId);
    const created = await service.upsert({
      id: null,
      pos: { id: body.posId },
      author,
      review: body.review,
      approvalCount: 0,
      approved: false,
    });
    return reply.status(201).send(created);
  });

  /** Edit the text of a review; author, POS and approvals are kept */
  app.put('/api/reviews/:id', async (req, reply) => {
    const params = req.params;
    if (!validateReviewId(params)) return rejectInvalid(reply, validateReviewId);
    const body = req.body;
    if (!validateUpdateReview(body)) return rejectInvalid(reply, validateUpdateReview);

    const existing = await service.getById(params.id);
    const updated = await service.upsert({ ...existing, review: body.review });
    return reply.send(updated);
  });

  app.delete('/api/reviews/:id', async (req, reply) => {
    const params = req.params;
    if (!validateReviewId(params)) return rejectInvalid(reply, validateReviewId);

    await service.delete(params.id);
    return reply.status(204).send();
  });

  /** Approve a review on behalf of `user_id` */
  app.put('/api/reviews/:id/approve', async (req, reply) => {
    const params = req.params;
    if (!validateReviewId(params)) return rejectInvalid(reply, validateReviewId);
    const query = req.query;
    if (!validateApproveQuery(query)) return rejectInvalid(reply, validateApproveQuery);

    // approve() looks up the approver first, then the persisted review
    return reply.send(await service.approve({ id: params.id }, query.user_id));
  });

  logger.info('Review routes registered');
}
