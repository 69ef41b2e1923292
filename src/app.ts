import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import Redis from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import { env } from './config/env';
import { ApprovalConfiguration, loadApprovalConfiguration } from './config/approval-config';
import { logger } from './observability/logger';
import { registerErrorHandler } from './common/error-handler';
import { registerHealthRoutes } from './health/health-routes';
import { createReviewStore } from './reviews/review-store';
import { ReviewService } from './reviews/review-service';
import { registerReviewRoutes } from './reviews/review-routes';
import { ReviewStore } from './reviews/types';
import { createUserStore } from './users/user-store';
import { UserStore } from './users/types';
import { createPosStore } from './pos/pos-store';
import { PosStore } from './pos/types';
import { applySeed, readSeedFile } from './seed/seed-loader';

export interface AppOptions {
  /** `null` forces in-memory stores; omitted means connect according to env */
  redis?: Redis | null;
  approval?: ApprovalConfiguration;
  seedDataPath?: string;
}

export interface AppStores {
  reviews: ReviewStore;
  users: UserStore;
  pos: PosStore;
}

export interface AppContext {
  app: FastifyInstance;
  redis?: Redis;
  stores: AppStores;
  reviewService: ReviewService;
}

async function connectRedis(): Promise<Redis | undefined> {
  if (!env.redis.enabled) {
    logger.info('Redis disabled; using in-memory stores');
    return undefined;
  }

  const redisInstance = new Redis(env.redis.url, {
    maxRetriesPerRequest: 3,
    retryStrategy(times) {
      if (times > 5) return null; // stop retrying
      return Math.min(times * 200, 2000);
    },
    lazyConnect: true,
  });
  // Attach error handler BEFORE connect to prevent unhandled error events
  redisInstance.on('error', (err) => {
    logger.debug({ err: err.message }, 'Redis connection error (handled)');
  });

  try {
    await redisInstance.connect();
    logger.info('Redis connected');
    return redisInstance;
  } catch (err) {
    logger.warn({ err }, 'Redis not available; using in-memory fallback');
    redisInstance.disconnect();
    return undefined;
  }
}

export async function buildApp(options: AppOptions = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    bodyLimit: 1_048_576, // 1 MB
    genReqId: () => uuidv4(),
  });

  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE'],
  });

  // Request timing
  app.addHook('onResponse', (req, reply, done) => {
    logger.debug({
      requestId: req.id,
      method: req.method,
      route: req.routeOptions.url ?? req.url,
      statusCode: reply.statusCode,
      elapsedMs: Math.round(reply.elapsedTime),
    }, 'Request completed');
    done();
  });

  registerErrorHandler(app);

  const redis = options.redis === undefined ? await connectRedis() : options.redis ?? undefined;
  const approval = options.approval ?? loadApprovalConfiguration(env.approval.minCount);

  const stores: AppStores = {
    reviews: createReviewStore(redis, env.redis.keyPrefix),
    users: createUserStore(redis, env.redis.keyPrefix),
    pos: createPosStore(redis, env.redis.keyPrefix),
  };

  const seedDataPath = options.seedDataPath ?? env.seedDataPath;
  if (seedDataPath) {
    await applySeed(readSeedFile(seedDataPath), stores.users, stores.pos);
  }

  const reviewService = new ReviewService(stores.reviews, stores.users, stores.pos, approval);
  logger.info({ minCount: approval.minCount }, 'Review service initialized');

  registerHealthRoutes(app, redis);
  registerReviewRoutes(app, reviewService, stores.users);

  return { app, redis, stores, reviewService };
}
