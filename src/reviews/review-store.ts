/**
 * Review Store
 *
 * Redis + InMemory fallback for reviews. Redis keeps one JSON document per
 * review, an id set, a per-POS index set and a per-(POS, author) key that is
 * claimed with SET NX so a pair can only ever hold one review.
 */

import Redis from 'ioredis';
import { Review, ReviewStore } from './types';
import { Pos } from '../pos/types';
import { User } from '../users/types';
import { NotFoundError, duplicateReviewError } from '../common/errors';
import { logger } from '../observability/logger';

/** The subset of the ioredis client the review store issues commands through */
export type ReviewRedisClient = Pick<Redis, 'get' | 'mget' | 'set' | 'incr' | 'smembers' | 'multi'>;

const byId = (a: Review, b: Review): number => (a.id ?? 0) - (b.id ?? 0);

const samePair = (a: Review, b: Review): boolean =>
  a.pos.id === b.pos.id && a.author.id === b.author.id;

// ───── Redis Implementation ─────────────────────────────────────

export class RedisReviewStore implements ReviewStore {
  constructor(
    private readonly redis: ReviewRedisClient,
    private readonly prefix: string = 'campuscoffee:',
  ) {}

  private key(id: number): string {
    return `${this.prefix}review:${id}`;
  }

  private get idsKey(): string {
    return `${this.prefix}review:ids`;
  }

  private posIndexKey(posId: number): string {
    return `${this.prefix}review:pos:${posId}`;
  }

  private pairKey(posId: number, authorId: number): string {
    return `${this.prefix}review:pos:${posId}:author:${authorId}`;
  }

  /** Reserve the (POS, author) pair; fails if another review holds it */
  private async claimPair(review: Review): Promise<void> {
    const claimed = await this.redis.set(this.pairKey(review.pos.id, review.author.id), 'pending', 'NX');
    if (claimed === null) {
      throw duplicateReviewError(review.author.id, review.pos.id);
    }
  }

  private async load(ids: string[]): Promise<Review[]> {
    if (ids.length === 0) return [];
    const raws = await this.redis.mget(ids.map((id) => this.key(Number(id))));
    const reviews: Review[] = [];
    for (const raw of raws) {
      if (raw) reviews.push(JSON.parse(raw) as Review);
    }
    return reviews.sort(byId);
  }

  async getAll(): Promise<Review[]> {
    return this.load(await this.redis.smembers(this.idsKey));
  }

  async getById(id: number): Promise<Review> {
    const raw = await this.redis.get(this.key(id));
    if (!raw) throw new NotFoundError('Review', id);
    return JSON.parse(raw) as Review;
  }

  async upsert(review: Review): Promise<Review> {
    const now = new Date().toISOString();
    let id: number;
    let createdAt: string | undefined = now;
    let previous: Review | null = null;

    if (review.id === null) {
      await this.claimPair(review);
      id = await this.redis.incr(`${this.prefix}review:seq`);
    } else {
      previous = await this.getById(review.id);
      if (!samePair(previous, review)) {
        await this.claimPair(review);
      }
      id = review.id;
      createdAt = previous.createdAt;
    }

    const saved: Review = { ...review, id, createdAt, updatedAt: now };
    const tx = this.redis.multi()
      .set(this.key(id), JSON.stringify(saved))
      .set(this.pairKey(saved.pos.id, saved.author.id), String(id))
      .sadd(this.idsKey, String(id))
      .sadd(this.posIndexKey(saved.pos.id), String(id));
    if (previous && !samePair(previous, saved)) {
      tx.del(this.pairKey(previous.pos.id, previous.author.id));
      if (previous.pos.id !== saved.pos.id) {
        tx.srem(this.posIndexKey(previous.pos.id), String(id));
      }
    }
    await tx.exec();
    return saved;
  }

  async delete(id: number): Promise<void> {
    const existing = await this.getById(id);
    await this.redis.multi()
      .del(this.key(id))
      .del(this.pairKey(existing.pos.id, existing.author.id))
      .srem(this.idsKey, String(id))
      .srem(this.posIndexKey(existing.pos.id), String(id))
      .exec();
  }

  async filterByApproval(pos: Pos, approved: boolean): Promise<Review[]> {
    const reviews = await this.load(await this.redis.smembers(this.posIndexKey(pos.id)));
    return reviews.filter((r) => r.approved === approved);
  }

  async filterByAuthor(pos: Pos, author: User): Promise<Review[]> {
    const reviews = await this.load(await this.redis.smembers(this.posIndexKey(pos.id)));
    return reviews.filter((r) => r.author.id === author.id);
  }
}

// ───── In-Memory Implementation ─────────────────────────────────

export class InMemoryReviewStore implements ReviewStore {
  private readonly reviews = new Map<number, Review>();
  private nextId = 1;

  async getAll(): Promise<Review[]> {
    return Array.from(this.reviews.values(), (r) => ({ ...r })).sort(byId);
  }

  async getById(id: number): Promise<Review> {
    const review = this.reviews.get(id);
    if (!review) throw new NotFoundError('Review', id);
    return { ...review };
  }

  // Synchronous from lookup to write, so overlapping creates cannot both pass
  async upsert(review: Review): Promise<Review> {
    const now = new Date().toISOString();
    const existing = review.id === null ? undefined : this.reviews.get(review.id);
    if (review.id !== null && !existing) throw new NotFoundError('Review', review.id);

    for (const other of this.reviews.values()) {
      if (other.id !== review.id && samePair(other, review)) {
        throw duplicateReviewError(review.author.id, review.pos.id);
      }
    }

    const id = review.id ?? this.nextId++;
    const saved: Review = { ...review, id, createdAt: existing?.createdAt ?? now, updatedAt: now };
    this.reviews.set(id, saved);
    return { ...saved };
  }

  async delete(id: number): Promise<void> {
    if (!this.reviews.delete(id)) throw new NotFoundError('Review', id);
  }

  async filterByApproval(pos: Pos, approved: boolean): Promise<Review[]> {
    return (await this.getAll()).filter((r) => r.pos.id === pos.id && r.approved === approved);
  }

  async filterByAuthor(pos: Pos, author: User): Promise<Review[]> {
    return (await this.getAll()).filter((r) => r.pos.id === pos.id && r.author.id === author.id);
  }
}

// ───── Factory ──────────────────────────────────────────────────

export function createReviewStore(redis?: Redis, prefix?: string): ReviewStore {
  if (redis) {
    logger.info('Review store: Redis-backed');
    return new RedisReviewStore(redis, prefix);
  }
  logger.info('Review store: In-memory');
  return new InMemoryReviewStore();
}
