/**
 * POS Store
 */

import Redis from 'ioredis';
import { Pos, PosStore } from './types';
import { NotFoundError } from '../common/errors';
import { logger } from '../observability/logger';

// ───── Redis Implementation ─────────────────────────────────────

export class RedisPosStore implements PosStore {
  constructor(
    private readonly redis: Pick<Redis, 'get' | 'set'>,
    private readonly prefix: string,
  ) {}

  async getById(id: number): Promise<Pos> {
    const raw = await this.redis.get(`${this.prefix}pos:${id}`);
    if (!raw) throw new NotFoundError('Pos', id);
    return JSON.parse(raw) as Pos;
  }

  async save(pos: Pos): Promise<Pos> {
    await this.redis.set(`${this.prefix}pos:${pos.id}`, JSON.stringify(pos));
    return pos;
  }
}

// ───── In-Memory Implementation ─────────────────────────────────

export class InMemoryPosStore implements PosStore {
  private readonly entries = new Map<number, Pos>();

  async getById(id: number): Promise<Pos> {
    const pos = this.entries.get(id);
    if (!pos) throw new NotFoundError('Pos', id);
    return { ...pos };
  }

  async save(pos: Pos): Promise<Pos> {
    this.entries.set(pos.id, { ...pos });
    return pos;
  }
}

// ───── Factory ──────────────────────────────────────────────────

export function createPosStore(redis?: Redis, prefix = 'campuscoffee:'): PosStore {
  if (redis) {
    logger.info('POS store: Redis-backed');
    return new RedisPosStore(redis, prefix);
  }
  logger.info('POS store: In-memory');
  return new InMemoryPosStore();
}
