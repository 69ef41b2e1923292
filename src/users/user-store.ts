/**
 * User Store
 *
 * Read side of the user directory. `save` exists for seeding only; user
 * lifecycle is owned by another service.
 */

import Redis from 'ioredis';
import { User, UserStore } from './types';
import { NotFoundError } from '../common/errors';
import { logger } from '../observability/logger';

// ───── Redis Implementation ─────────────────────────────────────

export class RedisUserStore implements UserStore {
  constructor(
    private readonly redis: Pick<Redis, 'get' | 'set'>,
    private readonly prefix: string,
  ) {}

  async getById(id: number): Promise<User> {
    const raw = await this.redis.get(`${this.prefix}user:${id}`);
    if (!raw) throw new NotFoundError('User', id);
    return JSON.parse(raw) as User;
  }

  async save(user: User): Promise<User> {
    await this.redis.set(`${this.prefix}user:${user.id}`, JSON.stringify(user));
    return user;
  }
}

// ───── In-Memory Implementation ─────────────────────────────────

export class InMemoryUserStore implements UserStore {
  private readonly users = new Map<number, User>();

  async getById(id: number): Promise<User> {
    const user = this.users.get(id);
    if (!user) throw new NotFoundError('User', id);
    return { ...user };
  }

  async save(user: User): Promise<User> {
    this.users.set(user.id, { ...user });
    return user;
  }
}

// ───── Factory ──────────────────────────────────────────────────

export function createUserStore(redis?: Redis, prefix = 'campuscoffee:'): UserStore {
  if (redis) {
    logger.info('User store: Redis-backed');
    return new RedisUserStore(redis, prefix);
  }
  logger.info('User store: In-memory');
  return new InMemoryUserStore();
}
