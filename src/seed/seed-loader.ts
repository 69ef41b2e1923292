/**
 * Seed Loader
 *
 * Loads users and POS from a JSON file into the stores so a standalone
 * instance has something to review. Reviews are never seeded.
 */

import * as fs from 'fs';
import * as path from 'path';
import Ajv, { JSONSchemaType } from 'ajv';
import { User, UserStore } from '../users/types';
import { Pos, PosStore } from '../pos/types';
import { PROJECT_ROOT } from '../config/env';
import { logger } from '../observability/logger';

const log = logger.child({ component: 'seed-loader' });

export interface SeedData {
  users: User[];
  pos: Pos[];
}

const userSchema: JSONSchemaType<User> = {
  type: 'object',
  properties: {
    id: { type: 'integer', minimum: 1 },
    loginName: { type: 'string', minLength: 1 },
    emailAddress: { type: 'string', minLength: 3 },
    firstName: { type: 'string' },
    lastName: { type: 'string' },
  },
  required: ['id', 'loginName', 'emailAddress', 'firstName', 'lastName'],
  additionalProperties: false,
};

const posSchema: JSONSchemaType<Pos> = {
  type: 'object',
  properties: {
    id: { type: 'integer', minimum: 1 },
    name: { type: 'string', minLength: 1 },
    description: { type: 'string' },
    type: { type: 'string', enum: ['CAFE', 'VENDING_MACHINE', 'BAKERY', 'CAFETERIA'] },
    campus: { type: 'string', enum: ['ALTSTADT', 'BERGHEIM', 'INF'] },
    street: { type: 'string' },
    houseNumber: { type: 'string' },
    postalCode: { type: 'integer' },
    city: { type: 'string' },
  },
  required: ['id', 'name', 'description', 'type', 'campus', 'street', 'houseNumber', 'postalCode', 'city'],
  additionalProperties: false,
};

const seedSchema: JSONSchemaType<SeedData> = {
  type: 'object',
  properties: {
    users: { type: 'array', items: userSchema },
    pos: { type: 'array', items: posSchema },
  },
  required: ['users', 'pos'],
  additionalProperties: false,
};

const validateSeed = new Ajv({ allErrors: true }).compile(seedSchema);

/** Read and validate a seed file; relative paths resolve against the project root */
export function readSeedFile(filePath: string): SeedData {
  const resolved = path.resolve(PROJECT_ROOT, filePath);
  const raw: unknown = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
  if (!validateSeed(raw)) {
    const details = (validateSeed.errors ?? []).map((e) => `${e.instancePath} ${e.message ?? ''}`.trim());
    throw new Error(`Invalid seed file ${resolved}: ${details.join('; ')}`);
  }
  return raw;
}

export async function applySeed(data: SeedData, userStore: UserStore, posStore: PosStore): Promise<void> {
  for (const user of data.users) {
    await userStore.save(user);
  }
  for (const pos of data.pos) {
    await posStore.save(pos);
  }
  log.info({ users: data.users.length, pos: data.pos.length }, 'Seed data loaded');
}
