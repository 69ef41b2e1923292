import { InMemoryUserStore } from '../../src/users/user-store';
import { InMemoryPosStore } from '../../src/pos/pos-store';
import { posFixtures, userFixtures } from '../helpers/fixtures';

describe('InMemoryUserStore', () => {
  it('should return a saved user by id', async () => {
    const store = new InMemoryUserStore();
    await store.save(userFixtures()[0]);

    expect(await store.getById(1)).toEqual(userFixtures()[0]);
  });

  it('should reject unknown ids with a User NotFoundError', async () => {
    const store = new InMemoryUserStore();

    await expect(store.getById(7)).rejects.toMatchObject({ kind: 'not_found', entity: 'User', id: 7 });
  });
});

describe('InMemoryPosStore', () => {
  it('should return a saved POS by id', async () => {
    const store = new InMemoryPosStore();
    await store.save(posFixtures()[1]);

    const pos = await store.getById(2);

    expect(pos.name).toBe('Bäcker Görtz');
    expect(pos.campus).toBe('INF');
  });

  it('should reject unknown ids with a Pos NotFoundError', async () => {
    const store = new InMemoryPosStore();

    await expect(store.getById(5)).rejects.toMatchObject({ kind: 'not_found', entity: 'Pos', id: 5 });
  });
});
