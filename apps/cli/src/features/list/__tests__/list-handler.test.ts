import { ExpenseRepository, type KyselyDB } from '@spendlog/data';
import { createTestDatabase, resetTestDatabase } from '@spendlog/data/test-utils';
import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';

import { ListHandler } from '../list-handler.js';

describe('ListHandler', () => {
  let db: KyselyDB;
  let repo: ExpenseRepository;

  beforeAll(async () => {
    db = await createTestDatabase();
  });

  afterAll(async () => {
    await db.destroy();
  });

  beforeEach(async () => {
    await resetTestDatabase(db);
    repo = new ExpenseRepository(db);
  });

  it('should return an empty list for an empty table', async () => {
    const result = await new ListHandler(repo).execute();

    expect(result._unsafeUnwrap()).toEqual([]);
  });

  it('should return expenses most recent first', async () => {
    await repo.add({ amount: '1', memo: 'Older', createdOn: '2024-01-01' });
    await repo.add({ amount: '2', memo: 'Newer', createdOn: '2024-02-01' });

    const result = await new ListHandler(repo).execute();

    expect(result._unsafeUnwrap().map((expense) => expense.memo)).toEqual(['Newer', 'Older']);
  });
});
