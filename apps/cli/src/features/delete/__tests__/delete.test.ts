import { closeDatabase, ExpenseRepository, initializeDatabase, type KyselyDB } from '@spendlog/data';
import { createTestDatabase, resetTestDatabase } from '@spendlog/data/test-utils';
import { ok } from 'neverthrow';
import type { MockInstance } from 'vitest';
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';

import type { CLIResponse } from '../../shared/cli-response.js';
import { executeDeleteCommand } from '../delete.js';

vi.mock('@spendlog/data', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@spendlog/data')>();
  return {
    ...actual,
    initializeDatabase: vi.fn(),
    closeDatabase: vi.fn(),
  };
});

describe('delete command', () => {
  let db: KyselyDB;
  let repo: ExpenseRepository;
  let consoleLogSpy: MockInstance<(message?: unknown, ...optionalParams: unknown[]) => void>;
  let stderrSpy: MockInstance;
  let processExitSpy: MockInstance<(code?: number | string | null) => never>;

  beforeAll(async () => {
    db = await createTestDatabase();
  });

  afterAll(async () => {
    await db.destroy();
  });

  beforeEach(async () => {
    vi.clearAllMocks();
    await resetTestDatabase(db);
    repo = new ExpenseRepository(db);
    await repo.add({ amount: '12.5', memo: 'Coffee', createdOn: '2024-03-15' });
    await repo.add({ amount: '40', memo: 'Groceries', createdOn: '2024-03-16' });
    vi.mocked(initializeDatabase).mockResolvedValue(db);
    vi.mocked(closeDatabase).mockResolvedValue(ok(undefined));

    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {
      // Mock implementation
    });
    stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    processExitSpy = vi.spyOn(process, 'exit').mockImplementation((_code?: number | string | null) => {
      throw new Error('process.exit called');
    }) as never;
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    stderrSpy.mockRestore();
    processExitSpy.mockRestore();
  });

  const printed = (): unknown[] => consoleLogSpy.mock.calls.map((call) => call[0]);

  it('should delete the expense and print it with its total', async () => {
    await executeDeleteCommand({ id: '1', options: {} });

    expect(printed()).toEqual([
      'The following expense has been deleted:',
      '  1 | 2024-03-15 |        12.50 | Coffee',
      '-'.repeat(50),
      `Total${' '.repeat(20)}12.50`,
    ]);
    expect((await repo.findAll())._unsafeUnwrap().map((expense) => expense.id)).toEqual([2]);
  });

  it('should report a missing id as typed and exit normally', async () => {
    await executeDeleteCommand({ id: '042', options: {} });

    expect(printed()).toEqual(["There is no expense with the id '042'."]);
    expect(processExitSpy).not.toHaveBeenCalled();
    expect((await repo.findAll())._unsafeUnwrap()).toHaveLength(2);
  });

  it('should find the row for an id with leading zeros', async () => {
    await executeDeleteCommand({ id: '002', options: {} });

    expect(printed()[1]).toBe('  2 | 2024-03-16 |        40.00 | Groceries');
  });

  it('should require an id', async () => {
    await expect(executeDeleteCommand({ options: {} })).rejects.toThrow('process.exit called');

    expect(processExitSpy).toHaveBeenCalledWith(2);
    expect(String(stderrSpy.mock.calls[0]?.[0])).toMatch(/Error: You must provide an id of an expense to delete\.\n$/);
    expect(initializeDatabase).not.toHaveBeenCalled();
  });

  it('should exit with the database error code for an id that is not an integer', async () => {
    await expect(executeDeleteCommand({ id: '1.5', options: {} })).rejects.toThrow('process.exit called');

    expect(processExitSpy).toHaveBeenCalledWith(7);
    expect((await repo.findAll())._unsafeUnwrap()).toHaveLength(2);
  });

  it.each(['1.0', '1e0'])('should leave row 1 in place for the id %s', async (id) => {
    await expect(executeDeleteCommand({ id, options: {} })).rejects.toThrow('process.exit called');

    expect(processExitSpy).toHaveBeenCalledWith(7);
    expect(consoleLogSpy).not.toHaveBeenCalled();
    expect((await repo.findAll())._unsafeUnwrap().map((expense) => expense.id)).toEqual([2, 1]);
  });

  it('should describe the outcome in JSON mode', async () => {
    await executeDeleteCommand({ id: '7', options: { json: true } });

    const response = JSON.parse(String(printed()[0])) as CLIResponse;
    expect(response.data).toEqual({ id: '7', deleted: null });
  });
});
