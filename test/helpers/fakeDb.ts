import { vi } from 'vitest';
import type { Database, Queryable } from '../../src/config/database';

/**
 * In-process stand-in for the MySQL facade. Transactions run their work
 * against the same fake so every statement is recorded in one place; spy on
 * `transaction` to count them.
 */
export const createFakeDb = (): Database => {
  const fake: Database = {
    select: vi.fn(async () => []),
    run: vi.fn(async () => ({ insertId: 0, affectedRows: 0 })),
    transaction: <T>(work: (tx: Queryable) => Promise<T>): Promise<T> => work(fake)
  };
  return fake;
};
