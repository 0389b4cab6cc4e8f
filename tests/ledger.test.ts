import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ExpenseLedger } from '../src/services/ledger';
import { StorageGateway } from '../src/services/database/db';
import { createTempDbPath, createUnusableDbPath } from './helpers/temp-db';

describe('ExpenseLedger', () => {
  let dbPath: string;
  let cleanup: () => void;
  let ledger: ExpenseLedger;

  beforeEach(() => {
    ({ dbPath, cleanup } = createTempDbPath());
    ledger = new ExpenseLedger(dbPath);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    cleanup();
  });

  it('should be ready after construction', () => {
    expect(ledger.isReady).toBe(true);
    expect(ledger.list()).toEqual([]);
  });

  it('should store a transaction and list it back', () => {
    const added = ledger.add({ description: 'Lunch', amount: 25000, category: 'Food', date: new Date(2024, 0, 10) });

    expect(added).toBe(true);
    expect(ledger.list()).toEqual([
      { id: 1, description: 'Lunch', amount: 25000, category: 'Food', date: '2024-01-10' },
    ]);
  });

  it('should accept ISO date strings', () => {
    const id = ledger.addAndReturnId({ description: 'Bus', amount: 5000, category: 'Transport', date: '2024-01-11' });

    expect(id).toBe(1);
    expect(ledger.list()?.[0]?.date).toBe('2024-01-11');
  });

  it('should list newest date first, then newest id', () => {
    ledger.add({ description: 'A', amount: 1, category: 'Food', date: '2024-01-10' });
    ledger.add({ description: 'B', amount: 2, category: 'Food', date: '2024-01-12' });
    ledger.add({ description: 'C', amount: 3, category: 'Food', date: '2024-01-10' });

    expect(ledger.list()?.map((tx) => tx.description)).toEqual(['B', 'C', 'A']);
  });

  it('should compute totals for the basic scenario', () => {
    ledger.add({ description: 'Lunch', amount: 25000, category: 'Food', date: '2024-01-10' });
    ledger.add({ description: 'Bus', amount: 5000, category: 'Transport', date: '2024-01-10' });

    expect(ledger.totalSum()).toBe(30000);
    expect(ledger.sumByCategory()).toEqual({ Food: 25000, Transport: 5000 });
    expect(ledger.totalSum('2024-01-10')).toBe(30000);
    expect(ledger.totalSum(new Date(2024, 0, 10))).toBe(30000);
    expect(ledger.totalSum('2024-01-11')).toBe(0);
  });

  it('should return zero and an empty mapping when nothing is stored', () => {
    expect(ledger.totalSum()).toBe(0);
    expect(ledger.sumByCategory()).toEqual({});
  });

  it('should only sum rows on the filtered date', () => {
    ledger.add({ description: 'Lunch', amount: 25000, category: 'Food', date: '2024-01-10' });
    ledger.add({ description: 'Dinner', amount: 40000, category: 'Food', date: '2024-01-11' });
    ledger.add({ description: 'Taxi', amount: 15000, category: 'Transport', date: '2024-01-11' });

    expect(ledger.totalSum('2024-01-11')).toBe(55000);
    expect(ledger.sumByCategory('2024-01-10')).toEqual({ Food: 25000 });
    expect(ledger.sumByCategory('2024-01-11')).toEqual({ Food: 40000, Transport: 15000 });
    expect(ledger.sumByCategory('2024-02-01')).toEqual({});
  });

  it('should partition the total across categories', () => {
    const amounts = [1200, 800, 3500, 99.5, 10000];
    const categories = ['Food', 'Transport', 'Food', 'Bills', 'Bills'];
    amounts.forEach((amount, i) => {
      ledger.add({ description: `item ${i}`, amount, category: categories[i], date: '2024-03-01' });
    });

    const byCategory = ledger.sumByCategory();
    expect(byCategory).toEqual({ Food: 4700, Transport: 800, Bills: 10099.5 });
    expect(Object.values(byCategory).reduce((a, b) => a + b, 0)).toBe(ledger.totalSum());
    expect(ledger.totalSum()).toBe(15599.5);
  });

  it('should keep a category named like an object prototype key', () => {
    ledger.add({ description: 'Odd label', amount: 7, category: '__proto__', date: '2024-01-10' });
    ledger.add({ description: 'Lunch', amount: 25000, category: 'Food', date: '2024-01-10' });

    const byCategory = ledger.sumByCategory();
    expect(Object.keys(byCategory).sort()).toEqual(['Food', '__proto__']);
    expect(Object.getOwnPropertyDescriptor(byCategory, '__proto__')?.value).toBe(7);
    expect(Object.values(byCategory).reduce((a, b) => a + b, 0)).toBe(ledger.totalSum());
  });

  it('should delete exactly the given row', () => {
    ledger.add({ description: 'Lunch', amount: 25000, category: 'Food', date: '2024-01-10' });
    const busId = ledger.addAndReturnId({ description: 'Bus', amount: 5000, category: 'Transport', date: '2024-01-10' });
    expect(busId).toBe(2);

    expect(ledger.delete(2)).toBe(true);
    expect(ledger.list()?.map((tx) => tx.id)).toEqual([1]);
    expect(ledger.totalSum()).toBe(25000);
  });

  it('should report success when deleting an id that does not exist', () => {
    ledger.add({ description: 'Lunch', amount: 25000, category: 'Food', date: '2024-01-10' });

    expect(ledger.delete(999999)).toBe(true);
    expect(ledger.totalSum()).toBe(25000);
  });

  it('should tell deleted and missing rows apart with deleteWithOutcome', () => {
    const id = ledger.addAndReturnId({ description: 'Lunch', amount: 25000, category: 'Food', date: '2024-01-10' });
    expect(id).toBe(1);

    expect(ledger.deleteWithOutcome(1)).toBe('deleted');
    expect(ledger.deleteWithOutcome(1)).toBe('not_found');
  });

  it('should never reuse an id after deletion', () => {
    ledger.add({ description: 'A', amount: 1, category: 'Food', date: '2024-01-10' });
    ledger.add({ description: 'B', amount: 2, category: 'Food', date: '2024-01-10' });
    ledger.delete(2);

    const id = ledger.addAndReturnId({ description: 'C', amount: 3, category: 'Food', date: '2024-01-10' });
    expect(id).toBe(3);
  });

  it('should reject invalid transactions without writing', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(ledger.add({ description: '', amount: 100, category: 'Food', date: '2024-01-10' })).toBe(false);
    expect(ledger.add({ description: 'Lunch', amount: 0, category: 'Food', date: '2024-01-10' })).toBe(false);
    expect(ledger.add({ description: 'Lunch', amount: -5, category: 'Food', date: '2024-01-10' })).toBe(false);
    expect(ledger.add({ description: 'Lunch', amount: 100, category: ' ', date: '2024-01-10' })).toBe(false);
    expect(ledger.add({ description: 'Lunch', amount: 100, category: 'Food', date: '2024-02-30' })).toBe(false);

    expect(ledger.list()).toEqual([]);
    expect(errorSpy).toHaveBeenCalledTimes(5);
  });

  it('should reject ids that are not positive integers', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(ledger.delete(0)).toBe(false);
    expect(ledger.delete(1.5)).toBe(false);
    expect(ledger.deleteWithOutcome(-1)).toBe('error');
  });

  it('should refuse an in-memory database', () => {
    expect(() => new ExpenseLedger(':memory:')).toThrow('A database file path is required, got ":memory:"');
  });

  it('should keep data across ledger instances on the same file', () => {
    ledger.add({ description: 'Lunch', amount: 25000, category: 'Food', date: '2024-01-10' });

    const reopened = new ExpenseLedger(new StorageGateway(dbPath));
    expect(reopened.isReady).toBe(true);
    expect(reopened.totalSum()).toBe(25000);
  });
});

describe('ExpenseLedger with unavailable storage', () => {
  let cleanup: () => void;
  let ledger: ExpenseLedger;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const paths = createUnusableDbPath();
    cleanup = paths.cleanup;
    ledger = new ExpenseLedger(paths.dbPath);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    cleanup();
  });

  it('should flag itself as not ready', () => {
    expect(ledger.isReady).toBe(false);
  });

  it('should surface failures as sentinels instead of throwing', () => {
    expect(ledger.add({ description: 'Lunch', amount: 25000, category: 'Food', date: '2024-01-10' })).toBe(false);
    expect(ledger.list()).toBeNull();
    expect(ledger.delete(1)).toBe(false);
    expect(ledger.deleteWithOutcome(1)).toBe('error');
    expect(ledger.totalSum()).toBe(0);
    expect(ledger.sumByCategory()).toEqual({});
  });
});
