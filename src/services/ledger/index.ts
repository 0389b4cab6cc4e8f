import { StorageGateway } from '../database/db';
import { TransactionInputSchema, toIsoDate, validateInput } from '../validation/schemas';
import type { CategoryTotals, DeleteOutcome, IsoDate, NewTransaction, Transaction } from '../../types/transaction';

interface SumRow {
  total: number | null;
}

interface CategorySumRow {
  category: string;
  total: number;
}

const SCHEMA_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS transactions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    description TEXT NOT NULL,
    amount REAL NOT NULL,
    category TEXT NOT NULL,
    date DATE NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS idx_transactions_date ON transactions(date)`,
];

/**
 * Business facade over the `transactions` table.
 *
 * Construct one instance per process and hand it to every caller. The
 * constructor ensures the schema exists, so every method below runs against
 * a ready table. Storage failures never throw out of here: they come back as
 * `false`, `null`, `0` or `{}` depending on the operation.
 */
export class ExpenseLedger {
  private readonly gateway: StorageGateway;
  readonly isReady: boolean;

  constructor(storage: StorageGateway | string) {
    this.gateway = typeof storage === 'string' ? new StorageGateway(storage) : storage;
    this.isReady = this.ensureSchema();
  }

  add(tx: NewTransaction): boolean {
    return this.addAndReturnId(tx) !== null;
  }

  addAndReturnId(tx: NewTransaction): number | null {
    const input = validateInput(TransactionInputSchema, tx);
    if (!input.valid) {
      console.error('[Ledger] Rejected transaction:', input.error);
      return null;
    }

    const { description, amount, category, date } = input.data;
    return this.gateway.execute(
      'INSERT INTO transactions (description, amount, category, date) VALUES (?, ?, ?, ?)',
      [description, amount, category, date],
      'insert'
    );
  }

  /**
   * Newest first: date descending, then most recently inserted.
   * `null` means the read failed, `[]` means there is nothing stored.
   */
  list(): Transaction[] | null {
    return this.gateway.execute<Transaction>(
      'SELECT id, description, amount, category, date FROM transactions ORDER BY date DESC, id DESC',
      [],
      'all'
    );
  }

  /**
   * True when the statement ran, whether or not a row matched.
   * Use deleteWithOutcome() to tell the two apart.
   */
  delete(id: number): boolean {
    if (!isRowId(id)) {
      console.error('[Ledger] Invalid transaction id:', id);
      return false;
    }
    return this.gateway.execute('DELETE FROM transactions WHERE id = ?', [id], 'plain');
  }

  deleteWithOutcome(id: number): DeleteOutcome {
    if (!isRowId(id)) {
      console.error('[Ledger] Invalid transaction id:', id);
      return 'error';
    }

    const changes = this.gateway.execute('DELETE FROM transactions WHERE id = ?', [id], 'changes');
    if (changes === null) return 'error';
    return changes > 0 ? 'deleted' : 'not_found';
  }

  totalSum(date?: Date | IsoDate): number {
    const row = date === undefined
      ? this.gateway.execute<SumRow>('SELECT SUM(amount) AS total FROM transactions', [], 'one')
      : this.gateway.execute<SumRow>('SELECT SUM(amount) AS total FROM transactions WHERE date = ?', [normalizeDate(date)], 'one');

    return row?.total ?? 0;
  }

  /**
   * Only categories with at least one matching row are present
   */
  sumByCategory(date?: Date | IsoDate): CategoryTotals {
    const rows = date === undefined
      ? this.gateway.execute<CategorySumRow>(
          'SELECT category, SUM(amount) AS total FROM transactions GROUP BY category',
          [],
          'all'
        )
      : this.gateway.execute<CategorySumRow>(
          'SELECT category, SUM(amount) AS total FROM transactions WHERE date = ? GROUP BY category',
          [normalizeDate(date)],
          'all'
        );

    // fromEntries defines own keys, so a "__proto__" label is kept
    return Object.fromEntries((rows ?? []).map((row) => [row.category, row.total]));
  }

  private ensureSchema(): boolean {
    for (const sql of SCHEMA_STATEMENTS) {
      if (!this.gateway.execute(sql, [], 'plain')) {
        console.error('[Ledger] Schema setup failed for', this.gateway.dbPath);
        return false;
      }
    }
    return true;
  }
}

function isRowId(id: number): boolean {
  return Number.isSafeInteger(id) && id > 0;
}

function normalizeDate(date: Date | IsoDate): IsoDate {
  return typeof date === 'string' ? date.trim() : toIsoDate(date);
}
