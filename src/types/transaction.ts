/**
 * Calendar date in `YYYY-MM-DD` form, as stored in the `date` column
 */
export type IsoDate = string;

export interface Transaction {
  id: number;
  description: string;
  amount: number;
  category: string;
  date: IsoDate;
}

export interface NewTransaction {
  description: string;
  amount: number;
  category: string;
  date: Date | IsoDate;
}

export type DeleteOutcome = 'deleted' | 'not_found' | 'error';

export type CategoryTotals = Record<string, number>;

export interface CategoryTotal {
  category: string;
  total: number;
}

export interface ExpenseSummary {
  date?: IsoDate;
  total: number;
  categories: CategoryTotal[];
}
