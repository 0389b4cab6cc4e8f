export const EXPENSE_CATEGORIES = [
  { name: 'Food', keywords: ['lunch', 'dinner', 'breakfast', 'coffee', 'snack', 'restaurant', 'groceries'] },
  { name: 'Transport', keywords: ['bus', 'train', 'taxi', 'fuel', 'parking', 'toll', 'ojek'] },
  { name: 'Shopping', keywords: ['clothes', 'shoes', 'market', 'shop', 'gift'] },
  { name: 'Bills', keywords: ['electric', 'water', 'internet', 'phone', 'rent', 'bill'] },
  { name: 'Entertainment', keywords: ['cinema', 'movie', 'game', 'concert', 'streaming'] },
  { name: 'Health', keywords: ['pharmacy', 'doctor', 'medicine', 'gym', 'clinic'] },
  { name: 'Education', keywords: ['book', 'course', 'tuition', 'school', 'stationery'] },
  { name: 'Other', keywords: [] },
];

export const DEFAULT_DB_FILE = './data/expenses.db';
export const DEFAULT_CURRENCY_SYMBOL = 'Rp';
export const DEFAULT_HISTORY_LIMIT = 20;
export const MAX_AMOUNT = 1_000_000_000_000;

export const DEFAULT_MESSAGES = {
  WELCOME: 'Welcome! Type an expense like "25000 lunch" or use /add to record one.',
  ERROR: 'Operation failed. Please try again.',
};
