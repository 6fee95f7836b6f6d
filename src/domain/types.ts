/**
 * Domain types for the finance tracker.
 * Pure data — no DB, no network, no IO.
 */

/** YYYY-MM string */
export type MonthKey = string;

/** Integer identity, unique across the whole state tree */
export type EntityId = number;

export interface Account {
  id: EntityId;
  name: string;
  initialBalance: number;      // signed, currency units
}

export interface Category {
  id: EntityId;
  name: string;
  amount: number;              // allocated budget for the month
  color: number;               // packed ARGB
  icon: string;                // icon key, "Default" when unknown
}

export interface Expense {
  id: EntityId;
  description: string;
  amount: number;
  date: string;                // YYYY-MM-DD
  bankAccountId: EntityId;
  categoryId: EntityId;
}

export interface MonthlyBudget {
  monthlySalary: number;
  categories: Category[];
  expenses: Expense[];         // newest first
}

export interface AppState {
  bankAccounts: Account[];
  monthlyData: Record<MonthKey, MonthlyBudget>;
}

export type ThemePreference = 'system' | 'dark' | 'light';

/** One slice of the allocation bar */
export interface AllocationShare {
  categoryId: EntityId;
  name: string;
  color: number;
  share: number;               // amount / salary, not normalized
}

/** Expenses of a single day, as listed on the transactions screen */
export interface ExpenseDay {
  date: string;
  expenses: Expense[];
  total: number;
}

export function emptyAppState(): AppState {
  return { bankAccounts: [], monthlyData: {} };
}

export function emptyMonth(): MonthlyBudget {
  return { monthlySalary: 0, categories: [], expenses: [] };
}
