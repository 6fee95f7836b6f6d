/**
 * Pure domain computations.
 * No DB, no network — only data in, data out. Missing references degrade
 * to zero / null, nothing here throws.
 */
import { DAILY_SPENDS } from './defaults';
import type {
  Account,
  AllocationShare,
  AppState,
  Category,
  EntityId,
  Expense,
  ExpenseDay,
  MonthKey,
  MonthlyBudget,
  ThemePreference,
} from './types';

const MONTH_KEY = /^\d{4}-(0[1-9]|1[0-2])$/;

function allExpenses(monthlyData: Record<MonthKey, MonthlyBudget>): Expense[] {
  return Object.values(monthlyData).flatMap((m) => m.expenses);
}

function sumAmounts(items: ReadonlyArray<{ amount: number }>): number {
  return items.reduce((sum, item) => sum + item.amount, 0);
}

export function isMonthKey(value: string): boolean {
  return MONTH_KEY.test(value);
}

/** Month an expense date belongs to, or null when the date has no YYYY-MM prefix */
export function monthKeyOf(date: string): MonthKey | null {
  const key = date.slice(0, 7);
  return isMonthKey(key) ? key : null;
}

/** Get current month as YYYY-MM */
export function currentMonth(now: Date = new Date()): MonthKey {
  const y = now.getFullYear();
  const m = String(now.getMonth() + 1).padStart(2, '0');
  return `${y}-${m}`;
}

export function isDailySpends(category: Pick<Category, 'name'>): boolean {
  return category.name.toLowerCase() === DAILY_SPENDS.toLowerCase();
}

/**
 * Account balance = initial balance − every expense drawn on it, in any month.
 * Allocations are budget intent, not money leaving the account.
 */
export function accountCurrentBalance(
  account: Account,
  monthlyData: Record<MonthKey, MonthlyBudget>,
): number {
  const spent = sumAmounts(allExpenses(monthlyData).filter((e) => e.bankAccountId === account.id));
  return account.initialBalance - spent;
}

/** Σ initial balances − Σ all expenses */
export function totalBalance(state: AppState): number {
  const initial = state.bankAccounts.reduce((sum, a) => sum + a.initialBalance, 0);
  return initial - sumAmounts(allExpenses(state.monthlyData));
}

/**
 * Lifetime allocation to a named category ("Investments", "Savings").
 * Only the first case-insensitive match per month counts.
 */
export function totalByCategoryName(state: AppState, name: string): number {
  const wanted = name.toLowerCase();
  return Object.values(state.monthlyData).reduce((sum, month) => {
    const match = month.categories.find((c) => c.name.toLowerCase() === wanted);
    return sum + (match?.amount ?? 0);
  }, 0);
}

export function totalAllocated(month: MonthlyBudget): number {
  return sumAmounts(month.categories);
}

export function totalSpent(month: MonthlyBudget): number {
  return sumAmounts(month.expenses);
}

/** Remaining = salary − allocated − spent, for one month only */
export function remainingForMonth(month: MonthlyBudget): number {
  return month.monthlySalary - totalAllocated(month) - totalSpent(month);
}

/**
 * Share of salary per funded category. Empty when there is no salary.
 * Shares are left as-is when they add up past 1 (over-allocation).
 */
export function allocationPercentages(month: MonthlyBudget): AllocationShare[] {
  if (month.monthlySalary <= 0) return [];
  return month.categories
    .filter((c) => c.amount > 0)
    .map((c) => ({
      categoryId: c.id,
      name: c.name,
      color: c.color,
      share: c.amount / month.monthlySalary,
    }));
}

/**
 * Filter by description (case-insensitive substring), then group by day,
 * most recent day first. Within a day the list order is kept.
 */
export function groupExpensesByDate(expenses: Expense[], filterText: string): ExpenseDay[] {
  const needle = filterText.toLowerCase();
  const byDate = new Map<string, Expense[]>();
  for (const e of expenses) {
    if (!e.description.toLowerCase().includes(needle)) continue;
    const bucket = byDate.get(e.date);
    if (bucket) {
      bucket.push(e);
    } else {
      byDate.set(e.date, [e]);
    }
  }
  return Array.from(byDate.entries())
    .sort(([a], [b]) => (a < b ? 1 : a > b ? -1 : 0))
    .map(([date, items]) => ({ date, expenses: items, total: sumAmounts(items) }));
}

/** Looks in every month, since category ids are globally unique */
export function categoryById(state: AppState, id: EntityId): Category | null {
  for (const month of Object.values(state.monthlyData)) {
    const found = month.categories.find((c) => c.id === id);
    if (found) return found;
  }
  return null;
}

export function accountById(state: AppState, id: EntityId): Account | null {
  return state.bankAccounts.find((a) => a.id === id) ?? null;
}

/** Months that have data, newest first (drawer month list) */
export function monthsWithData(state: AppState): MonthKey[] {
  return Object.keys(state.monthlyData).sort().reverse();
}

/** Categories shown on the budget screen — everything but the catch-all */
export function budgetCategories(month: MonthlyBudget): Category[] {
  return month.categories.filter((c) => !isDailySpends(c));
}

export function resolveDarkMode(preference: ThemePreference, systemIsDark: boolean): boolean {
  if (preference === 'dark') return true;
  if (preference === 'light') return false;
  return systemIsDark;
}
