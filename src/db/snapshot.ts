/**
 * Wire codec for the persisted document. Both backends store exactly this
 * shape: the local snapshot as JSON text, the remote one as a document.
 */
import { z } from 'zod';
import { DEFAULT_ICON } from '../domain/defaults';
import type { Account, AppState, MonthlyBudget } from '../domain/types';

const accountSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  initialBalance: z.number(),
});

const categorySchema = z.object({
  id: z.number().int(),
  name: z.string(),
  amount: z.number(),
  color: z.number(),
  // Older snapshots have no icon; lookups used to fail on it
  icon: z
    .string()
    .nullish()
    .transform((icon) => icon ?? DEFAULT_ICON),
});

const expenseSchema = z.object({
  id: z.number().int(),
  description: z.string(),
  amount: z.number(),
  date: z.string(),
  bankAccountId: z.number().int(),
  categoryId: z.number().int(),
});

const monthSchema = z.object({
  monthlySalary: z.number().default(0),
  categories: z.array(categorySchema).default([]),
  expenses: z.array(expenseSchema).default([]),
});

const appStateSchema = z.object({
  bankAccounts: z.array(accountSchema).default([]),
  monthlyData: z.record(z.string(), monthSchema).default({}),
});

export type SnapshotDocument = {
  bankAccounts: Account[];
  monthlyData: Record<string, MonthlyBudget>;
};

/** Deep copy into plain data, safe to hand to a background writer */
export function encodeAppState(state: AppState): SnapshotDocument {
  const monthlyData: Record<string, MonthlyBudget> = {};
  for (const [key, month] of Object.entries(state.monthlyData)) {
    monthlyData[key] = {
      monthlySalary: month.monthlySalary,
      categories: month.categories.map((c) => ({ ...c })),
      expenses: month.expenses.map((e) => ({ ...e })),
    };
  }
  return {
    bankAccounts: state.bankAccounts.map((a) => ({ ...a })),
    monthlyData,
  };
}

/** Validates a stored document. Anything that does not fit yields null. */
export function decodeAppState(raw: unknown): AppState | null {
  const result = appStateSchema.safeParse(raw);
  if (!result.success) {
    console.error('[Snapshot] Stored state does not match the expected shape:', result.error.issues);
    return null;
  }
  return result.data;
}

export function encodeSnapshot(state: AppState): string {
  return JSON.stringify(encodeAppState(state));
}

export function decodeSnapshot(text: string): AppState | null {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    console.error('[Snapshot] Stored state is not valid JSON:', error);
    return null;
  }
  return decodeAppState(raw);
}
