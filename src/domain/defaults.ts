import type { Category, EntityId } from './types';

export const DEFAULT_ICON = 'Default';

export const DAILY_SPENDS = 'Daily Spends';

/** Icon keys the presentation layer knows how to draw */
export const ICON_KEYS = [
  'Savings',
  'Investments',
  'Food',
  'Transport',
  'Shopping',
  'Entertainment',
  'Hotel',
  'Bills',
  DEFAULT_ICON,
] as const;

export type IconKey = (typeof ICON_KEYS)[number];

/** Colors cycled through by addCategory (index = category count % length) */
export const CATEGORY_PALETTE: readonly number[] = [
  0xff8b5cf6,
  0xffec4899,
  0xfff59e0b,
  0xff64748b,
  0xffef4444,
];

export const DAILY_SPENDS_COLOR = 0xff9ca3af;

const SEED_CATEGORIES: ReadonlyArray<Omit<Category, 'id'>> = [
  { name: 'Investments', amount: 0, color: 0xff6366f1, icon: 'Investments' },
  { name: 'Savings', amount: 0, color: 0xff10b981, icon: 'Savings' },
  { name: 'Food', amount: 0, color: 0xfff59e0b, icon: 'Food' },
  { name: 'Transport', amount: 0, color: 0xff3b82f6, icon: 'Transport' },
  { name: 'Hotel', amount: 0, color: 0xffec4899, icon: 'Hotel' },
];

/** The five categories every freshly visited month starts with */
export function seedCategories(nextId: () => EntityId): Category[] {
  return SEED_CATEGORIES.map((c) => ({ id: nextId(), ...c }));
}

export function dailySpendsCategory(id: EntityId): Category {
  return { id, name: DAILY_SPENDS, amount: 0, color: DAILY_SPENDS_COLOR, icon: DEFAULT_ICON };
}

export function isIconKey(key: string): key is IconKey {
  return ICON_KEYS.some((known) => known === key);
}

/** Unknown or missing icon keys fall back to "Default" */
export function resolveIconKey(key: string | null | undefined): IconKey {
  return key && isIconKey(key) ? key : DEFAULT_ICON;
}
