/**
 * Canonical app state plus the current-month selector.
 *
 * Every mutation builds a new AppState (nothing already published is ever
 * mutated), notifies subscribers, then hands the new state to the
 * persistence port without waiting. Mutations that change nothing neither
 * notify nor persist.
 */
import {
  accountById,
  currentMonth,
  isDailySpends,
  isMonthKey,
  monthKeyOf,
} from '../domain/computations';
import {
  CATEGORY_PALETTE,
  DAILY_SPENDS,
  DEFAULT_ICON,
  dailySpendsCategory,
  seedCategories,
} from '../domain/defaults';
import { IdGenerator, maxEntityId } from '../domain/ids';
import {
  emptyAppState,
  emptyMonth,
  type Account,
  type AppState,
  type Category,
  type EntityId,
  type Expense,
  type MonthKey,
  type MonthlyBudget,
  type ThemePreference,
} from '../domain/types';
import type { AuthPort, PersistencePort, PreferencesPort } from './ports';

export interface FinanceSnapshot {
  appState: AppState;
  currentMonth: MonthKey;
  theme: ThemePreference;
  isLoading: boolean;
  isAuthenticating: boolean;
  authError: string | null;
}

export interface FinanceStoreOptions {
  persistence: PersistencePort;
  preferences: PreferencesPort;
  /** Only the remote backend has accounts to sign in to */
  auth?: AuthPort;
  ids?: IdGenerator;
  now?: () => Date;
}

type Listener = () => void;

function withMonth(state: AppState, key: MonthKey, month: MonthlyBudget): AppState {
  return { ...state, monthlyData: { ...state.monthlyData, [key]: month } };
}

function findExpense(state: AppState, id: EntityId): { key: MonthKey; index: number } | null {
  for (const [key, month] of Object.entries(state.monthlyData)) {
    const index = month.expenses.findIndex((e) => e.id === id);
    if (index >= 0) return { key, index };
  }
  return null;
}

export class FinanceStore {
  private snapshot: FinanceSnapshot;
  private readonly listeners = new Set<Listener>();
  private readonly persistence: PersistencePort;
  private readonly preferences: PreferencesPort;
  private readonly auth: AuthPort | undefined;
  private readonly ids: IdGenerator;
  private detachRemote: (() => void) | null = null;
  /** Bumped by start and reset; a load that resumes under an older value is dropped */
  private session = 0;

  constructor(options: FinanceStoreOptions) {
    this.persistence = options.persistence;
    this.preferences = options.preferences;
    this.auth = options.auth;
    this.ids = options.ids ?? new IdGenerator();
    this.snapshot = {
      appState: emptyAppState(),
      currentMonth: currentMonth(options.now?.()),
      theme: 'system',
      isLoading: false,
      isAuthenticating: false,
      authError: null,
    };
  }

  // --- Observation ---

  getSnapshot(): FinanceSnapshot {
    return this.snapshot;
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** The budget of a month, seeding it first when the month has no data */
  monthBudget(key: MonthKey = this.snapshot.currentMonth): MonthlyBudget {
    this.ensureMonth(key);
    return this.snapshot.appState.monthlyData[key] ?? emptyMonth();
  }

  // --- Session ---

  /**
   * Loads persisted state (nothing saved yet → empty state), then attaches
   * the live listener when the backend has one. Never rejects. A sign-out
   * or a newer start while the load is pending discards its result.
   */
  async start(): Promise<void> {
    const session = ++this.session;
    this.update({ theme: this.readTheme(), isLoading: true });
    this.stopListening();

    if (this.auth && !this.auth.currentUserId()) {
      this.update({ isLoading: false });
      return;
    }

    let loaded: AppState | null = null;
    try {
      loaded = await this.persistence.load();
    } catch (error) {
      console.error('[FinanceStore] Error loading state:', error);
    }
    if (session !== this.session) {
      console.log('[FinanceStore] Discarding load from a superseded session');
      return;
    }
    this.replaceState(loaded ?? emptyAppState());
    console.log(`[FinanceStore] Loaded ${this.snapshot.appState.bankAccounts.length} accounts`);

    if (this.persistence.subscribe) {
      this.detachRemote = this.persistence.subscribe((external) => this.replaceState(external));
    }
    this.update({ isLoading: false });
  }

  async signIn(email: string, password: string): Promise<void> {
    await this.authenticate((auth) => auth.signIn(email, password));
  }

  async signUp(email: string, password: string): Promise<void> {
    await this.authenticate((auth) => auth.signUp(email, password));
  }

  /** Clears local state; what was persisted stays where it is */
  async signOut(): Promise<void> {
    this.stopListening();
    this.reset();
    if (!this.auth) return;
    try {
      await this.auth.signOut();
    } catch (error) {
      console.warn('[FinanceStore] Sign-out failed:', error);
    }
  }

  clearAuthError(): void {
    if (this.snapshot.authError !== null) this.update({ authError: null });
  }

  reset(): void {
    this.session++;
    this.update({ appState: emptyAppState(), isLoading: false });
  }

  dispose(): void {
    this.stopListening();
    this.listeners.clear();
  }

  // --- Preferences ---

  setTheme(theme: ThemePreference): void {
    try {
      this.preferences.setTheme(theme);
    } catch (error) {
      console.warn('[FinanceStore] Could not store theme preference:', error);
    }
    this.update({ theme });
  }

  hasSeenOnboarding(): boolean {
    try {
      return this.preferences.hasSeenOnboarding();
    } catch (error) {
      console.warn('[FinanceStore] Could not read onboarding flag:', error);
      return false;
    }
  }

  markOnboardingSeen(): void {
    try {
      this.preferences.setOnboardingSeen();
    } catch (error) {
      console.warn('[FinanceStore] Could not store onboarding flag:', error);
    }
  }

  // --- Months ---

  /** Switches the current month; the month is seeded by the next read, not here */
  selectMonth(key: MonthKey): void {
    if (!isMonthKey(key)) {
      console.warn(`[FinanceStore] Ignoring invalid month key "${key}"`);
      return;
    }
    if (key !== this.snapshot.currentMonth) this.update({ currentMonth: key });
  }

  /**
   * Seeds the default categories for a month that has no data. Idempotent.
   * The seeded month is kept in memory and written with the next mutation.
   */
  ensureMonth(key: MonthKey): void {
    if (!isMonthKey(key) || this.snapshot.appState.monthlyData[key]) return;
    const seeded: MonthlyBudget = {
      monthlySalary: 0,
      categories: seedCategories(() => this.ids.next()),
      expenses: [],
    };
    this.update({ appState: withMonth(this.snapshot.appState, key, seeded) });
  }

  // --- Accounts ---

  addAccount(name: string, initialBalance: number): Account | null {
    const trimmed = name.trim();
    if (!trimmed) {
      console.warn('[FinanceStore] Account name must not be empty');
      return null;
    }
    const account: Account = { id: this.ids.next(), name: trimmed, initialBalance };
    const state = this.snapshot.appState;
    this.commit({ ...state, bankAccounts: [...state.bankAccounts, account] });
    return account;
  }

  updateAccount(account: Account): void {
    const state = this.snapshot.appState;
    if (!account.name.trim() || !accountById(state, account.id)) return;
    this.commit({
      ...state,
      bankAccounts: state.bankAccounts.map((a) => (a.id === account.id ? { ...account } : a)),
    });
  }

  /** Removes the account and every expense drawn on it, in every month */
  deleteAccount(id: EntityId): void {
    const state = this.snapshot.appState;
    if (!accountById(state, id)) return;

    const monthlyData: Record<MonthKey, MonthlyBudget> = {};
    for (const [key, month] of Object.entries(state.monthlyData)) {
      const expenses = month.expenses.filter((e) => e.bankAccountId !== id);
      monthlyData[key] = expenses.length === month.expenses.length ? month : { ...month, expenses };
    }
    this.commit({ bankAccounts: state.bankAccounts.filter((a) => a.id !== id), monthlyData });
  }

  // --- Salary & categories (current month) ---

  setSalary(amount: number): void {
    const key = this.snapshot.currentMonth;
    const month = this.monthBudget(key);
    if (month.monthlySalary === amount) return;
    this.commit(withMonth(this.snapshot.appState, key, { ...month, monthlySalary: amount }));
  }

  /** A month keeps a single Daily Spends; asking for another returns the existing one */
  addCategory(name: string, iconKey: string | null): Category {
    const key = this.snapshot.currentMonth;
    const month = this.monthBudget(key);
    const daily = isDailySpends({ name }) ? month.categories.find(isDailySpends) : undefined;
    if (daily) return daily;
    const category: Category = {
      id: this.ids.next(),
      name,
      amount: 0,
      color: CATEGORY_PALETTE[month.categories.length % CATEGORY_PALETTE.length],
      icon: iconKey ?? DEFAULT_ICON,
    };
    this.commit(
      withMonth(this.snapshot.appState, key, { ...month, categories: [...month.categories, category] }),
    );
    return category;
  }

  /**
   * Replaces the category in whichever month owns it. Renaming it to
   * Daily Spends when that month already has one is ignored.
   */
  updateCategory(category: Category): void {
    const state = this.snapshot.appState;
    for (const [key, month] of Object.entries(state.monthlyData)) {
      if (!month.categories.some((c) => c.id === category.id)) continue;
      const duplicate = month.categories.some((c) => c.id !== category.id && isDailySpends(c));
      if (duplicate && isDailySpends(category)) {
        console.warn(`[FinanceStore] Month ${key} already has a ${DAILY_SPENDS} category`);
        return;
      }
      const categories = month.categories.map((c) => (c.id === category.id ? { ...category } : c));
      this.commit(withMonth(state, key, { ...month, categories }));
      return;
    }
  }

  deleteCategory(id: EntityId): void {
    const key = this.snapshot.currentMonth;
    const month = this.monthBudget(key);
    const categories = month.categories.filter((c) => c.id !== id);
    if (categories.length === month.categories.length) return;
    this.commit(withMonth(this.snapshot.appState, key, { ...month, categories }));
  }

  // --- Expenses ---

  /**
   * Records an expense in the month of its date (not the selected month),
   * filed under that month's Daily Spends category, created on first use.
   */
  addExpense(description: string, amount: number, date: string, accountId: EntityId): Expense | null {
    const key = monthKeyOf(date);
    if (!key) {
      console.warn(`[FinanceStore] Ignoring expense with invalid date "${date}"`);
      return null;
    }
    const [month, daily] = this.withDailySpends(this.snapshot.appState.monthlyData[key] ?? emptyMonth());
    const expense: Expense = {
      id: this.ids.next(),
      description,
      amount,
      date,
      bankAccountId: accountId,
      categoryId: daily.id,
    };
    this.commit(withMonth(this.snapshot.appState, key, { ...month, expenses: [expense, ...month.expenses] }));
    return expense;
  }

  /**
   * Replaces an expense by identity. A changed date moves it to the new
   * month's list (prepended); if that month lacks its category it is
   * re-filed under the new month's Daily Spends.
   */
  updateExpense(expense: Expense): void {
    const state = this.snapshot.appState;
    const location = findExpense(state, expense.id);
    if (!location) return;
    const targetKey = monthKeyOf(expense.date);
    if (!targetKey) {
      console.warn(`[FinanceStore] Ignoring expense update with invalid date "${expense.date}"`);
      return;
    }

    const source = state.monthlyData[location.key];
    if (targetKey === location.key) {
      const expenses = source.expenses.map((e, i) => (i === location.index ? { ...expense } : e));
      this.commit(withMonth(state, targetKey, { ...source, expenses }));
      return;
    }

    const withoutOld = withMonth(state, location.key, {
      ...source,
      expenses: source.expenses.filter((e) => e.id !== expense.id),
    });
    let target = withoutOld.monthlyData[targetKey] ?? emptyMonth();
    let moved: Expense = { ...expense };
    if (!target.categories.some((c) => c.id === expense.categoryId)) {
      const [withDaily, daily] = this.withDailySpends(target);
      target = withDaily;
      moved = { ...moved, categoryId: daily.id };
    }
    this.commit(withMonth(withoutOld, targetKey, { ...target, expenses: [moved, ...target.expenses] }));
  }

  deleteExpense(id: EntityId): void {
    const state = this.snapshot.appState;
    const location = findExpense(state, id);
    if (!location) return;
    const month = state.monthlyData[location.key];
    this.commit(
      withMonth(state, location.key, { ...month, expenses: month.expenses.filter((e) => e.id !== id) }),
    );
  }

  // --- Internals ---

  private withDailySpends(month: MonthlyBudget): [MonthlyBudget, Category] {
    const existing = month.categories.find(isDailySpends);
    if (existing) return [month, existing];
    const created = dailySpendsCategory(this.ids.next());
    return [{ ...month, categories: [...month.categories, created] }, created];
  }

  /** Wholesale replacement (load or external push); no merge, no persist */
  private replaceState(state: AppState): void {
    this.ids.advancePast(maxEntityId(state));
    this.update({ appState: state });
    this.ensureMonth(this.snapshot.currentMonth);
  }

  private commit(next: AppState): void {
    this.update({ appState: next });
    this.persist(next);
  }

  private persist(state: AppState): void {
    let pending: Promise<void>;
    try {
      pending = this.persistence.save(state);
    } catch (error) {
      pending = Promise.reject(error);
    }
    void pending.catch((error: unknown) => {
      console.warn('[FinanceStore] Error writing state:', error);
    });
  }

  private async authenticate(action: (auth: AuthPort) => Promise<void>): Promise<void> {
    const auth = this.auth;
    if (!auth) {
      console.warn('[FinanceStore] No authentication configured for this backend');
      return;
    }
    this.update({ isAuthenticating: true });
    let signedIn = false;
    try {
      await action(auth);
      signedIn = true;
      this.update({ authError: null });
    } catch (error) {
      this.update({ authError: error instanceof Error ? error.message : 'Authentication failed' });
    } finally {
      this.update({ isAuthenticating: false });
    }
    if (signedIn) await this.start();
  }

  private readTheme(): ThemePreference {
    try {
      return this.preferences.getTheme();
    } catch (error) {
      console.warn('[FinanceStore] Could not read theme preference:', error);
      return 'system';
    }
  }

  private stopListening(): void {
    if (this.detachRemote) {
      this.detachRemote();
      this.detachRemote = null;
    }
  }

  private update(patch: Partial<FinanceSnapshot>): void {
    this.snapshot = { ...this.snapshot, ...patch };
    for (const listener of this.listeners) listener();
  }
}
