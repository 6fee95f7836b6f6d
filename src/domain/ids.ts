import type { AppState, EntityId } from './types';

/**
 * Monotonic integer ids. Time-based so ids stay roughly increasing across
 * sessions, bumped by one whenever the clock has not moved past the last id.
 * Date.now() * 1000 stays well inside Number.MAX_SAFE_INTEGER.
 */
export class IdGenerator {
  private last = 0;

  constructor(private readonly clock: () => number = Date.now) {}

  next(): EntityId {
    const candidate = this.clock() * 1000;
    this.last = candidate > this.last ? candidate : this.last + 1;
    return this.last;
  }

  /** Never hand out an id at or below `id` from now on */
  advancePast(id: EntityId): void {
    if (id > this.last) this.last = id;
  }
}

export function maxEntityId(state: AppState): EntityId {
  let max = 0;
  for (const account of state.bankAccounts) max = Math.max(max, account.id);
  for (const month of Object.values(state.monthlyData)) {
    for (const c of month.categories) max = Math.max(max, c.id);
    for (const e of month.expenses) max = Math.max(max, e.id);
  }
  return max;
}
