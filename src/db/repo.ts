/**
 * Repository layer over the local kv database: the app-state snapshot
 * (local backend) and device preferences (both backends).
 */
import type { AppState, ThemePreference } from '../domain/types';
import type { PersistencePort, PreferencesPort } from '../store/ports';
import type { KvDatabase } from './database';
import { decodeSnapshot, encodeSnapshot } from './snapshot';

export const APP_STATE_KEY = 'app_state';
export const THEME_KEY = 'theme_preference';
export const ONBOARDING_KEY = 'has_seen_onboarding';

const THEMES: readonly ThemePreference[] = ['system', 'dark', 'light'];

function isThemePreference(value: string): value is ThemePreference {
  return THEMES.some((theme) => theme === value);
}

/** Whole-state snapshot, rewritten on every save */
export class LocalSnapshotStore implements PersistencePort {
  constructor(private readonly db: KvDatabase) {}

  async load(): Promise<AppState | null> {
    const text = this.db.get(APP_STATE_KEY);
    if (text === null) return null;
    return decodeSnapshot(text);
  }

  async save(state: AppState): Promise<void> {
    this.db.put(APP_STATE_KEY, encodeSnapshot(state));
  }
}

export class LocalPreferences implements PreferencesPort {
  constructor(private readonly db: KvDatabase) {}

  getTheme(): ThemePreference {
    const stored = this.db.get(THEME_KEY);
    return stored !== null && isThemePreference(stored) ? stored : 'system';
  }

  setTheme(theme: ThemePreference): void {
    if (theme === 'system') {
      this.db.delete(THEME_KEY);
    } else {
      this.db.put(THEME_KEY, theme);
    }
  }

  hasSeenOnboarding(): boolean {
    return this.db.get(ONBOARDING_KEY) === 'true';
  }

  setOnboardingSeen(): void {
    this.db.put(ONBOARDING_KEY, 'true');
  }
}
