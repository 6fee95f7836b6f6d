import type { AppState, ThemePreference } from '../domain/types';

/**
 * Where the store keeps its state. The store never learns which backend
 * sits behind this.
 */
export interface PersistencePort {
  /** Previously saved state, or null when nothing has been saved yet */
  load(): Promise<AppState | null>;
  /** Writes the whole state. Rejections are logged by the caller, never retried. */
  save(state: AppState): Promise<void>;
  /**
   * Live backends push external changes here. Each push replaces local
   * state entirely. Returns the unsubscribe function.
   */
  subscribe?(onExternalUpdate: (state: AppState) => void): () => void;
}

export interface PreferencesPort {
  getTheme(): ThemePreference;
  setTheme(theme: ThemePreference): void;
  hasSeenOnboarding(): boolean;
  setOnboardingSeen(): void;
}

export interface AuthPort {
  currentUserId(): string | null;
  signIn(email: string, password: string): Promise<void>;
  signUp(email: string, password: string): Promise<void>;
  signOut(): Promise<void>;
}
