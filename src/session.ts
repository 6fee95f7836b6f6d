import { FirebaseAuthSession } from './api/auth';
import { initFirebase } from './api/firebase';
import { FirestoreSync, firestoreDocumentStore } from './api/firestoreSync';
import type { AppConfig } from './config';
import { KvDatabase } from './db/database';
import { LocalPreferences, LocalSnapshotStore } from './db/repo';
import { FinanceStore } from './store/financeStore';

export interface FinanceSession {
  store: FinanceStore;
  close(): void;
}

/**
 * Wires a store to the configured backend. Preferences always live in the
 * local database; app state goes to the snapshot table or to Firestore.
 */
export function createFinanceSession(config: AppConfig, now?: () => Date): FinanceSession {
  const kv = new KvDatabase(config.dbPath);
  const preferences = new LocalPreferences(kv);

  let store: FinanceStore;
  if (config.backend === 'remote') {
    const firebase = initFirebase(config.firebase);
    const auth = new FirebaseAuthSession(firebase.auth);
    const persistence = new FirestoreSync(
      firestoreDocumentStore(firebase.db),
      () => auth.currentUserId(),
      config.usersCollection,
    );
    store = new FinanceStore({ persistence, preferences, auth, now });
  } else {
    store = new FinanceStore({ persistence: new LocalSnapshotStore(kv), preferences, now });
  }

  return {
    store,
    close() {
      store.dispose();
      kv.close();
    },
  };
}
