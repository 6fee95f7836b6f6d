export type Backend = 'local' | 'remote';

export interface FirebaseSettings {
  apiKey?: string;
  authDomain?: string;
  projectId?: string;
  storageBucket?: string;
  messagingSenderId?: string;
  appId?: string;
}

export interface AppConfig {
  backend: Backend;
  dbPath: string;
  usersCollection: string;
  firebase: FirebaseSettings;
}

type Env = Record<string, string | undefined>;

const essentialFirebaseKeys: (keyof FirebaseSettings)[] = ['apiKey', 'authDomain', 'projectId', 'appId'];

function parseBackend(value: string | undefined): Backend {
  if (value === undefined || value === '' || value === 'local') return 'local';
  if (value === 'remote') return 'remote';
  throw new Error(`[Config] FINANCE_BACKEND must be "local" or "remote", got "${value}"`);
}

export function loadConfig(env: Env = process.env): AppConfig {
  const backend = parseBackend(env.FINANCE_BACKEND);
  const firebase: FirebaseSettings = {
    apiKey: env.FINANCE_FIREBASE_API_KEY,
    authDomain: env.FINANCE_FIREBASE_AUTH_DOMAIN,
    projectId: env.FINANCE_FIREBASE_PROJECT_ID,
    storageBucket: env.FINANCE_FIREBASE_STORAGE_BUCKET,
    messagingSenderId: env.FINANCE_FIREBASE_MESSAGING_SENDER_ID,
    appId: env.FINANCE_FIREBASE_APP_ID,
  };

  if (backend === 'remote') {
    if (!firebase.projectId) {
      throw new Error('[Config] FINANCE_FIREBASE_PROJECT_ID is required for the remote backend');
    }
    const missing = essentialFirebaseKeys.filter((key) => !firebase[key]);
    if (missing.length > 0) {
      console.warn(
        `[Config] Firebase configuration might be incomplete. Missing: ${missing
          .map((k) => `FINANCE_FIREBASE_${k.replace(/[A-Z]/g, (c) => `_${c}`).toUpperCase()}`)
          .join(', ')}`,
      );
    }
  }

  return {
    backend,
    dbPath: env.FINANCE_DB_PATH || 'finance.db',
    usersCollection: env.FINANCE_USERS_COLLECTION || 'users',
    firebase,
  };
}
