import { getApps, initializeApp, type FirebaseApp } from 'firebase/app';
import { getAuth, type Auth } from 'firebase/auth';
import { getFirestore, type Firestore } from 'firebase/firestore';
import type { FirebaseSettings } from '../config';

export interface FirebaseHandles {
  app: FirebaseApp;
  auth: Auth;
  db: Firestore;
}

/** Reuses the already-initialized default app when there is one */
export function initFirebase(settings: FirebaseSettings): FirebaseHandles {
  const existing = getApps();
  const app = existing.length > 0 ? existing[0] : initializeApp(settings);
  if (existing.length === 0) {
    console.log('[Firebase] Initialized with project id:', settings.projectId);
  }
  return { app, auth: getAuth(app), db: getFirestore(app) };
}
