/**
 * Remote backend: one Firestore document per signed-in user holding the
 * whole app state. Every save overwrites the document; the live listener
 * pushes the document back whenever it changes (this or another device).
 */
import { doc, getDoc, onSnapshot, setDoc, type Firestore } from 'firebase/firestore';
import { decodeAppState, encodeAppState, type SnapshotDocument } from '../db/snapshot';
import { emptyAppState, type AppState } from '../domain/types';
import type { PersistencePort } from '../store/ports';

/** The three document operations the sync needs */
export interface DocumentStore {
  read(collection: string, id: string): Promise<unknown | undefined>;
  write(collection: string, id: string, data: SnapshotDocument): Promise<void>;
  watch(
    collection: string,
    id: string,
    onData: (data: unknown | undefined) => void,
    onError: (error: Error) => void,
  ): () => void;
}

export function firestoreDocumentStore(db: Firestore): DocumentStore {
  return {
    async read(collection, id) {
      const snapshot = await getDoc(doc(db, collection, id));
      return snapshot.exists() ? snapshot.data() : undefined;
    },
    async write(collection, id, data) {
      await setDoc(doc(db, collection, id), data);
    },
    watch(collection, id, onData, onError) {
      return onSnapshot(
        doc(db, collection, id),
        (snapshot) => onData(snapshot.exists() ? snapshot.data() : undefined),
        onError,
      );
    },
  };
}

export class FirestoreSync implements PersistencePort {
  constructor(
    private readonly documents: DocumentStore,
    private readonly userId: () => string | null,
    private readonly collection = 'users',
  ) {}

  async load(): Promise<AppState | null> {
    const uid = this.userId();
    if (!uid) return null;
    const data = await this.documents.read(this.collection, uid);
    if (data === undefined) return null;
    return decodeAppState(data);
  }

  async save(state: AppState): Promise<void> {
    const uid = this.userId();
    if (!uid) {
      console.warn('[Firestore] Not signed in, skipping save');
      return;
    }
    await this.documents.write(this.collection, uid, encodeAppState(state));
  }

  subscribe(onExternalUpdate: (state: AppState) => void): () => void {
    const uid = this.userId();
    if (!uid) return () => {};
    console.log(`[Firestore] Listening to ${this.collection}/${uid}`);
    return this.documents.watch(
      this.collection,
      uid,
      (data) => {
        // No document yet, or one that no longer decodes: start fresh
        const state = data === undefined ? null : decodeAppState(data);
        onExternalUpdate(state ?? emptyAppState());
      },
      (error) => console.warn('[Firestore] Listen failed:', error),
    );
  }
}
