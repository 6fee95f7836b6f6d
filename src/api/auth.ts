import {
  createUserWithEmailAndPassword,
  signInWithEmailAndPassword,
  signOut,
  type Auth,
} from 'firebase/auth';
import type { AuthPort } from '../store/ports';

/** E-mail / password accounts on Firebase Auth */
export class FirebaseAuthSession implements AuthPort {
  constructor(private readonly auth: Auth) {}

  currentUserId(): string | null {
    return this.auth.currentUser?.uid ?? null;
  }

  async signIn(email: string, password: string): Promise<void> {
    await signInWithEmailAndPassword(this.auth, email, password);
    console.log('[Auth] Signed in');
  }

  async signUp(email: string, password: string): Promise<void> {
    await createUserWithEmailAndPassword(this.auth, email, password);
    console.log('[Auth] Account created');
  }

  async signOut(): Promise<void> {
    await signOut(this.auth);
    console.log('[Auth] Signed out');
  }
}
