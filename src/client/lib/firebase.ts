import { getApp, getApps, initializeApp } from 'firebase/app';
import { getAuth, type Auth } from 'firebase/auth';
import type { PublicConfig } from '../../shared/api.js';

export type FirebaseWebConfig = NonNullable<PublicConfig['firebase']>;

export function getFirebaseAuth(firebaseConfig: FirebaseWebConfig): Auth {
  const firebaseApp = !getApps().length
    ? initializeApp(firebaseConfig)
    : getApp();
  return getAuth(firebaseApp);
}

/** Maps Firebase auth error codes to something a user can act on. */
export function describeAuthError(err: unknown): string {
  const code = err && typeof err === 'object' && 'code' in err ? String(err.code) : '';
  switch (code) {
    case 'auth/invalid-credential':
    case 'auth/wrong-password':
    case 'auth/user-not-found':
      return 'Invalid email or password';
    case 'auth/email-already-in-use':
      return 'An account with this email already exists';
    case 'auth/weak-password':
      return 'Password should be at least 6 characters';
    case 'auth/invalid-email':
      return 'Please enter a valid email address';
    case 'auth/too-many-requests':
      return 'Too many attempts, try again later';
    default:
      return 'Authentication failed';
  }
}
