import admin from 'firebase-admin';
import type { ServiceAccount } from 'firebase-admin/app';
import type { Auth, DecodedIdToken } from 'firebase-admin/auth';
import { config } from '@config/app.config.js';

// Uses FIREBASE_SERVICE_ACCOUNT (JSON string) or falls back to GOOGLE_APPLICATION_CREDENTIALS
function getCredential() {
  if (config.firebase.serviceAccount) {
    const serviceAccount: ServiceAccount = JSON.parse(config.firebase.serviceAccount);
    return admin.credential.cert(serviceAccount);
  }
  return admin.credential.applicationDefault();
}

let auth: Auth | null = null;

// Initialized on first use so the public surface runs without Firebase credentials
function getAuth(): Auth {
  if (!auth) {
    const app = admin.initializeApp({
      credential: getCredential(),
      projectId: config.firebase.projectId,
    });
    auth = app.auth();
  }
  return auth;
}

/**
 * Verify Firebase ID token and return decoded token.
 */
export async function verifyToken(idToken: string): Promise<DecodedIdToken> {
  return getAuth().verifyIdToken(idToken);
}
