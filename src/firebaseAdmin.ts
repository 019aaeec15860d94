import admin from "firebase-admin";
import { log, logError } from "./logger";

// Idempotent firebase-admin initialization for the order queue store.
// Credentials come from FIREBASE_SERVICE_ACCOUNT (inline JSON) or the
// application default (GOOGLE_APPLICATION_CREDENTIALS). Returns null when
// the app cannot be initialized; callers treat that as "no Firestore".

let app: admin.app.App | null = null;
let firestoreInstance: admin.firestore.Firestore | null = null;
let warned = false;

function warnOnce(message: string, err: unknown) {
  if (warned) return;
  warned = true;
  logError(message, err);
}

function getCredential(): admin.credential.Credential | undefined {
  const inline = process.env.FIREBASE_SERVICE_ACCOUNT;
  if (!inline) return undefined;
  try {
    const parsed: admin.ServiceAccount = JSON.parse(inline);
    return admin.credential.cert(parsed);
  } catch (err) {
    warnOnce("[firebase-admin] Failed to parse FIREBASE_SERVICE_ACCOUNT JSON", err);
    return undefined;
  }
}

function initApp(): admin.app.App | null {
  if (app) return app;
  try {
    const credential = getCredential();
    app = credential ? admin.initializeApp({ credential }) : admin.initializeApp();
    return app;
  } catch (err) {
    warnOnce("[firebase-admin] init failed; Firestore queue store disabled", err);
    return null;
  }
}

export function getFirestore(): admin.firestore.Firestore | null {
  if (firestoreInstance) return firestoreInstance;
  const initialized = initApp();
  if (!initialized) return null;
  firestoreInstance = admin.firestore(initialized);
  try {
    firestoreInstance.settings({ ignoreUndefinedProperties: true });
  } catch (err) {
    log("[firebase-admin] Firestore settings already applied", err);
  }
  return firestoreInstance;
}

