import admin from "firebase-admin";
import { z } from "zod";
import { log, logError } from "./logger";
import type { Order } from "./orders/types";

/** The whole queue, written in one piece on every mutation. */
export interface QueueSnapshot {
  patientId: string;
  orders: readonly Order[];
  savedAt: number;
}

export interface QueueStore {
  load(key: string): Promise<QueueSnapshot | null>;
  save(key: string, snapshot: QueueSnapshot): Promise<void>;
}

// ============================================================================
// Snapshot schema
// ============================================================================

const safetyWarningSchema = z.object({
  type: z.enum(["allergy", "drug_interaction", "duplicate_order", "contraindication"]),
  severity: z.enum(["high", "moderate", "low"]),
  message: z.string(),
  details: z.string().optional(),
});

const persistedOrderSchema = z.object({
  id: z.string().min(1),
  type: z.enum(["lab", "imaging", "medication"]),
  name: z.string().min(1),
  displayName: z.string(),
  details: z.string(),
  code: z.string(),
  status: z.enum(["pending", "confirmed", "cancelled"]),
  createdAt: z.number(),
  warnings: z.array(safetyWarningSchema).default([]),
  requiresConfirmation: z.boolean(),
  orderSetId: z.string().optional(),
  dose: z.string().optional(),
  frequency: z.string().optional(),
  duration: z.string().optional(),
  route: z.string().optional(),
  prn: z.boolean().optional(),
  contrast: z.boolean().nullable().optional(),
  bodyPart: z.string().optional(),
  laterality: z.enum(["left", "right", "bilateral"]).optional(),
});

export const queueSnapshotSchema = z.object({
  patientId: z.string().min(1),
  orders: z.array(persistedOrderSchema),
  savedAt: z.number(),
});

/**
 * Parse a stored record. An unreadable record is logged and treated as
 * absent, so the queue starts empty instead of failing the encounter.
 */
export function sanitizeQueueSnapshot(raw: unknown): QueueSnapshot | null {
  const parsed = queueSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    logError("[sanitizeQueueSnapshot] Failed to parse persisted queue:", parsed.error.errors);
    return null;
  }
  return {
    patientId: parsed.data.patientId,
    orders: parsed.data.orders.map((order) => Object.freeze({ ...order, warnings: Object.freeze(order.warnings) })),
    savedAt: parsed.data.savedAt,
  };
}

// ============================================================================
// Stores
// ============================================================================

/** Process-local store; records are kept serialized so callers never share references. */
export class MemoryQueueStore implements QueueStore {
  private records = new Map<string, string>();

  async load(key: string): Promise<QueueSnapshot | null> {
    const raw = this.records.get(key);
    return raw === undefined ? null : sanitizeQueueSnapshot(JSON.parse(raw));
  }

  async save(key: string, snapshot: QueueSnapshot): Promise<void> {
    this.records.set(key, JSON.stringify(snapshot));
  }
}

/** The slice of the Firestore client the queue store uses. */
export interface QueueDatabase {
  collection(name: string): {
    doc(id: string): {
      get(): Promise<{ readonly exists: boolean; data(): unknown }>;
      set(data: Record<string, unknown>): Promise<unknown>;
    };
  };
}

export class FirestoreQueueStore implements QueueStore {
  constructor(private readonly db: QueueDatabase, private readonly collection: string) {}

  async load(key: string): Promise<QueueSnapshot | null> {
    const snap = await this.db.collection(this.collection).doc(key).get();
    if (!snap.exists) return null;
    return sanitizeQueueSnapshot(snap.data());
  }

  async save(key: string, snapshot: QueueSnapshot): Promise<void> {
    await this.db
      .collection(this.collection)
      .doc(key)
      .set({
        patientId: snapshot.patientId,
        orders: snapshot.orders,
        savedAt: snapshot.savedAt,
        updatedAt: admin.firestore.FieldValue.serverTimestamp(),
      });
  }
}

export type QueueStoreKind = "firestore" | "memory";

/**
 * Pick the queue store. Firestore is required unless memory is asked for
 * explicitly; a memory run is logged as not durable.
 */
export function createQueueStore(
  kind: QueueStoreKind,
  collection: string,
  getDb: () => QueueDatabase | null
): QueueStore {
  if (kind === "memory") {
    logError("[store] ORDER_QUEUE_STORE=memory: confirmed orders will not survive a restart");
    return new MemoryQueueStore();
  }
  const db = getDb();
  if (!db) {
    throw new Error("Firestore is unavailable; configure credentials or set ORDER_QUEUE_STORE=memory for a non-durable run");
  }
  log(`[store] Persisting order queues to Firestore collection ${collection}`);
  return new FirestoreQueueStore(db, collection);
}
