/**
 * Per-patient queue of confirmed orders.
 *
 * Memory is authoritative: every mutation updates the in-memory list first and
 * then writes the whole snapshot. A failed write is logged and marks the queue
 * unhealthy; the next mutation writes the full state again.
 *
 * A snapshot is never written before the stored queue has been read, so a
 * failed load cannot overwrite orders confirmed before a restart.
 */

import { log, logError } from "../logger";
import type { QueueStore } from "../persistence";
import { PlanLineStager, planLineFor } from "../planSection";
import { withStatus } from "./confirmation";
import type { Order } from "./types";

export interface OrderQueueOptions {
  store: QueueStore;
  /** Record key the snapshot is written under. */
  storageKey: string;
  stager: PlanLineStager;
  now?: () => number;
}

export class OrderQueue {
  private orders: Order[] = [];
  private currentPatientId: string | null = null;
  private healthy = true;
  /** False while the stored queue for the current patient is still unread. */
  private restored = true;
  private readonly now: () => number;

  constructor(private readonly options: OrderQueueOptions) {
    this.now = options.now ?? Date.now;
  }

  get patientId(): string | null {
    return this.currentPatientId;
  }

  get size(): number {
    return this.orders.length;
  }

  get persistenceHealthy(): boolean {
    return this.healthy;
  }

  list(): readonly Order[] {
    return [...this.orders];
  }

  /**
   * Switch to the given patient. The persisted queue is restored only when it
   * was saved for the same patient; anything else starts empty. Reloading the
   * current patient keeps the in-memory queue and retries whatever is owed to
   * the store.
   */
  async loadForPatient(patientId: string | null): Promise<void> {
    if (patientId !== null && patientId === this.currentPatientId) {
      await this.ensureRestored();
      if (this.restored && !this.healthy) await this.persist();
      return;
    }

    this.orders = [];
    this.currentPatientId = patientId;
    this.restored = patientId === null;
    await this.ensureRestored();
  }

  async add(order: Order): Promise<Order> {
    await this.ensureRestored();
    const confirmed = order.status === "confirmed" ? order : withStatus(order, "confirmed");
    this.orders.push(confirmed);
    this.options.stager.stage(planLineFor(confirmed.displayName));
    await this.persist();
    return confirmed;
  }

  async cancelLast(): Promise<Order | null> {
    await this.ensureRestored();
    const removed = this.orders.pop();
    if (!removed) return null;
    this.options.stager.unstage(planLineFor(removed.displayName));
    await this.persist();
    return withStatus(removed, "cancelled");
  }

  /** Remove by 1-based position, as spoken ("delete 2"). */
  async removeAt(position: number): Promise<Order | null> {
    await this.ensureRestored();
    if (!Number.isInteger(position) || position < 1 || position > this.orders.length) return null;
    const [removed] = this.orders.splice(position - 1, 1);
    this.options.stager.unstage(planLineFor(removed.displayName));
    await this.persist();
    return withStatus(removed, "cancelled");
  }

  async clearAll(): Promise<number> {
    await this.ensureRestored();
    const cleared = this.orders.length;
    this.orders = [];
    this.options.stager.clear();
    // Clearing supersedes whatever the store still holds.
    this.restored = true;
    await this.persist();
    return cleared;
  }

  /** Read the stored queue if it is still owed; stored orders go ahead of any placed since. */
  private async ensureRestored() {
    const patientId = this.currentPatientId;
    if (this.restored || !patientId) return;
    try {
      const snapshot = await this.options.store.load(this.options.storageKey);
      if (snapshot && snapshot.patientId === patientId) {
        const placed = new Set(this.orders.map((order) => order.id));
        const stored = snapshot.orders
          .filter((order) => !placed.has(order.id))
          .map((order) => withStatus(order, "confirmed"));
        this.orders = [...stored, ...this.orders];
        log(`[orderQueue] Restored ${stored.length} order(s) for patient ${patientId}`);
      }
      this.restored = true;
    } catch (err) {
      this.healthy = false;
      logError("[orderQueue] Failed to load persisted queue:", err);
    }
  }

  private async persist() {
    const patientId = this.currentPatientId;
    if (!patientId) return;
    if (!this.restored) {
      logError(`[orderQueue] Stored queue for patient ${patientId} is unread; keeping changes in memory only`);
      return;
    }
    try {
      await this.options.store.save(this.options.storageKey, {
        patientId,
        orders: [...this.orders],
        savedAt: this.now(),
      });
      if (!this.healthy) log("[orderQueue] Persistence recovered");
      this.healthy = true;
    } catch (err) {
      this.healthy = false;
      logError("[orderQueue] Failed to persist order queue:", err);
    }
  }
}
