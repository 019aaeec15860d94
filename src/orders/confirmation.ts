import type { Order, OrderStatus } from "./types";

export type ConfirmationState = "idle" | "awaiting_response";

export function withStatus(order: Order, status: OrderStatus): Order {
  return Object.freeze({ ...order, status });
}

/**
 * Single pending-order slot. A warned candidate waits here, outside the queue,
 * until the clinician says yes or no.
 */
export class ConfirmationSlot {
  private pending: Order | null = null;

  get state(): ConfirmationState {
    return this.pending ? "awaiting_response" : "idle";
  }

  get pendingOrder(): Order | null {
    return this.pending;
  }

  /** Returns false when another order is already waiting; the held order is left alone. */
  hold(order: Order): boolean {
    if (this.pending) return false;
    this.pending = order;
    return true;
  }

  /** Releases the held order as confirmed, or null when nothing was held. */
  confirm(): Order | null {
    const held = this.pending;
    if (!held) return null;
    this.pending = null;
    return withStatus(held, "confirmed");
  }

  /** Discards the held order; it comes back cancelled and is never queued. */
  reject(): Order | null {
    const held = this.pending;
    if (!held) return null;
    this.pending = null;
    return withStatus(held, "cancelled");
  }

  clear() {
    this.pending = null;
  }
}
