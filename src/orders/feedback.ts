/**
 * Spoken and overlay phrasing for engine results.
 *
 * Feedback is read aloud on the headset, so it stays short; the overlay carries
 * the full list when there is one.
 */

import type { OrderSet } from "../catalog/types";
import type { OrderSetResult } from "./orderSets";
import type { Order, OverlayPayload, SafetyWarning, UnrecognizedHint } from "./types";

export type Reply = {
  feedback: string;
  overlay?: OverlayPayload;
};

export const NO_PATIENT = "No patient loaded. Load a patient before placing orders.";
export const NOTHING_PENDING = "No order is awaiting confirmation.";
export const LOCK_BUSY = "Still working on the last command. Please try again.";

export function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

function warningLine(warning: SafetyWarning): string {
  return `[${warning.severity.toUpperCase()}] ${warning.message}`;
}

// ============================================================================
// Single orders
// ============================================================================

export function orderPlaced(order: Order, controlled = false): Reply {
  const suffix = controlled ? " Controlled substance." : "";
  return { feedback: `Ordered ${order.displayName}.${suffix}` };
}

export function confirmationPrompt(order: Order): Reply {
  const spoken = order.warnings.map((warning) => warning.message).join(". ");
  return {
    feedback: `${order.displayName}: ${spoken}. Say confirm to place the order or reject to cancel.`,
    overlay: {
      title: `${pluralize(order.warnings.length, "warning")}: ${order.displayName}`,
      body: [...order.warnings.map(warningLine), "", "Say \"confirm\" or \"reject\"."].join("\n"),
    },
  };
}

export function pendingFirst(pending: Order): Reply {
  return {
    feedback: `Please resolve the pending order first: ${pending.displayName}. Say confirm or reject.`,
  };
}

export function orderConfirmed(order: Order): Reply {
  return { feedback: `Confirmed. Ordered ${order.displayName}.` };
}

export function orderRejected(order: Order): Reply {
  return { feedback: `Cancelled ${order.displayName}. It was not ordered.` };
}

// ============================================================================
// Queue commands
// ============================================================================

export function lastCancelled(order: Order | null): Reply {
  return { feedback: order ? `Removed ${order.displayName}.` : "No orders to cancel." };
}

export function ordersCleared(count: number): Reply {
  return { feedback: count > 0 ? `Cleared ${pluralize(count, "order")}.` : "No orders to clear." };
}

export function orderRemoved(position: number, removed: Order | null, remaining: number): Reply {
  if (removed) return { feedback: `Removed order ${position}: ${removed.displayName}.` };
  return { feedback: `There is no order ${position}. The queue has ${pluralize(remaining, "order")}.` };
}

export function orderList(orders: readonly Order[]): Reply {
  if (orders.length === 0) return { feedback: "No orders yet." };
  const lines = orders.map((order, index) => `${index + 1}. ${order.displayName}`);
  return {
    feedback: `${pluralize(orders.length, "order")}: ${orders.map((order) => order.displayName).join(", ")}.`,
    overlay: { title: "Orders", body: lines.join("\n") },
  };
}

// ============================================================================
// Order sets
// ============================================================================

export function orderSetList(sets: readonly OrderSet[]): Reply {
  return {
    feedback: `Available order sets: ${sets.map((set) => set.name).join(", ")}.`,
    overlay: {
      title: "Order sets",
      body: sets.map((set) => `${set.name}: ${set.description}`).join("\n"),
    },
  };
}

export function orderSetPreview(set: OrderSet, items: readonly string[]): Reply {
  return {
    feedback: `${set.name} includes ${items.join(", ")}.`,
    overlay: { title: set.name, body: items.map((item) => `• ${item}`).join("\n") },
  };
}

/** High-severity warnings lead the summary; bundles never pause, and the summary says so. */
export function orderSetSummary(result: OrderSetResult): Reply {
  const names = result.ordered.map((order) => order.displayName);
  const spoken: string[] = [];

  if (result.highSeverity.length > 0) {
    spoken.push(`High severity warning: ${result.highSeverity.join(". ")}.`);
  }
  spoken.push(`${result.orderSet.name}: ordered ${pluralize(names.length, "item")}.`);
  if (result.warnings.length > 0) {
    spoken.push(
      `${pluralize(result.warnings.length, "warning")} flagged. Order set items were queued with their warnings for review.`
    );
  }
  if (result.skipped.length > 0) {
    spoken.push(`Skipped ${result.skipped.join(", ")}.`);
  }

  const body = [
    ...result.highSeverity.map((line) => `[HIGH] ${line}`),
    ...names.map((name) => `• ${name}`),
    ...result.warnings.filter((line) => !result.highSeverity.includes(line)).map((line) => `[!] ${line}`),
  ];

  return { feedback: spoken.join(" "), overlay: { title: result.orderSet.name, body: body.join("\n") } };
}

// ============================================================================
// Unrecognized input
// ============================================================================

const UNRECOGNIZED: Record<UnrecognizedHint, string> = {
  command: 'Command not recognized. Try "order CBC" or "prescribe amoxicillin".',
  order: 'Order not recognized. Try a lab or imaging study, for example "order chest x-ray".',
  medication: 'Medication not recognized. Try "prescribe amoxicillin 500 milligrams".',
  order_set: 'Order set not recognized. Say "list order sets" to hear the options.',
};

export function unrecognized(hint: UnrecognizedHint): Reply {
  return { feedback: UNRECOGNIZED[hint] };
}
