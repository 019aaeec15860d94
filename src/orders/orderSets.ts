/**
 * Order set processor.
 *
 * Bundles never pause: every item is safety-checked and queued with its
 * warnings attached. Single orders stop for confirmation on any warning; a
 * bundle reports its warnings in the summary instead.
 */

import { findByKey, ORDER_SETS } from "../catalog/catalogs";
import type { CatalogEntry, OrderSet, OrderSetItem } from "../catalog/types";
import { log } from "../logger";
import type { OrderQueue } from "./orderQueue";
import { buildCandidateOrder } from "./orderParser";
import { applySafety, evaluateOrderSafety } from "./safetyRules";
import type { Order } from "./types";

export interface OrderSetContext {
  queue: OrderQueue;
  allergies: readonly string[];
  medications: readonly string[];
}

export interface OrderSetResult {
  orderSet: OrderSet;
  ordered: Order[];
  /** "<item>: <message>" for every warning, in item order. */
  warnings: string[];
  /** The high-severity subset of `warnings`. */
  highSeverity: string[];
  /** Catalog keys that did not resolve. */
  skipped: string[];
}

function entryFor(item: OrderSetItem): CatalogEntry | null {
  return item.type === "lab" ? findByKey("lab", item.catalogKey) : findByKey("imaging", item.catalogKey);
}

export async function processOrderSet(orderSet: OrderSet, context: OrderSetContext): Promise<OrderSetResult> {
  const result: OrderSetResult = { orderSet, ordered: [], warnings: [], highSeverity: [], skipped: [] };

  for (const item of orderSet.items) {
    const entry = entryFor(item);
    if (!entry) {
      log(`[orderSets] ${orderSet.id}: no ${item.type} catalog entry for ${item.catalogKey}, skipping`);
      result.skipped.push(item.catalogKey);
      continue;
    }

    const candidate = buildCandidateOrder(item.detailHint ?? "", entry, {
      details: entry.code,
      orderSetId: orderSet.id,
    });
    const warnings = evaluateOrderSafety(candidate, {
      queue: context.queue.list(),
      allergies: context.allergies,
      medications: context.medications,
    });
    const queued = await context.queue.add(applySafety(candidate, warnings));

    result.ordered.push(queued);
    for (const warning of warnings) {
      const line = `${queued.displayName}: ${warning.message}`;
      result.warnings.push(line);
      if (warning.severity === "high") result.highSeverity.push(line);
    }
  }

  return result;
}

export function listOrderSets(): readonly OrderSet[] {
  return ORDER_SETS;
}

/** Item names of a bundle, without ordering anything. */
export function previewOrderSet(orderSet: OrderSet): string[] {
  return orderSet.items.map((item) => {
    const entry = entryFor(item);
    const name = entry ? entry.name : item.catalogKey;
    return item.detailHint ? `${name} (${item.detailHint})` : name;
  });
}
