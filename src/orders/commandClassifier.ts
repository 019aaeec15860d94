/**
 * Turns a finalized transcript into an Intent, once, before the engine sees it.
 *
 * Checked in precedence order: confirmation replies, queue and browse commands,
 * order set previews, then order verbs. Order sets resolve before single
 * entries so "order chest pain workup" never lands on a lab alias.
 */

import {
  resolveImaging,
  resolveLab,
  resolveMedication,
  resolveOrderSet,
  resolveOrderSetForPreview,
} from "../catalog/aliasResolver";
import type { Intent } from "./types";

// Whole-utterance replies only: "place order for a CBC" is a new order, not a yes.
const CONFIRM_REPLIES = new Set(["yes", "yeah", "confirm", "confirm order", "place order", "place the order", "go ahead"]);
const REJECT_REPLIES = new Set(["no", "reject", "cancel"]);
const REJECT_PREFIX = /^(?:don't|do not) order(?: (?:that|it|this))?$/;

const CLEAR_PHRASES = ["clear all order", "delete all order", "remove all order"];
const CANCEL_LAST_PHRASES = ["cancel last order", "remove last order", "cancel order", "remove order", "delete order"];
const LIST_PHRASES = ["show orders", "list orders", "pending orders", "what are the orders", "read orders"];
const PREVIEW_PHRASES = ["what's in", "whats in", "what is in", "preview", "show me"];

const LIST_ORDER_SETS = /\b(list|show|available|what)\b.*\border sets?\b/;
const REMOVE_AT = /^(?:delete|remove) (?:order )?(\d+)$/;
const ORDER_VERB = /\b(order|prescribe|start|get|give)\b/;
const MEDICATION_VERB = /\b(prescribe|start|give)\b/;

export function normalizeUtterance(text: string): string {
  return text
    .trim()
    .toLowerCase()
    .replace(/[.!?,;:]+$/, "")
    .replace(/\s+/g, " ");
}

const includesAny = (text: string, phrases: readonly string[]) => phrases.some((phrase) => text.includes(phrase));

export function classifyUtterance(raw: string): Intent {
  const text = normalizeUtterance(raw);

  if (CONFIRM_REPLIES.has(text)) return { kind: "confirm_pending" };
  if (REJECT_REPLIES.has(text) || REJECT_PREFIX.test(text)) return { kind: "reject_pending" };

  if (LIST_ORDER_SETS.test(text)) return { kind: "list_order_sets" };
  if (includesAny(text, CLEAR_PHRASES)) return { kind: "clear_orders" };
  const removeAt = text.match(REMOVE_AT);
  if (removeAt) return { kind: "remove_order", position: Number(removeAt[1]) };
  if (includesAny(text, CANCEL_LAST_PHRASES)) return { kind: "cancel_last" };
  if (includesAny(text, LIST_PHRASES)) return { kind: "list_orders" };

  if (includesAny(text, PREVIEW_PHRASES)) {
    const orderSet = resolveOrderSetForPreview(text);
    return orderSet ? { kind: "preview_order_set", orderSet } : { kind: "unrecognized", text, hint: "order_set" };
  }

  if (!ORDER_VERB.test(text)) return { kind: "unrecognized", text, hint: "command" };

  const orderSet = resolveOrderSet(text);
  if (orderSet) return { kind: "order_set", text, orderSet };

  if (MEDICATION_VERB.test(text)) {
    const medication = resolveMedication(text);
    return medication
      ? { kind: "prescribe_medication", text, entry: medication }
      : { kind: "unrecognized", text, hint: "medication" };
  }

  const imaging = resolveImaging(text);
  if (imaging) return { kind: "order_imaging", text, entry: imaging };
  const lab = resolveLab(text);
  if (lab) return { kind: "order_lab", text, entry: lab };
  const medication = resolveMedication(text);
  if (medication) return { kind: "prescribe_medication", text, entry: medication };

  return { kind: "unrecognized", text, hint: "order" };
}
