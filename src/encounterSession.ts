/**
 * Encounter session and utterance handling.
 *
 * One EncounterSession per encounter holds everything the order workflow
 * touches: queue, pending-confirmation slot, patient context, plan-line
 * stager and speech sink. `handleUtterance` is the only entry point for
 * transcripts and runs under the encounter lock, so two quick "yes" replies
 * cannot both confirm the same held order.
 */

import type { CatalogEntry } from "./catalog/types";
import { LockTimeoutError, withEncounterLock } from "./encounterLock";
import { logError, logEvent } from "./logger";
import type { QueueStore } from "./persistence";
import { PlanLineStager, PlanSectionWriter } from "./planSection";
import { classifyUtterance } from "./orders/commandClassifier";
import { ConfirmationSlot } from "./orders/confirmation";
import {
  LOCK_BUSY,
  NO_PATIENT,
  NOTHING_PENDING,
  Reply,
  confirmationPrompt,
  lastCancelled,
  orderConfirmed,
  orderList,
  orderPlaced,
  orderRejected,
  orderRemoved,
  orderSetList,
  orderSetPreview,
  orderSetSummary,
  ordersCleared,
  pendingFirst,
  unrecognized,
} from "./orders/feedback";
import { buildCandidateOrder } from "./orders/orderParser";
import { OrderQueue } from "./orders/orderQueue";
import { listOrderSets, previewOrderSet, processOrderSet } from "./orders/orderSets";
import { applySafety, evaluateOrderSafety } from "./orders/safetyRules";
import type { Intent, PatientContext, UtteranceResult } from "./orders/types";

export interface SpeechSink {
  speak(message: string): void;
}

export interface EncounterSessionOptions {
  encounterId: string;
  store: QueueStore;
  storageKey: string;
  speech: SpeechSink;
  now?: () => number;
}

export class EncounterSession {
  readonly encounterId: string;
  readonly queue: OrderQueue;
  readonly confirmation = new ConfirmationSlot();
  readonly stager = new PlanLineStager();
  private readonly speech: SpeechSink;
  private patient: PatientContext | null = null;

  constructor(options: EncounterSessionOptions) {
    this.encounterId = options.encounterId;
    this.speech = options.speech;
    this.queue = new OrderQueue({
      store: options.store,
      storageKey: options.storageKey,
      stager: this.stager,
      now: options.now,
    });
  }

  get patientContext(): PatientContext | null {
    return this.patient;
  }

  /**
   * Set the patient context. The pending order is always dropped, since it was
   * checked against the previous context. A different patient also drops the
   * staged lines and reloads the queue; the same patient keeps both.
   */
  async setPatient(patient: PatientContext | null): Promise<void> {
    await withEncounterLock(this.encounterId, "set_patient", async () => {
      const samePatient = patient !== null && patient.id === this.queue.patientId;
      this.patient = patient;
      this.confirmation.clear();
      if (!samePatient) this.stager.clear();
      await this.queue.loadForPatient(patient ? patient.id : null);
      logEvent("encounter.patient_set", {
        encounterId: this.encounterId,
        patientId: patient ? patient.id : null,
        restored: this.queue.size,
      });
    });
  }

  openNote(writer: PlanSectionWriter) {
    this.stager.open(writer);
  }

  closeNote() {
    this.stager.close();
  }

  speak(message: string) {
    this.speech.speak(message);
  }
}

// ============================================================================
// Utterance handling
// ============================================================================

type BrowseIntent = Extract<Intent, { kind: "unrecognized" | "list_order_sets" | "preview_order_set" }>;
type OrderIntent = Exclude<Intent, BrowseIntent>;

function isBrowseIntent(intent: Intent): intent is BrowseIntent {
  return intent.kind === "unrecognized" || intent.kind === "list_order_sets" || intent.kind === "preview_order_set";
}

/** Commands that need neither a patient nor the queue. */
function browse(intent: BrowseIntent): Reply {
  switch (intent.kind) {
    case "unrecognized":
      return unrecognized(intent.hint);
    case "list_order_sets":
      return orderSetList(listOrderSets());
    case "preview_order_set":
      return orderSetPreview(intent.orderSet, previewOrderSet(intent.orderSet));
  }
}

async function placeSingleOrder(
  session: EncounterSession,
  patient: PatientContext,
  text: string,
  entry: CatalogEntry
): Promise<Reply> {
  const pending = session.confirmation.pendingOrder;
  if (pending) return pendingFirst(pending);

  const candidate = buildCandidateOrder(text, entry);
  const warnings = evaluateOrderSafety(candidate, {
    queue: session.queue.list(),
    allergies: patient.allergies,
    medications: patient.medications,
  });
  const checked = applySafety(candidate, warnings);

  if (checked.requiresConfirmation) {
    session.confirmation.hold(checked);
    logEvent("order.held", {
      encounterId: session.encounterId,
      orderId: checked.id,
      warnings: checked.warnings.map((warning) => warning.type),
    });
    return confirmationPrompt(checked);
  }

  const queued = await session.queue.add(checked);
  logEvent("order.queued", { encounterId: session.encounterId, orderId: queued.id, name: queued.name });
  return orderPlaced(queued, entry.kind === "medication" && entry.controlled);
}

async function handleOrderIntent(session: EncounterSession, patient: PatientContext, intent: OrderIntent): Promise<Reply> {
  switch (intent.kind) {
    case "order_lab":
    case "order_imaging":
    case "prescribe_medication":
      return placeSingleOrder(session, patient, intent.text, intent.entry);

    case "order_set": {
      const pending = session.confirmation.pendingOrder;
      if (pending) return pendingFirst(pending);
      const result = await processOrderSet(intent.orderSet, {
        queue: session.queue,
        allergies: patient.allergies,
        medications: patient.medications,
      });
      logEvent("order_set.queued", {
        encounterId: session.encounterId,
        orderSetId: intent.orderSet.id,
        ordered: result.ordered.length,
        warnings: result.warnings.length,
        skipped: result.skipped.length,
      });
      return orderSetSummary(result);
    }

    case "confirm_pending": {
      const confirmed = session.confirmation.confirm();
      if (!confirmed) return { feedback: NOTHING_PENDING };
      const queued = await session.queue.add(confirmed);
      logEvent("order.confirmed", { encounterId: session.encounterId, orderId: queued.id });
      return orderConfirmed(queued);
    }

    case "reject_pending": {
      const rejected = session.confirmation.reject();
      if (!rejected) return { feedback: NOTHING_PENDING };
      logEvent("order.rejected", { encounterId: session.encounterId, orderId: rejected.id });
      return orderRejected(rejected);
    }

    case "cancel_last":
      return lastCancelled(await session.queue.cancelLast());

    case "clear_orders":
      return ordersCleared(await session.queue.clearAll());

    case "list_orders":
      return orderList(session.queue.list());

    case "remove_order": {
      const removed = await session.queue.removeAt(intent.position);
      return orderRemoved(intent.position, removed, session.queue.size);
    }
  }
}

/**
 * Classify a finalized transcript, act on it and speak the feedback.
 * Never throws on user input; a lock timeout comes back as a "try again" reply.
 */
export async function handleUtterance(session: EncounterSession, text: string): Promise<UtteranceResult> {
  const intent = classifyUtterance(text);

  let reply: Reply;
  try {
    reply = await withEncounterLock(session.encounterId, `utterance:${intent.kind}`, async () => {
      if (isBrowseIntent(intent)) return browse(intent);
      const patient = session.patientContext;
      if (!patient) return { feedback: NO_PATIENT };
      return handleOrderIntent(session, patient, intent);
    });
  } catch (err) {
    if (!(err instanceof LockTimeoutError)) throw err;
    logError(`[encounterSession] ${session.encounterId}: utterance dropped after lock timeout`);
    reply = { feedback: LOCK_BUSY };
  }

  session.speak(reply.feedback);
  return { ...reply, intent: intent.kind };
}
