/**
 * Gateway Message Handler
 * Parses, validates and routes client messages to the encounter session.
 */

import { handleUtterance } from "../encounterSession";
import { LockTimeoutError } from "../encounterLock";
import { log, logError, logEvent } from "../logger";
import type { ClientConnection } from "../messageTypes";
import { SessionManager } from "../sessionManager";
import { validateMessage } from "../validators";

// ============================================================================
// Types
// ============================================================================

export type ClientContext = {
  /** Connection id, for logs only. */
  clientId: string;
  joined: boolean;
  encounterId: string | null;
};

export interface MessageHandlerDeps {
  sessionManager: SessionManager;
}

export type MessageHandler = (client: ClientConnection, ctx: ClientContext, raw: string) => Promise<void>;

// ============================================================================
// Factory
// ============================================================================

export function createMessageHandler(deps: MessageHandlerDeps): MessageHandler {
  const { sessionManager } = deps;

  return async function handleMessage(client, ctx, raw) {
    let parsedRaw: unknown;
    try {
      parsedRaw = JSON.parse(raw);
    } catch (err) {
      logError("Invalid JSON", err);
      client.send({ type: "error", message: "Invalid JSON" });
      return;
    }
    const parsed = validateMessage(parsedRaw);
    if (!parsed) {
      client.send({ type: "error", message: "Invalid message shape" });
      return;
    }

    if (parsed.type === "ping") {
      client.send({ type: "pong" });
      return;
    }

    if (parsed.type === "join") {
      if (ctx.encounterId && ctx.encounterId !== parsed.encounterId) {
        sessionManager.removeClient(ctx.encounterId, client);
      }
      const session = sessionManager.addClient(parsed.encounterId, client);
      ctx.joined = true;
      ctx.encounterId = parsed.encounterId;
      client.send({ type: "joined", encounterId: parsed.encounterId });
      client.send({
        type: "queue",
        patientId: session.queue.patientId,
        orders: session.queue.list(),
        persistenceHealthy: session.queue.persistenceHealthy,
      });
      logEvent("ws.join", { encounterId: parsed.encounterId, clientId: ctx.clientId });
      log("Client joined", parsed.encounterId, ctx.clientId);
      return;
    }

    const encounterId = ctx.encounterId;
    const session = ctx.joined && encounterId ? sessionManager.getSession(encounterId) : null;
    if (!encounterId || !session) {
      client.send({ type: "error", message: "Must join first" });
      return;
    }

    switch (parsed.type) {
      case "set_patient": {
        try {
          await session.setPatient(parsed.patient);
        } catch (err) {
          if (!(err instanceof LockTimeoutError)) throw err;
          client.send({ type: "error", message: "Encounter busy, try again" });
          return;
        }
        sessionManager.broadcastQueue(encounterId);
        break;
      }
      case "note_opened": {
        session.openNote({
          appendPlanLine: (text) => sessionManager.broadcast(encounterId, { type: "plan_line", text }),
        });
        break;
      }
      case "note_closed": {
        session.closeNote();
        break;
      }
      case "utterance": {
        const result = await handleUtterance(session, parsed.text);
        sessionManager.broadcast(encounterId, {
          type: "feedback",
          text: result.feedback,
          intent: result.intent,
          ...(result.overlay ? { overlay: result.overlay } : {}),
        });
        sessionManager.broadcastQueue(encounterId);
        logEvent("utterance.handled", { encounterId, intent: result.intent });
        break;
      }
    }
  };
}
