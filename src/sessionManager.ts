import { EncounterSession } from "./encounterSession";
import { log, logError } from "./logger";
import type { ClientConnection, ServerToClientMessage } from "./messageTypes";
import type { QueueStore } from "./persistence";

type EncounterEntry = {
  session: EncounterSession;
  clients: Set<ClientConnection>;
};

export interface SessionManagerOptions {
  store: QueueStore;
  /** Base record key; each encounter persists under `<queueKey>-<encounterId>`. */
  queueKey: string;
}

export class SessionManager {
  private encounters: Map<string, EncounterEntry> = new Map();
  private onEncounterEmptyCallback?: (encounterId: string) => void;

  constructor(private readonly options: SessionManagerOptions) {}

  /** Register callback to be notified when an encounter has no more clients */
  onEncounterEmpty(callback: (encounterId: string) => void) {
    this.onEncounterEmptyCallback = callback;
  }

  private ensureEncounter(encounterId: string): EncounterEntry {
    const existing = this.encounters.get(encounterId);
    if (existing) return existing;
    const entry: EncounterEntry = {
      clients: new Set(),
      session: new EncounterSession({
        encounterId,
        store: this.options.store,
        storageKey: `${this.options.queueKey}-${encounterId}`,
        speech: { speak: (text) => this.broadcast(encounterId, { type: "speak", text }) },
      }),
    };
    this.encounters.set(encounterId, entry);
    log(`[sessionManager] Created encounter ${encounterId}`);
    return entry;
  }

  addClient(encounterId: string, client: ClientConnection): EncounterSession {
    const entry = this.ensureEncounter(encounterId);
    entry.clients.add(client);
    return entry.session;
  }

  removeClient(encounterId: string, client: ClientConnection) {
    const entry = this.encounters.get(encounterId);
    if (!entry) return;
    entry.clients.delete(client);
    if (entry.clients.size === 0) {
      entry.session.closeNote();
      if (!entry.session.queue.persistenceHealthy) {
        logError(`[sessionManager] Keeping encounter ${encounterId}: its order queue is not saved`);
        return;
      }
      this.encounters.delete(encounterId);
      this.onEncounterEmptyCallback?.(encounterId);
    }
  }

  getSession(encounterId: string): EncounterSession | null {
    return this.encounters.get(encounterId)?.session ?? null;
  }

  broadcast(encounterId: string, msg: ServerToClientMessage) {
    const entry = this.encounters.get(encounterId);
    if (!entry) return;
    entry.clients.forEach((client) => client.send(msg));
  }

  broadcastQueue(encounterId: string) {
    const session = this.getSession(encounterId);
    if (!session) return;
    this.broadcast(encounterId, {
      type: "queue",
      patientId: session.queue.patientId,
      orders: session.queue.list(),
      persistenceHealthy: session.queue.persistenceHealthy,
    });
  }
}
