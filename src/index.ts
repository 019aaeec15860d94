import "dotenv/config";
import { loadConfig } from "./config";
import { clearAllLocks, setLockTimeout } from "./encounterLock";
import { getFirestore } from "./firebaseAdmin";
import { createMessageHandler } from "./handlers/messageHandler";
import { log, logError, logEvent } from "./logger";
import { createQueueStore } from "./persistence";
import { SessionManager } from "./sessionManager";
import { createTransport } from "./transport";

const config = loadConfig();
setLockTimeout(config.LOCK_TIMEOUT_MS);

const store = createQueueStore(config.ORDER_QUEUE_STORE, config.ORDER_QUEUE_COLLECTION, getFirestore);
const sessionManager = new SessionManager({ store, queueKey: config.ORDER_QUEUE_KEY });
sessionManager.onEncounterEmpty((encounterId) => {
  logEvent("encounter.closed", { encounterId });
});

function main() {
  const server = createTransport({
    port: config.PORT,
    maxPayloadBytes: config.MAX_WS_PAYLOAD_BYTES,
    handleMessage: createMessageHandler({ sessionManager }),
    sessionManager,
    log,
    logError,
    logEvent,
  });

  const shutdown = (signal: string) => {
    log(`Received ${signal}, shutting down`);
    clearAllLocks();
    server.close((err) => {
      if (err) logError("Error closing server", err);
      process.exit(err ? 1 : 0);
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main();
