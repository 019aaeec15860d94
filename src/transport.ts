import WebSocket from "ws";
import http from "http";
import type { ClientConnection, ServerToClientMessage } from "./messageTypes";
import type { ClientContext, MessageHandler } from "./handlers/messageHandler";
import { generateId } from "./idGenerator";
import { SessionManager } from "./sessionManager";

const HEALTH_PATH = "/health";
export const ORDERS_PATH = "/ws/orders";

export function createTransport(opts: {
  port: number;
  maxPayloadBytes: number;
  handleMessage: MessageHandler;
  sessionManager: SessionManager;
  log: (...args: unknown[]) => void;
  logError: (...args: unknown[]) => void;
  logEvent: (type: string, payload?: Record<string, unknown>) => void;
}): http.Server {
  const { port, maxPayloadBytes, handleMessage, sessionManager, log, logEvent, logError } = opts;
  const server = http.createServer();
  const wss = new WebSocket.Server({ server, path: ORDERS_PATH });

  server.on("request", (req, res) => {
    if (req.url === HEALTH_PATH) {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ ok: true }));
      return;
    }
    res.writeHead(404);
    res.end();
  });

  wss.on("connection", (ws) => {
    const ctx: ClientContext = { clientId: generateId(), joined: false, encounterId: null };
    const client: ClientConnection = {
      send: (msg) => send(ws, msg),
      close: () => ws.close(),
    };

    ws.on("message", (data) => {
      const raw = rawDataToString(data);
      if (Buffer.byteLength(raw, "utf8") > maxPayloadBytes) {
        client.send({ type: "error", message: "Payload too large" });
        client.close();
        return;
      }
      handleMessage(client, ctx, raw).catch((err) => {
        logError("[transport] handleMessage failed:", err);
        client.send({ type: "error", message: "Internal error" });
      });
    });

    ws.on("close", () => {
      if (ctx.joined && ctx.encounterId) {
        sessionManager.removeClient(ctx.encounterId, client);
        log("Client disconnected", ctx.encounterId, ctx.clientId);
        logEvent("ws.disconnect", { encounterId: ctx.encounterId, clientId: ctx.clientId });
      }
    });

    ws.on("error", (err) => {
      logError("Socket error", err);
    });
  });

  server.listen(port, () => {
    log(`Order gateway listening on :${port} (path: ${ORDERS_PATH})`);
  });

  return server;
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

export function send(ws: WebSocket, msg: ServerToClientMessage) {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(msg));
  }
}
