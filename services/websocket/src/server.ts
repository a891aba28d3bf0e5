/**
 * WebSocket server on top of `ws`.
 */
import type { EventEmitter } from "node:events";
import { WebSocketServer, type RawData } from "ws";
import { createLogger } from "../../shared/src/logger.js";
import type { Gateway } from "../../gateway/src/gateway.js";
import { SocketSession, type FrameSocket } from "./session.js";

const log = createLogger("websocket-server");

export interface WebSocketServerOptions {
  gateway: Gateway;
  port: number;
  host?: string;
  exposeInternalErrors?: boolean;
}

export function rawDataToText(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf-8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  return Buffer.from(data).toString("utf-8");
}

/**
 * Wire one accepted socket to a session. Returns null when the connection
 * is over its budget; the socket has then been told why and closed.
 */
export function connectClient(
  gateway: Gateway,
  socket: FrameSocket & EventEmitter,
  clientId: string,
  exposeInternalErrors?: boolean,
): SocketSession | null {
  // A rejected socket can still emit errors (e.g. a malformed frame before the close completes)
  socket.on("error", (err: Error) => {
    log.warn("Socket error", { clientId, error: err.message });
  });
  socket.on("close", (code: number) => {
    log.info("Client disconnected", { clientId, code });
  });

  const session = new SocketSession(gateway, socket, clientId, exposeInternalErrors);
  if (!session.open()) return null;

  socket.on("message", (data: RawData) => {
    void session.receive(rawDataToText(data));
  });
  return session;
}

export function startWebSocketServer(options: WebSocketServerOptions): Promise<WebSocketServer> {
  const { gateway, port, host } = options;

  return new Promise((resolve, reject) => {
    const wss = new WebSocketServer({ port, ...(host && { host }) });

    wss.on("connection", (socket, request) => {
      connectClient(gateway, socket, request.socket.remoteAddress ?? "unknown", options.exposeInternalErrors);
    });

    wss.once("listening", () => {
      log.info("WebSocket server listening", { host: host ?? "0.0.0.0", port });
      resolve(wss);
    });
    wss.once("error", reject);
  });
}

export function closeWebSocketServer(wss: WebSocketServer): Promise<void> {
  for (const client of wss.clients) client.terminate();
  return new Promise((resolve, reject) => {
    wss.close((err) => (err ? reject(err) : resolve()));
  });
}
