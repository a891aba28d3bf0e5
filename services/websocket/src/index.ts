/**
 * websocket — Barrel exports
 */
export {
  handleSocketMessage,
  parseSocketMessage,
  SocketSession,
  CLOSE_POLICY_VIOLATION,
  type FrameSocket,
  type InboundMessage,
  type OutboundFrame,
  type ParseResult,
} from "./session.js";
export { connectClient, startWebSocketServer, closeWebSocketServer, rawDataToText, type WebSocketServerOptions } from "./server.js";
