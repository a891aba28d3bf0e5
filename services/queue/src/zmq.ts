/**
 * ZeroMQ reply socket. Kept apart so the native binding only loads when the
 * queue transport is enabled.
 */
import { Reply } from "zeromq";
import { createLogger } from "../../shared/src/logger.js";
import type { ReplySocket } from "./reply-loop.js";

const log = createLogger("zmq");

export async function bindReplySocket(endpoint: string): Promise<ReplySocket> {
  const socket = new Reply();
  await socket.bind(endpoint);
  log.info("Reply socket bound", { endpoint });
  return socket;
}
