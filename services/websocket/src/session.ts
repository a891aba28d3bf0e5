/**
 * WebSocket message handling, independent of the socket library.
 *
 * Inbound:  { route, params?, messageId? }
 * Outbound: { messageId, data, rateLimit } or { messageId, error, message, ..., rateLimit }
 *
 * Each message is parsed, admitted exactly once under "websocket_message",
 * then dispatched. Messages on one connection are answered in arrival order.
 */
import { z } from "zod";
import {
  InvalidMessageError,
  RateLimitExceededError,
  toErrorBody,
  type ErrorBody,
} from "../../shared/src/errors.js";
import { createLogger } from "../../shared/src/logger.js";
import type { Gateway } from "../../gateway/src/gateway.js";
import { WEBSOCKET_CONNECTION, WEBSOCKET_MESSAGE } from "../../rate-limiter/src/categories.js";
import { rateLimitSummary } from "../../rate-limiter/src/headers.js";

const log = createLogger("websocket");

/** Policy violation: sent when the connection itself is over its limit. */
export const CLOSE_POLICY_VIOLATION = 1008;

const messageIdSchema = z.union([z.string(), z.number()]);

const inboundSchema = z.object({
  route: z.string().min(1),
  params: z.record(z.string(), z.unknown()).optional(),
  messageId: messageIdSchema.optional(),
});

export type InboundMessage = z.infer<typeof inboundSchema>;
export type MessageId = z.infer<typeof messageIdSchema> | null;

type RateLimitSummary = ReturnType<typeof rateLimitSummary>;

export type OutboundFrame =
  | { messageId: MessageId; data: unknown; rateLimit: RateLimitSummary }
  | (ErrorBody & { messageId: MessageId; rateLimit?: RateLimitSummary });

export type ParseResult =
  | { ok: true; message: InboundMessage }
  | { ok: false; messageId: MessageId; error: InvalidMessageError };

/** Parse a raw text frame. Pure: no admission, no logging. */
export function parseSocketMessage(raw: string): ParseResult {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, messageId: null, error: new InvalidMessageError("Message is not valid JSON") };
  }

  const parsed = inboundSchema.safeParse(json);
  if (!parsed.success) {
    const id = messageIdSchema.safeParse(isRecord(json) ? json["messageId"] : undefined);
    const issue = parsed.error.issues[0];
    return {
      ok: false,
      messageId: id.success ? id.data : null,
      error: new InvalidMessageError(
        issue ? `Invalid message: ${issue.path.join(".") || "body"} ${issue.message}` : "Invalid message",
      ),
    };
  }
  return { ok: true, message: parsed.data };
}

export async function handleSocketMessage(
  gateway: Gateway,
  clientId: string,
  raw: string,
  exposeInternal?: boolean,
): Promise<OutboundFrame> {
  const parsed = parseSocketMessage(raw);

  if (!parsed.ok) {
    const admission = gateway.admit(clientId, WEBSOCKET_MESSAGE);
    const error = admission.allowed ? parsed.error : new RateLimitExceededError(admission);
    return { ...toErrorBody(error, exposeInternal), messageId: parsed.messageId, rateLimit: rateLimitSummary(admission) };
  }

  const { route, params, messageId = null } = parsed.message;
  const outcome = await gateway.handle({
    clientId,
    endpoint: WEBSOCKET_MESSAGE,
    route,
    ...(params && { params }),
  });
  const rateLimit = rateLimitSummary(outcome.admission);

  if (outcome.status === "ok") {
    return { messageId, data: outcome.data, rateLimit };
  }
  return { ...toErrorBody(outcome.error, exposeInternal), messageId, rateLimit };
}

/** The part of a socket a session writes to. */
export interface FrameSocket {
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export class SocketSession {
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private gateway: Gateway,
    private socket: FrameSocket,
    readonly clientId: string,
    private exposeInternal?: boolean,
  ) {}

  /** Admit the connection itself; a rejected connection is told why and closed. */
  open(): boolean {
    const admission = this.gateway.admit(this.clientId, WEBSOCKET_CONNECTION);
    if (admission.allowed) {
      log.info("Client connected", { clientId: this.clientId });
      return true;
    }

    this.write({
      ...toErrorBody(new RateLimitExceededError(admission), this.exposeInternal),
      messageId: null,
      rateLimit: rateLimitSummary(admission),
    });
    this.socket.close(CLOSE_POLICY_VIOLATION, "Rate limit exceeded");
    return false;
  }

  /** Queue a frame behind the ones already received on this connection. */
  receive(raw: string): Promise<void> {
    this.queue = this.queue
      .then(async () => {
        const frame = await handleSocketMessage(this.gateway, this.clientId, raw, this.exposeInternal);
        this.write(frame);
      })
      .catch((err: unknown) => {
        log.error("Message handling failed", {
          clientId: this.clientId,
          error: err instanceof Error ? err.message : String(err),
        });
      });
    return this.queue;
  }

  private write(frame: OutboundFrame): void {
    try {
      this.socket.send(JSON.stringify(frame));
    } catch (err) {
      log.warn("Failed to send frame", {
        clientId: this.clientId,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
