/**
 * Queue Binding
 *
 * A strict request/reply loop: receive one JSON message `{ route, params? }`,
 * handle it, send one JSON object back, repeat. A reply socket has no peer
 * identity, so every request is admitted under one configured client id.
 */
import { z } from "zod";
import { InvalidMessageError, RateLimitExceededError, toErrorBody, type ErrorBody } from "../../shared/src/errors.js";
import { createLogger } from "../../shared/src/logger.js";
import type { Gateway } from "../../gateway/src/gateway.js";

const log = createLogger("queue");

/** Endpoint charged for messages that do not name a route. */
export const QUEUE_ENDPOINT = "queue";

const requestSchema = z.object({
  route: z.string().min(1),
  params: z.record(z.string(), z.unknown()).optional(),
});

export type QueueReply =
  | { route: string; data: unknown }
  | (ErrorBody & { route: string | null });

export async function handleQueueMessage(
  gateway: Gateway,
  clientId: string,
  raw: string,
  exposeInternal?: boolean,
): Promise<QueueReply> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return reject(gateway, clientId, new InvalidMessageError("Message is not valid JSON"), exposeInternal);
  }

  const parsed = requestSchema.safeParse(json);
  if (!parsed.success) {
    return reject(gateway, clientId, new InvalidMessageError("Message must be { route, params? }"), exposeInternal);
  }

  const { route, params } = parsed.data;
  const outcome = await gateway.handle({ clientId, route, ...(params && { params }) });
  if (outcome.status === "ok") {
    return { route, data: outcome.data };
  }
  return { ...toErrorBody(outcome.error, exposeInternal), route };
}

function reject(gateway: Gateway, clientId: string, error: InvalidMessageError, exposeInternal?: boolean): QueueReply {
  const admission = gateway.admit(clientId, QUEUE_ENDPOINT);
  const body = admission.allowed ? error : new RateLimitExceededError(admission);
  return { ...toErrorBody(body, exposeInternal), route: null };
}

/** The part of a reply socket the loop drives. */
export interface ReplySocket {
  receive(): Promise<Buffer[]>;
  send(message: string): Promise<void>;
  close(): void;
}

export class ReplyLoop {
  private stopped = false;
  private running: Promise<void> | null = null;

  constructor(
    private gateway: Gateway,
    private socket: ReplySocket,
    private clientId: string,
    private exposeInternal?: boolean,
  ) {}

  start(): Promise<void> {
    if (!this.running) this.running = this.run();
    return this.running;
  }

  /** Close the socket; the pending receive fails and the loop exits. */
  async stop(): Promise<void> {
    this.stopped = true;
    this.socket.close();
    await this.running;
  }

  private async run(): Promise<void> {
    log.info("Queue loop started", { clientId: this.clientId });

    while (!this.stopped) {
      let frames: Buffer[];
      try {
        frames = await this.socket.receive();
      } catch (err) {
        if (!this.stopped) {
          log.error("Queue receive failed; loop stopping", { error: err instanceof Error ? err.message : String(err) });
        }
        break;
      }

      const raw = frames.map((f) => f.toString("utf-8")).join("");
      const reply = await handleQueueMessage(this.gateway, this.clientId, raw, this.exposeInternal);

      try {
        await this.socket.send(JSON.stringify(reply));
      } catch (err) {
        log.error("Queue send failed", { error: err instanceof Error ? err.message : String(err) });
      }
    }

    log.info("Queue loop stopped");
  }
}
