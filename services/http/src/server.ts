/**
 * HTTP Binding
 *
 * One GET per route name (`/<RouteName>`, query string as params) plus the
 * health, validation, search and stats endpoints and the restart trigger.
 * Every request is admitted once in the onRequest hook, keyed by its path.
 */
import { createHash, timingSafeEqual } from "node:crypto";
import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from "fastify";
import cors from "@fastify/cors";
import {
  ForbiddenError,
  GatewayError,
  RateLimitExceededError,
  RouteNotFoundError,
  ValidationFailureError,
  toErrorBody,
} from "../../shared/src/errors.js";
import { createLogger } from "../../shared/src/logger.js";
import type { Admission } from "../../shared/src/types.js";
import { logFailure, type Gateway } from "../../gateway/src/gateway.js";
import { ROUTE_NAMES } from "../../gateway/src/routes.js";
import { rateLimitHeaders, rejectionHeaders } from "../../rate-limiter/src/headers.js";
import type { StockValidator } from "../../validator/src/validator.js";

const log = createLogger("http");

const CACHE_CONTROL = "public, max-age=30";

export interface HttpServerOptions {
  gateway: Gateway;
  validator: StockValidator;
  /** Unset disables POST /restart (404) */
  restartSecret?: string;
  /** Called after a 202 restart response has been sent */
  onRestart?: () => void;
  exposeInternalErrors?: boolean;
  now?: () => number;
}

type Query = Record<string, unknown>;

/** Client identity: first X-Forwarded-For hop, else the socket address. */
export function clientIdOf(request: FastifyRequest): string {
  const forwarded = request.headers["x-forwarded-for"];
  const first = (Array.isArray(forwarded) ? forwarded[0] : forwarded)?.split(",")[0]?.trim();
  return first || request.ip;
}

/** Constant-time comparison of two secrets of any length. */
export function secretsMatch(provided: string, expected: string): boolean {
  const a = createHash("sha256").update(provided).digest();
  const b = createHash("sha256").update(expected).digest();
  return timingSafeEqual(a, b);
}

export function renderRouteIndex(): string {
  const items = ROUTE_NAMES.map((name) => `<li><a href="/${name}">${name}</a></li>`).join("");
  return `<!doctype html><html><head><title>NEPSE data gateway</title></head><body><h1>NEPSE market data gateway</h1><ul>${items}</ul></body></html>`;
}

export async function buildHttpServer(options: HttpServerOptions): Promise<FastifyInstance> {
  const { gateway, validator } = options;
  const now = options.now ?? (() => Date.now());
  const exposeInternal = options.exposeInternalErrors ?? process.env["NODE_ENV"] !== "production";
  const admissions = new WeakMap<FastifyRequest, Admission>();

  const app = Fastify({ logger: false });

  await app.register(cors, { origin: "*" });

  // ─── Admission ────────────────────────────────────────────────────

  app.addHook("onRequest", async (request, reply) => {
    const endpoint = request.url.split("?")[0] ?? request.url;
    const admission = gateway.admit(clientIdOf(request), endpoint);
    admissions.set(request, admission);

    if (!admission.allowed) {
      reply
        .code(429)
        .headers(rejectionHeaders(admission, now()))
        .send(toErrorBody(new RateLimitExceededError(admission), exposeInternal));
      return reply;
    }

    reply.headers(rateLimitHeaders(admission));
    return undefined;
  });

  app.addHook("onResponse", async (request, reply) => {
    log.debug("Request served", {
      method: request.method,
      url: request.url,
      status: reply.statusCode,
      category: admissions.get(request)?.category,
    });
  });

  app.setErrorHandler((error, request, reply) => {
    logFailure(request.url, error);

    if (error instanceof GatewayError) {
      return reply.code(error.status).send(toErrorBody(error, exposeInternal));
    }

    // Framework errors (bad content type, oversized body) keep their 4xx status
    const status = error.statusCode ?? 500;
    if (status < 500) {
      return reply.code(status).send({ error: "invalid_message", message: error.message });
    }
    return reply.code(500).send(toErrorBody(error, exposeInternal));
  });

  app.setNotFoundHandler((request, reply) => {
    const path = request.url.split("?")[0] ?? request.url;
    return reply.code(404).send(toErrorBody(new RouteNotFoundError(path.replace(/^\/+/, "")), exposeInternal));
  });

  const ok = (reply: FastifyReply, data: unknown): FastifyReply =>
    reply.header("Cache-Control", CACHE_CONTROL).send(data);

  // ─── Route Table ──────────────────────────────────────────────────

  for (const name of ROUTE_NAMES) {
    app.get<{ Querystring: Query }>(`/${name}`, async (request, reply) => {
      const data = await gateway.execute(name, request.query);
      return ok(reply, data);
    });
  }

  // ─── Service Endpoints ────────────────────────────────────────────

  app.get("/", async (_request, reply) => {
    return reply.type("text/html; charset=utf-8").send(renderRouteIndex());
  });

  app.get("/health", async (_request, reply) => ok(reply, await gateway.execute("Health")));

  app.get<{ Params: { symbol: string } }>("/validate/stock/:symbol", async (request, reply) => {
    const result = validator.validateStockSymbol(request.params.symbol);
    return result.valid ? ok(reply, result) : reply.code(404).send(result);
  });

  app.get<{ Params: { indexName: string } }>("/validate/index/:indexName", async (request, reply) => {
    const result = validator.validateIndexName(request.params.indexName);
    return result.valid ? ok(reply, result) : reply.code(404).send(result);
  });

  app.get("/validation/stats", async (_request, reply) => ok(reply, validator.stats()));

  app.get("/rate-limit/stats", async (_request, reply) => ok(reply, gateway.limiter.stats()));

  app.get<{ Querystring: Query }>("/search/company", async (request, reply) => {
    const q = request.query["q"];
    if (typeof q !== "string" || !q.trim()) {
      throw new ValidationFailureError("Query parameter 'q' is required", "q");
    }
    return ok(reply, validator.findSymbolByCompanyName(q));
  });

  app.get<{ Params: { symbol: string } }>("/search/symbol/:symbol", async (request, reply) => {
    return ok(reply, validator.findCompanyNameBySymbol(request.params.symbol));
  });

  // ─── Restart Trigger ──────────────────────────────────────────────

  app.post("/restart", async (request, reply) => {
    const expected = options.restartSecret;
    if (!expected) throw new RouteNotFoundError("restart");

    const provided = request.headers["x-restart-secret"];
    if (typeof provided !== "string" || !secretsMatch(provided, expected)) {
      log.warn("Restart refused", { clientId: clientIdOf(request) });
      throw new ForbiddenError("Invalid restart secret");
    }

    log.info("Restart requested", { clientId: clientIdOf(request) });
    reply.code(202).send({ status: "restarting" });
    setImmediate(() => options.onRestart?.());
    return reply;
  });

  return app;
}

export async function startHttpServer(app: FastifyInstance, host: string, port: number): Promise<string> {
  const address = await app.listen({ host, port });
  log.info("HTTP server listening", { address });
  return address;
}
