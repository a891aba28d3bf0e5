/**
 * Gateway
 *
 * The process-scoped core every transport shares: one rate limiter, one
 * endpoint cache, one validator and one dispatcher. A binding hands over a
 * parsed request and gets back a tagged outcome; serialization stays in the
 * binding.
 */
import { RateLimitExceededError, UpstreamUnavailableError, GatewayError } from "../../shared/src/errors.js";
import type { GatewayConfig } from "../../shared/src/config.js";
import { rateLimitsFrom } from "../../shared/src/config.js";
import { createLogger } from "../../shared/src/logger.js";
import type { Admission } from "../../shared/src/types.js";
import { RateLimiter } from "../../rate-limiter/src/limiter.js";
import { SnapshotUpdater } from "../../snapshot/src/updater.js";
import { EndpointCache } from "../../upstream/src/cache.js";
import { UpstreamClient, type FetchLike } from "../../upstream/src/client.js";
import { fileSnapshotSource } from "../../validator/src/snapshot-source.js";
import { StockValidator } from "../../validator/src/validator.js";
import { Dispatcher, type RawParams } from "./dispatch.js";

const log = createLogger("gateway");

export interface GatewayRequest {
  clientId: string;
  /** Endpoint the limiter categorizes; defaults to the route name */
  endpoint?: string;
  route: string;
  params?: RawParams;
}

export type GatewayOutcome =
  | { status: "ok"; data: unknown; admission: Admission }
  | { status: "rejected"; error: RateLimitExceededError; admission: Admission }
  | { status: "failed"; error: unknown; admission: Admission };

export class Gateway {
  constructor(
    readonly limiter: RateLimiter,
    readonly dispatcher: Dispatcher,
  ) {}

  /** Record one request against the client's budget. */
  admit(clientId: string, endpoint: string): Admission {
    return this.limiter.admit(clientId, endpoint);
  }

  /** Serve a route for a request that has already been admitted. */
  execute(route: string, params: RawParams = {}): Promise<unknown> {
    return this.dispatcher.dispatch(route, params);
  }

  /** Admit exactly once, then dispatch. Never rejects. */
  async handle(request: GatewayRequest): Promise<GatewayOutcome> {
    const admission = this.admit(request.clientId, request.endpoint ?? request.route);
    if (!admission.allowed) {
      return { status: "rejected", error: new RateLimitExceededError(admission), admission };
    }

    try {
      const data = await this.execute(request.route, request.params);
      return { status: "ok", data, admission };
    } catch (error) {
      logFailure(request.route, error);
      return { status: "failed", error, admission };
    }
  }
}

export function logFailure(route: string, error: unknown): void {
  if (error instanceof UpstreamUnavailableError) {
    log.warn("Upstream unavailable", { route, path: error.path, upstreamStatus: error.upstreamStatus });
  } else if (error instanceof GatewayError) {
    log.info("Request refused", { route, code: error.code, message: error.message });
  } else {
    log.error("Route handler failed", {
      route,
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
  }
}

// ─── Composition Root ─────────────────────────────────────────────────

export interface GatewayServices {
  gateway: Gateway;
  upstream: UpstreamClient;
  cache: EndpointCache;
  limiter: RateLimiter;
  validator: StockValidator;
  dispatcher: Dispatcher;
  snapshotUpdater: SnapshotUpdater;
  /** Stop timers so the process can exit */
  close(): void;
}

export interface GatewayOverrides {
  fetchImpl?: FetchLike;
  now?: () => number;
  validator?: StockValidator;
}

export function createGateway(config: GatewayConfig, overrides: GatewayOverrides = {}): GatewayServices {
  const upstream = new UpstreamClient({
    baseUrl: config.UPSTREAM_BASE_URL,
    timeoutMs: config.UPSTREAM_TIMEOUT_MS,
    retries: config.UPSTREAM_RETRIES,
    ...(overrides.fetchImpl && { fetchImpl: overrides.fetchImpl }),
  });
  const cache = new EndpointCache(upstream, config.CACHE_TTL_SECONDS);
  const limiter = new RateLimiter({
    limits: rateLimitsFrom(config),
    windowMs: config.RATE_LIMIT_WINDOW_SECONDS * 1000,
    sweepThreshold: config.RATE_LIMIT_SWEEP_THRESHOLD,
    staleAfterMs: config.RATE_LIMIT_STALE_SECONDS * 1000,
    ...(overrides.now && { now: overrides.now }),
  });
  const validator = overrides.validator ?? new StockValidator(fileSnapshotSource(config.STOCK_MAP_PATH));
  const dispatcher = new Dispatcher(
    { fetcher: cache, validator, limiter },
    { marketStatusTtlMs: config.MARKET_STATUS_TTL_SECONDS * 1000 },
  );

  const snapshotUpstream = new UpstreamClient({
    baseUrl: config.UPSTREAM_BASE_URL,
    timeoutMs: config.SNAPSHOT_TIMEOUT_MS,
    retries: config.UPSTREAM_RETRIES,
    ...(overrides.fetchImpl && { fetchImpl: overrides.fetchImpl }),
  });
  const snapshotUpdater = new SnapshotUpdater(snapshotUpstream, {
    outPath: config.STOCK_MAP_PATH,
    healthPath: config.UPSTREAM_HEALTH_PATH,
  });

  log.info("Gateway created", {
    upstream: upstream.baseUrl,
    cacheTtlSeconds: config.CACHE_TTL_SECONDS,
    stockMapPath: config.STOCK_MAP_PATH,
  });

  return {
    gateway: new Gateway(limiter, dispatcher),
    upstream,
    cache,
    limiter,
    validator,
    dispatcher,
    snapshotUpdater,
    close: () => cache.destroy(),
  };
}
