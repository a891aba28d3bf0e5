/**
 * Sliding-window rate limiter.
 * Enforces: at most `limit` admitted requests per (client, category) within
 * the trailing window. A rejected request is not recorded.
 *
 * State lives for the process lifetime only. `admit` is synchronous, so each
 * purge → check → append sequence completes without interleaving with other
 * requests on the event loop.
 */
import { createLogger } from "../../shared/src/logger.js";
import type { Admission, EndpointCategory, RateLimits } from "../../shared/src/types.js";
import { categorize, DEFAULT_RATE_LIMITS } from "./categories.js";

const log = createLogger("rate-limiter");

export interface RateLimiterConfig {
  limits: Partial<RateLimits>;
  windowMs: number;          // default 60_000
  sweepThreshold: number;    // tracked clients before a stale sweep, default 1000
  staleAfterMs: number;      // idle time before a client is dropped, default 300_000
  now: () => number;
}

const DEFAULT_CONFIG: RateLimiterConfig = {
  limits: DEFAULT_RATE_LIMITS,
  windowMs: 60_000,
  sweepThreshold: 1000,
  staleAfterMs: 300_000,
  now: () => Date.now(),
};

interface ClientState {
  lastSeen: number;
  /** ascending timestamps per category */
  windows: Map<EndpointCategory, number[]>;
}

export interface RateLimiterStats {
  totalTrackedClients: number;
  totalTrackedWindows: number;
  activeRequestsInWindow: number;
  windowSizeSeconds: number;
  limits: RateLimits;
  staleAfterSeconds: number;
}

export class RateLimiter {
  private clients = new Map<string, ClientState>();
  private limits: RateLimits;
  private windowMs: number;
  private sweepThreshold: number;
  private staleAfterMs: number;
  private now: () => number;

  constructor(config: Partial<RateLimiterConfig> = {}) {
    const cfg = { ...DEFAULT_CONFIG, ...config };
    this.limits = { ...DEFAULT_RATE_LIMITS, ...cfg.limits };
    this.windowMs = cfg.windowMs;
    this.sweepThreshold = cfg.sweepThreshold;
    this.staleAfterMs = cfg.staleAfterMs;
    this.now = cfg.now;
  }

  /**
   * Admit or reject one request from `clientId` against `endpoint`
   * (an HTTP path, a route name, or a websocket tag).
   */
  admit(clientId: string, endpoint: string): Admission {
    const now = this.now();
    const category = categorize(endpoint);
    const limit = this.limits[category];

    const client = this.touch(clientId, now);
    if (this.clients.size > this.sweepThreshold) {
      this.sweep(now);
    }

    const window = this.windowFor(client, category);
    this.purge(window, now);

    if (window.length >= limit) {
      log.warn("Rate limit exceeded", { clientId, endpoint, category, count: window.length, limit });
      return {
        allowed: false,
        limit,
        remaining: 0,
        resetAt: this.resetAt(window, now),
        category,
      };
    }

    window.push(now);
    return {
      allowed: true,
      limit,
      remaining: Math.max(0, limit - window.length),
      resetAt: this.resetAt(window, now),
      category,
    };
  }

  stats(): RateLimiterStats {
    const now = this.now();
    const cutoff = now - this.windowMs;
    let totalTrackedWindows = 0;
    let activeRequestsInWindow = 0;

    for (const client of this.clients.values()) {
      totalTrackedWindows += client.windows.size;
      for (const window of client.windows.values()) {
        activeRequestsInWindow += window.filter((t) => t >= cutoff).length;
      }
    }

    return {
      totalTrackedClients: this.clients.size,
      totalTrackedWindows,
      activeRequestsInWindow,
      windowSizeSeconds: this.windowMs / 1000,
      limits: { ...this.limits },
      staleAfterSeconds: this.staleAfterMs / 1000,
    };
  }

  /** Drop every client idle for longer than the stale threshold. */
  sweep(now: number = this.now()): number {
    const cutoff = now - this.staleAfterMs;
    let removed = 0;
    for (const [clientId, client] of this.clients) {
      if (client.lastSeen < cutoff) {
        this.clients.delete(clientId);
        removed++;
      }
    }
    if (removed > 0) {
      log.debug("Swept stale rate-limit clients", { removed, remaining: this.clients.size });
    }
    return removed;
  }

  // ─── Internals ──────────────────────────────────────────────────────

  private touch(clientId: string, now: number): ClientState {
    let client = this.clients.get(clientId);
    if (!client) {
      client = { lastSeen: now, windows: new Map() };
      this.clients.set(clientId, client);
    }
    client.lastSeen = now;
    return client;
  }

  private windowFor(client: ClientState, category: EndpointCategory): number[] {
    let window = client.windows.get(category);
    if (!window) {
      window = [];
      client.windows.set(category, window);
    }
    return window;
  }

  private purge(window: number[], now: number): void {
    const cutoff = now - this.windowMs;
    let expired = 0;
    while (expired < window.length && (window[expired] ?? now) < cutoff) {
      expired++;
    }
    if (expired > 0) window.splice(0, expired);
  }

  private resetAt(window: number[], now: number): number {
    return (window[0] ?? now) + this.windowMs;
  }
}
