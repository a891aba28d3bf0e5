/**
 * Endpoint response cache.
 * In-memory TTL store keyed by upstream path, in front of the Upstream Client.
 */
import { createLogger } from "../../shared/src/logger.js";

const log = createLogger("endpoint-cache");

interface CacheEntry<T> {
  value: T;
  storedAt: number;
  expiresAt: number;
}

export class TTLCache<T> {
  private store = new Map<string, CacheEntry<T>>();
  private ttlMs: number;
  private cleanupInterval: ReturnType<typeof setInterval> | null = null;

  constructor(ttlSeconds: number, cleanupIntervalSeconds = 60) {
    this.ttlMs = ttlSeconds * 1000;

    // Auto-cleanup expired entries
    if (cleanupIntervalSeconds > 0) {
      this.cleanupInterval = setInterval(
        () => this.cleanup(),
        cleanupIntervalSeconds * 1000
      );
      // Don't prevent process exit
      if (this.cleanupInterval.unref) {
        this.cleanupInterval.unref();
      }
    }
  }

  /**
   * Expired entries are a miss and are evicted on this read.
   * An entry older than `maxAgeMs` is also a miss but stays stored.
   */
  get(key: string, maxAgeMs?: number): T | undefined {
    const entry = this.store.get(key);
    if (!entry) return undefined;

    const now = Date.now();
    if (now >= entry.expiresAt) {
      this.store.delete(key);
      return undefined;
    }
    if (maxAgeMs !== undefined && now - entry.storedAt >= maxAgeMs) {
      return undefined;
    }

    return entry.value;
  }

  set(key: string, value: T): void {
    const now = Date.now();
    this.store.set(key, { value, storedAt: now, expiresAt: now + this.ttlMs });
  }

  get size(): number {
    this.cleanup();
    return this.store.size;
  }

  private cleanup(): void {
    const now = Date.now();
    for (const [key, entry] of this.store) {
      if (now >= entry.expiresAt) {
        this.store.delete(key);
      }
    }
  }

  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.store.clear();
  }
}

// ─── Endpoint Cache ─────────────────────────────────────────────────

/** Anything that can resolve an upstream path to JSON. */
export interface FetchOptions {
  /** Treat a stored entry older than this as a miss */
  maxAgeMs?: number;
}

export interface JsonFetcher {
  fetch(path: string, options?: FetchOptions): Promise<unknown>;
}

export interface UpstreamSource {
  get(path: string): Promise<unknown>;
}

export interface EndpointCacheStats {
  entries: number;
  hits: number;
  misses: number;
  ttlSeconds: number;
}

/**
 * Memoizes upstream GETs by path for a fixed TTL.
 *
 * Failed fetches are never stored. There is no single-flight: two callers
 * missing the same path at the same time each reach upstream.
 */
export class EndpointCache implements JsonFetcher {
  private cache: TTLCache<unknown>;
  private hits = 0;
  private misses = 0;

  constructor(
    private upstream: UpstreamSource,
    private ttlSeconds = 600,
    cleanupIntervalSeconds = 60,
  ) {
    this.cache = new TTLCache<unknown>(ttlSeconds, cleanupIntervalSeconds);
  }

  async fetch(path: string, options: FetchOptions = {}): Promise<unknown> {
    const cached = this.cache.get(path, options.maxAgeMs);
    if (cached !== undefined) {
      this.hits++;
      return cached;
    }

    this.misses++;
    log.debug("Cache miss", { path });
    const value = await this.upstream.get(path);
    this.cache.set(path, value);
    return value;
  }

  stats(): EndpointCacheStats {
    return {
      entries: this.cache.size,
      hits: this.hits,
      misses: this.misses,
      ttlSeconds: this.ttlSeconds,
    };
  }

  destroy(): void {
    this.cache.destroy();
  }
}
