/**
 * Upstream Client
 *
 * Thin GET wrapper around the exchange data source. Every higher layer goes
 * through `get(path)`; the base URL, timeout and retry budget come from config.
 *
 * - Retries with exponential backoff on 429 / 5xx / network errors.
 * - Non-retryable statuses and malformed JSON fail immediately.
 * - All failures surface as UpstreamUnavailableError.
 */
import { createLogger } from "../../shared/src/logger.js";
import { UpstreamUnavailableError } from "../../shared/src/errors.js";

const log = createLogger("upstream");

const INITIAL_BACKOFF_MS = 250;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface UpstreamClientConfig {
  baseUrl: string;
  timeoutMs?: number;  // default 15000
  retries?: number;    // extra attempts after the first, default 2
  fetchImpl?: FetchLike;
  backoffMs?: number;
}

export class UpstreamClient {
  readonly baseUrl: string;
  private timeoutMs: number;
  private retries: number;
  private fetchImpl: FetchLike;
  private backoffMs: number;

  constructor(config: UpstreamClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.timeoutMs = config.timeoutMs ?? 15_000;
    this.retries = config.retries ?? 2;
    this.fetchImpl = config.fetchImpl ?? fetch;
    this.backoffMs = config.backoffMs ?? INITIAL_BACKOFF_MS;
  }

  /** GET `path` and return the decoded JSON body. */
  async get(path: string): Promise<unknown> {
    const response = await this.send(path);
    return decodeJson(response, path);
  }

  /** True when the health path answers 2xx, whatever its body; never throws. */
  async isHealthy(healthPath = "/health"): Promise<boolean> {
    try {
      const response = await this.send(healthPath);
      await response.body?.cancel();
      return true;
    } catch (err) {
      log.error("Upstream health check failed", { error: err instanceof Error ? err.message : String(err) });
      return false;
    }
  }

  private async send(path: string): Promise<Response> {
    const url = this.baseUrl + (path.startsWith("/") ? path : `/${path}`);
    let lastError: UpstreamUnavailableError | undefined;

    for (let attempt = 0; attempt <= this.retries; attempt++) {
      if (attempt > 0) {
        await sleep(this.backoffMs * 2 ** (attempt - 1));
      }

      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method: "GET",
          headers: { Accept: "application/json" },
          signal: AbortSignal.timeout(this.timeoutMs),
        });
      } catch (err) {
        // Network-level errors and timeouts are retryable
        const reason = err instanceof Error ? err.message : String(err);
        lastError = new UpstreamUnavailableError(`Upstream request failed: ${reason}`, path);
        log.warn("Upstream fetch failed", { path, attempt, error: reason });
        continue;
      }

      if (response.ok) {
        return response;
      }

      const error = new UpstreamUnavailableError(
        `HTTP ${response.status} from GET ${path}`,
        path,
        response.status,
      );

      if (response.status === 429 || response.status >= 500) {
        lastError = error;
        log.warn("Upstream returned retryable status", { path, attempt, status: response.status });
        // Release the connection before the next attempt
        await response.body?.cancel();
        continue;
      }

      log.error("Upstream returned client error", { path, status: response.status });
      await response.body?.cancel();
      throw error;
    }

    log.error("Upstream retries exhausted", { path, attempts: this.retries + 1 });
    throw lastError ?? new UpstreamUnavailableError("Upstream request failed", path);
  }
}

async function decodeJson(response: Response, path: string): Promise<unknown> {
  const text = await response.text();
  try {
    return JSON.parse(text);
  } catch {
    log.error("Upstream returned malformed JSON", { path, bytes: text.length });
    throw new UpstreamUnavailableError(`Malformed JSON from GET ${path}`, path, response.status);
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
