/**
 * In-process stand-ins shared by the dispatch and transport tests.
 */
import { Gateway } from "../../services/gateway/src/gateway.js";
import { Dispatcher } from "../../services/gateway/src/dispatch.js";
import { RateLimiter } from "../../services/rate-limiter/src/limiter.js";
import { UpstreamUnavailableError } from "../../services/shared/src/errors.js";
import type { RateLimits, StockMap } from "../../services/shared/src/types.js";
import type { FetchOptions, JsonFetcher } from "../../services/upstream/src/cache.js";
import { StockValidator } from "../../services/validator/src/validator.js";

export const T0 = 1_770_000_000_000;

export const STOCKS: StockMap = {
  NABIL: { name: "Nabil Bank Limited", sector: "Commercial Banks", internalSector: "Banking SubIndex" },
  NABBC: { name: "Narayani Development Bank Limited", sector: "Development Banks", internalSector: "Development Bank Ind." },
  UPPER: { name: "Upper Tamakoshi Hydropower Limited", sector: "Hydro Power", internalSector: "HydroPower Index" },
};

export const OPEN = { isOpen: "OPEN", asOf: "2026-02-10T11:00:00" };
export const CLOSED = { isOpen: "CLOSE", asOf: "2026-02-10T16:00:00" };

/** Serves canned payloads by path; an Error payload is thrown instead. */
export class StubFetcher implements JsonFetcher {
  readonly calls: { path: string; maxAgeMs: number | undefined }[] = [];

  constructor(private payloads: Record<string, unknown> = {}) {}

  set(path: string, payload: unknown): void {
    this.payloads[path] = payload;
  }

  async fetch(path: string, options: FetchOptions = {}): Promise<unknown> {
    this.calls.push({ path, maxAgeMs: options.maxAgeMs });
    const payload = this.payloads[path];
    if (payload instanceof Error) throw payload;
    if (payload === undefined) throw new UpstreamUnavailableError(`HTTP 404 from ${path}`, path, 404);
    return payload;
  }

  paths(): string[] {
    return this.calls.map((c) => c.path);
  }
}

export interface TestGatewayOptions {
  limits?: Partial<RateLimits>;
  now?: () => number;
}

export function testGateway(payloads: Record<string, unknown> = {}, options: TestGatewayOptions = {}) {
  const fetcher = new StubFetcher(payloads);
  const validator = new StockValidator(STOCKS);
  const limiter = new RateLimiter({
    ...(options.limits && { limits: options.limits }),
    now: options.now ?? (() => T0),
  });
  const dispatcher = new Dispatcher({ fetcher, validator, limiter });
  return { gateway: new Gateway(limiter, dispatcher), dispatcher, fetcher, validator, limiter };
}
