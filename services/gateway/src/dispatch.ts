/**
 * Dispatcher: resolves a route name against the table, validates its
 * parameters, enforces its market-state precondition and serves it.
 */
import {
  MarketStateError,
  RouteNotFoundError,
  ValidationFailureError,
} from "../../shared/src/errors.js";
import { MARKET_STATUS_PATH, parseMarketState, satisfiesMarketState } from "../../shared/src/market-session.js";
import type { MarketState } from "../../shared/src/types.js";
import {
  getRoute,
  isRouteName,
  paramsOf,
  type ParamSpec,
  type PayloadTransform,
  type ResolvedParams,
  type RouteContext,
  type RouteDescriptor,
} from "./routes.js";

export interface DispatcherConfig {
  /** Oldest cached market status the precondition check accepts */
  marketStatusTtlMs?: number;
}

export type RawParams = Readonly<Record<string, unknown>>;

export class Dispatcher {
  private marketStatusTtlMs: number;

  constructor(
    private ctx: RouteContext,
    config: DispatcherConfig = {},
  ) {
    this.marketStatusTtlMs = config.marketStatusTtlMs ?? 30_000;
  }

  async dispatch(name: string, rawParams: RawParams = {}): Promise<unknown> {
    if (!isRouteName(name)) throw new RouteNotFoundError(name);
    const route = getRoute(name);

    const params = this.resolveParams(paramsOf(route), rawParams);

    if (route.marketState) {
      const actual = await this.marketState();
      if (!satisfiesMarketState(route.marketState, actual)) {
        throw new MarketStateError(name, route.marketState, actual);
      }
    }

    return this.serve(route, params);
  }

  /** Current session state, read through the cache with a short TTL. */
  async marketState(): Promise<MarketState> {
    const payload = await this.ctx.fetcher.fetch(MARKET_STATUS_PATH, { maxAgeMs: this.marketStatusTtlMs });
    return parseMarketState(payload);
  }

  private async serve(route: RouteDescriptor, params: ResolvedParams): Promise<unknown> {
    switch (route.kind) {
      case "passthrough":
        return applyTransform(route.transform, await this.ctx.fetcher.fetch(route.path));
      case "parameterized":
        return applyTransform(route.transform, await this.ctx.fetcher.fetch(withQuery(route.path, params)));
      case "composite":
        return route.run(this.ctx, params);
      default:
        return assertNever(route);
    }
  }

  private resolveParams(specs: readonly ParamSpec[], raw: RawParams): ResolvedParams {
    const resolved: Record<string, string> = {};
    for (const spec of specs) {
      resolved[spec.name] = this.resolveParam(spec, asText(raw[spec.name]));
    }
    return resolved;
  }

  private resolveParam(spec: ParamSpec, value: string): string {
    switch (spec.kind) {
      case "symbol": {
        const result = this.ctx.validator.validateStockSymbol(value);
        if (!result.valid) {
          throw new ValidationFailureError(result.message, spec.name, result.suggestions);
        }
        return result.symbol;
      }
      case "index": {
        const result = this.ctx.validator.validateIndexName(value);
        if (!result.valid) {
          throw new ValidationFailureError(result.message, spec.name, result.suggestions);
        }
        return result.indexName;
      }
      case "text": {
        const text = value.trim();
        if (!text && !spec.optional) {
          throw new ValidationFailureError(`Parameter '${spec.name}' is required`, spec.name);
        }
        return text;
      }
      default:
        return assertNever(spec.kind);
    }
  }
}

function asText(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return "";
}

function applyTransform(transform: PayloadTransform | undefined, payload: unknown): unknown {
  return transform ? transform(payload) : payload;
}

export function withQuery(path: string, params: ResolvedParams): string {
  const query = new URLSearchParams(Object.entries(params)).toString();
  return query ? `${path}?${query}` : path;
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
