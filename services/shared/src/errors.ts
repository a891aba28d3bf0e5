/**
 * Gateway error taxonomy.
 * Every binding converts thrown values into an ErrorBody at its boundary;
 * none of these is allowed to take the process down.
 */
import type { Admission, MarketState } from "./types.js";

export type ErrorCode =
  | "upstream_unavailable"
  | "validation_failed"
  | "rate_limit_exceeded"
  | "market_state"
  | "route_not_found"
  | "invalid_message"
  | "forbidden"
  | "internal_error";

export class GatewayError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly status: number,
    public readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = "GatewayError";
  }
}

/** Network failure, timeout, non-2xx status or malformed JSON from the data source. */
export class UpstreamUnavailableError extends GatewayError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly upstreamStatus: number = 0,
  ) {
    super(message, "upstream_unavailable", 502, { path, upstreamStatus });
    this.name = "UpstreamUnavailableError";
  }
}

export class ValidationFailureError extends GatewayError {
  constructor(
    message: string,
    public readonly param: string,
    public readonly suggestions: string[] = [],
  ) {
    super(message, "validation_failed", 400, { param, suggestions });
    this.name = "ValidationFailureError";
  }
}

export class RateLimitExceededError extends GatewayError {
  constructor(public readonly admission: Admission) {
    const retryAfter = retryAfterSeconds(admission);
    super(`Too many requests. Try again in ${retryAfter} seconds.`, "rate_limit_exceeded", 429, {
      limit: admission.limit,
      remaining: admission.remaining,
      resetTime: Math.floor(admission.resetAt / 1000),
      category: admission.category,
      retryAfter,
    });
    this.name = "RateLimitExceededError";
  }
}

export class MarketStateError extends GatewayError {
  constructor(
    public readonly route: string,
    public readonly required: MarketState,
    public readonly actual: MarketState,
  ) {
    super(
      required === "open"
        ? `Market is closed. ${route} only works when the market is open.`
        : `Market is open. ${route} only works when the market is closed.`,
      "market_state",
      409,
      { route, required, actual },
    );
    this.name = "MarketStateError";
  }
}

export class RouteNotFoundError extends GatewayError {
  constructor(public readonly route: string) {
    super(`Route '${route}' not found`, "route_not_found", 404, { route });
    this.name = "RouteNotFoundError";
  }
}

export class InvalidMessageError extends GatewayError {
  constructor(message: string) {
    super(message, "invalid_message", 400);
    this.name = "InvalidMessageError";
  }
}

export class ForbiddenError extends GatewayError {
  constructor(message: string) {
    super(message, "forbidden", 403);
    this.name = "ForbiddenError";
  }
}

export interface ErrorBody {
  error: ErrorCode;
  message: string;
  [detail: string]: unknown;
}

/** Seconds a rejected client should wait; never less than 1. */
export function retryAfterSeconds(admission: Admission, now: number = Date.now()): number {
  return Math.max(1, Math.ceil((admission.resetAt - now) / 1000));
}

export function toErrorBody(err: unknown, exposeInternal = process.env["NODE_ENV"] !== "production"): ErrorBody {
  if (err instanceof GatewayError) {
    return { ...err.details, error: err.code, message: err.message };
  }
  const message = err instanceof Error ? err.message : String(err);
  return {
    error: "internal_error",
    message: exposeInternal ? message : "Internal server error",
  };
}

export function statusFor(err: unknown): number {
  return err instanceof GatewayError ? err.status : 500;
}
