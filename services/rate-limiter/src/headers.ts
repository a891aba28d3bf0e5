import type { Admission } from "../../shared/src/types.js";
import { retryAfterSeconds } from "../../shared/src/errors.js";

/** Response headers advertising the caller's budget. */
export function rateLimitHeaders(admission: Admission): Record<string, string> {
  return {
    "X-RateLimit-Limit": String(admission.limit),
    "X-RateLimit-Remaining": String(admission.remaining),
    "X-RateLimit-Reset": String(Math.floor(admission.resetAt / 1000)),
    "X-RateLimit-Category": admission.category,
  };
}

export function rejectionHeaders(admission: Admission, now: number = Date.now()): Record<string, string> {
  return {
    ...rateLimitHeaders(admission),
    "Retry-After": String(retryAfterSeconds(admission, now)),
  };
}

/** Budget summary attached to websocket replies. */
export function rateLimitSummary(admission: Admission): { limit: number; remaining: number; resetTime: number } {
  return {
    limit: admission.limit,
    remaining: admission.remaining,
    resetTime: Math.floor(admission.resetAt / 1000),
  };
}
