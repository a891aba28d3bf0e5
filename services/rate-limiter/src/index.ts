/**
 * rate-limiter — sliding-window admission per client and endpoint category
 */
export { RateLimiter, type RateLimiterConfig, type RateLimiterStats } from "./limiter.js";
export { categorize, DEFAULT_RATE_LIMITS, WEBSOCKET_CONNECTION, WEBSOCKET_MESSAGE } from "./categories.js";
export { rateLimitHeaders, rejectionHeaders, rateLimitSummary } from "./headers.js";
