/**
 * Endpoint categorization.
 * Maps an HTTP path, route name or connection tag onto the category whose
 * limit applies. Unknown or malformed input falls through to "default".
 */
import type { EndpointCategory, RateLimits } from "../../shared/src/types.js";

export const DEFAULT_RATE_LIMITS: RateLimits = {
  health: 50,
  validation: 120,
  market_data: 60,
  websocket_connection: 100,
  websocket_message: 50,
  default: 60,
};

export const WEBSOCKET_CONNECTION = "websocket_connection";
export const WEBSOCKET_MESSAGE = "websocket_message";

const MARKET_DATA_ROUTES: ReadonlySet<string> = new Set([
  "summary",
  "livemarket",
  "pricevolume",
  "topgainers",
  "toplosers",
]);

export function categorize(endpoint: string): EndpointCategory {
  if (endpoint === WEBSOCKET_CONNECTION) return "websocket_connection";
  if (endpoint === WEBSOCKET_MESSAGE) return "websocket_message";

  const name = endpoint.split("?")[0]?.replace(/^\/+/, "").toLowerCase() ?? "";

  if (name === "health") return "health";
  if (name.startsWith("validate") || name.startsWith("validation")) return "validation";
  if (MARKET_DATA_ROUTES.has(name)) return "market_data";
  return "default";
}
