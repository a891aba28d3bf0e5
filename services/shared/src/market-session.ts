/**
 * Market Session Awareness
 * The exchange publishes its own open/closed flag; routes that only make
 * sense during (or outside) a session are gated on it.
 */
import { z } from "zod";
import type { MarketState } from "./types.js";

export const MARKET_STATUS_PATH = "/IsNepseOpen";

const marketStatusSchema = z
  .object({
    isOpen: z.string(),
    asOf: z.string().optional(),
    id: z.number().optional(),
  })
  .passthrough();

export type MarketStatus = z.infer<typeof marketStatusSchema>;

/**
 * Read the session flag from an upstream status payload.
 * Anything other than an explicit "OPEN" counts as closed.
 */
export function parseMarketState(payload: unknown): MarketState {
  const result = marketStatusSchema.safeParse(payload);
  if (!result.success) return "closed";
  return result.data.isOpen.trim().toUpperCase() === "OPEN" ? "open" : "closed";
}

export function satisfiesMarketState(required: MarketState | undefined, actual: MarketState): boolean {
  return required === undefined || required === actual;
}
