/**
 * Tests for market session awareness
 */
import { describe, it, expect } from "vitest";
import { parseMarketState, satisfiesMarketState } from "../../services/shared/src/market-session.js";

describe("market session", () => {
  it("should read OPEN as open", () => {
    expect(parseMarketState({ isOpen: "OPEN", asOf: "2026-02-10T11:00:00", id: 1 })).toBe("open");
  });

  it("should tolerate case and whitespace in the flag", () => {
    expect(parseMarketState({ isOpen: " open " })).toBe("open");
  });

  it("should treat any other flag as closed", () => {
    expect(parseMarketState({ isOpen: "CLOSE" })).toBe("closed");
    expect(parseMarketState({ isOpen: "PRE_OPEN" })).toBe("closed");
  });

  it("should treat a malformed payload as closed", () => {
    expect(parseMarketState(null)).toBe("closed");
    expect(parseMarketState({ open: true })).toBe("closed");
    expect(parseMarketState("OPEN")).toBe("closed");
  });

  it("should check preconditions", () => {
    expect(satisfiesMarketState(undefined, "closed")).toBe(true);
    expect(satisfiesMarketState("open", "open")).toBe(true);
    expect(satisfiesMarketState("open", "closed")).toBe(false);
    expect(satisfiesMarketState("closed", "open")).toBe(false);
  });
});
