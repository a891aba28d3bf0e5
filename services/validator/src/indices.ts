/**
 * Index names the exchange publishes.
 * Upstream naming is inconsistent between payloads, so both the corrected
 * display names and the truncated legacy spellings are accepted.
 */
export const INDEX_NAMES: readonly string[] = [
  "Banking SubIndex",
  "Development Bank Index",
  "Finance Index",
  "Hotels And Tourism Index",
  "HydroPower Index",
  "Investment Index",
  "Life Insurance",
  "Manufacturing And Processing",
  "Microfinance Index",
  "Mutual Fund",
  "NEPSE Index",
  "Non Life Insurance",
  "Others Index",
  "Trading Index",
  // legacy spellings
  "Development Bank Ind.",
  "Hotels And Tourism",
  "Investment",
  "Manufacturing And Pr.",
];
