/**
 * Exchange sector name → label of its live sub-index row.
 * The two vocabularies differ; this table is exhaustive for the exchange.
 */
export const SECTOR_SUBINDEX_MAP: Readonly<Record<string, string>> = {
  "Commercial Banks": "Banking SubIndex",
  "Development Banks": "Development Bank Index",
  "Finance": "Finance Index",
  "Hotels And Tourism": "Hotels And Tourism Index",
  "Hydro Power": "HydroPower Index",
  "Investment": "Investment Index",
  "Life Insurance": "Life Insurance",
  "Manufacturing And Processing": "Manufacturing And Processing",
  "Microfinance": "Microfinance Index",
  "Mutual Fund": "Mutual Fund",
  "Non Life Insurance": "Non Life Insurance",
  "Others": "Others Index",
  "Tradings": "Trading Index",
};
