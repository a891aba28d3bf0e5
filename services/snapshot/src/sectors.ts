/** Exchange sector name → internal index label stored in the snapshot. */
export const INTERNAL_SECTOR_MAP: Readonly<Record<string, string>> = {
  "Commercial Banks": "Banking SubIndex",
  "Development Banks": "Development Bank Ind.",
  "Finance": "Finance Index",
  "Hotels And Tourism": "Hotels And Tourism",
  "Hydro Power": "HydroPower Index",
  "Investment": "Investment",
  "Life Insurance": "Life Insurance",
  "Manufacturing And Processing": "Manufacturing And Pr.",
  "Microfinance": "Microfinance Index",
  "Mutual Fund": "Mutual Fund",
  "NEPSE": "NEPSE Index",
  "Non Life Insurance": "Non Life Insurance",
  "Others": "Others Index",
  "Tradings": "Trading Index",
  "Promoter Share": "Promoter Share",
};

export const DEFAULT_INTERNAL_SECTOR = "Others Index";
export const UNKNOWN_SECTOR = "Unknown";

export function internalSectorFor(sector: string): string {
  if (!Object.hasOwn(INTERNAL_SECTOR_MAP, sector)) return DEFAULT_INTERNAL_SECTOR;
  return INTERNAL_SECTOR_MAP[sector] ?? DEFAULT_INTERNAL_SECTOR;
}
