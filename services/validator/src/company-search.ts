/**
 * Company-name normalization.
 *
 * Listed names are long legal names ("Nepal Life Insurance Company Limited")
 * while people search with one colloquial word ("nepal life" or "nlic").
 * A name reduces to its first significant word after the corporate-form
 * suffix is removed; matching compares those words.
 */

const CORPORATE_SUFFIXES: readonly string[] = [
  "microfinance bittiya sanstha limited",
  "microfinance financial institution limited",
  "laghubitta bittiya sanstha limited",
  "laghubitta sanstha limited",
  "bittiya sanstha limited",
  "development bank limited",
  "insurance company limited",
  "finance company limited",
  "private limited",
  "company limited",
  "pvt. ltd.",
  "pvt ltd",
  "bank limited",
  "finance limited",
  "limited",
  "ltd.",
  "ltd",
].slice().sort((a, b) => b.length - a.length);

const ARTICLES: ReadonlySet<string> = new Set(["the", "a", "an"]);

/** Lower-case and drop the longest matching corporate-form suffix. */
export function stripCorporateSuffix(name: string): string {
  const lower = name.toLowerCase().trim().replace(/\s+/g, " ");
  for (const suffix of CORPORATE_SUFFIXES) {
    if (lower.endsWith(` ${suffix}`)) {
      return lower.slice(0, lower.length - suffix.length).trim();
    }
  }
  return lower;
}

/** First token longer than two characters that is not an article. */
export function firstSignificantWord(text: string): string {
  const tokens = text.split(/[\s,.()&/-]+/).filter(Boolean);
  return tokens.find((t) => t.length > 2 && !ARTICLES.has(t)) ?? "";
}

export function companyKey(name: string): string {
  return firstSignificantWord(stripCorporateSuffix(name));
}
