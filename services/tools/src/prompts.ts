/**
 * Canned user prompts offered alongside the tools. Each renders a single
 * user message from its template, with `{arg}` placeholders filled from
 * the prompt's arguments.
 */

export interface ToolPrompt {
  name: string;
  description: string;
  args: readonly string[];
  template: string;
}

export const TOOL_PROMPTS: readonly ToolPrompt[] = [
  {
    name: "stock-quick-lookup",
    description: "Get a quick summary of a stock's current price, volume, and latest trades.",
    args: ["symbol"],
    template: "Show me a quick summary for {symbol}.",
  },
  {
    name: "market-sentiment-snapshot",
    description: "Get a snapshot of today's top gainers, losers, and overall market mood.",
    args: [],
    template: "Give me today's top gainers, losers, and a market summary.",
  },
  {
    name: "sector-performance",
    description: "Analyze the performance of a specific sector today.",
    args: ["sector"],
    template: "Analyze today's performance for the {sector} sector.",
  },
  {
    name: "company-deep-dive",
    description: "Get a detailed report on a company: profile, price history, and recent trades.",
    args: ["symbol"],
    template: "Give me a detailed report for {symbol}, including profile, price history, and recent trades.",
  },
  {
    name: "live-market-watchlist",
    description: "Monitor live prices and volumes for a custom list of stocks.",
    args: ["symbols"],
    template: "Show me live prices and volumes for: {symbols}",
  },
  {
    name: "market-depth-analyzer",
    description: "Analyze the current bid/ask depth for a stock (only when market is open).",
    args: ["symbol"],
    template: "Analyze the current market depth for {symbol}.",
  },
  {
    name: "post-market-trade-explorer",
    description: "Explore all trades for a stock after market close (floorsheet).",
    args: ["symbol"],
    template: "Show me all trades for {symbol} after market close.",
  },
  {
    name: "validate-stock-symbol",
    description: "Check if a stock symbol is valid and get suggestions if not.",
    args: ["symbol"],
    template: "Validate the stock symbol: {symbol}",
  },
  {
    name: "market-open-status",
    description: "Check if the NEPSE market is currently open or closed.",
    args: [],
    template: "Is the NEPSE market currently open or closed?",
  },
  {
    name: "setup-alert",
    description: "Set up a price or volume alert for a stock (UI clients can use this to trigger notifications).",
    args: ["symbol", "type", "threshold"],
    template: "Set up an alert for {symbol} when {type} crosses {threshold}.",
  },
];

/** Fill `{arg}` placeholders; a placeholder with no matching argument is left as written. */
export function renderPrompt(prompt: ToolPrompt, args: Readonly<Record<string, string>>): string {
  return prompt.template.replace(/\{(\w+)\}/g, (placeholder, name: string) =>
    Object.hasOwn(args, name) ? (args[name] ?? placeholder) : placeholder,
  );
}
