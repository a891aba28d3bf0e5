/**
 * Agent tool names and the routes they call.
 */
import type { RouteName } from "../../gateway/src/routes.js";

/**
 * - none: no arguments
 * - symbol: `{ symbol }`, passed through as the route's `symbol`
 * - company: `{ company_name }`, passed as the route's `query`
 */
export type ToolArgs = "none" | "symbol" | "company";

export interface ToolBinding {
  name: string;
  description: string;
  route: RouteName;
  args: ToolArgs;
}

export const TOOL_BINDINGS: readonly ToolBinding[] = [
  { name: "get_market_summary", route: "Summary", args: "none", description: "Get the latest NEPSE market summary including key metrics." },
  { name: "get_live_market", route: "LiveMarket", args: "none", description: "Get real-time live market data for all securities. Only works while the market is open." },
  { name: "get_price_volume", route: "PriceVolume", args: "none", description: "Get price and volume data for all stocks." },
  { name: "get_top_gainers", route: "TopGainers", args: "none", description: "Get the list of top gaining stocks." },
  { name: "get_top_losers", route: "TopLosers", args: "none", description: "Get the list of top losing stocks." },
  { name: "get_nepse_index", route: "NepseIndex", args: "none", description: "Get NEPSE index information keyed by index name." },
  { name: "get_sector_indices", route: "NepseSubIndices", args: "none", description: "Get sub-indices for all sectors." },
  { name: "check_market_status", route: "IsNepseOpen", args: "none", description: "Check whether the NEPSE market is currently open." },
  { name: "get_company_list", route: "CompanyList", args: "none", description: "Get the list of all companies listed in NEPSE." },
  { name: "get_supply_demand", route: "SupplyDemand", args: "none", description: "Get supply and demand data for the market. Only works while the market is open." },
  { name: "get_top_turnover", route: "TopTenTurnoverScrips", args: "none", description: "Get the top companies by turnover." },
  { name: "get_comprehensive_market_data", route: "TradeTurnoverTransactionSubindices", args: "none", description: "Get per-scrip details and per-sector rollups for the current session." },
  { name: "get_floorsheet", route: "Floorsheet", args: "none", description: "Get the full floorsheet of the last session. Only works while the market is closed." },
  { name: "get_company_details", route: "CompanyDetails", args: "symbol", description: "Get detailed information about a specific company." },
  { name: "get_company_floorsheet", route: "FloorsheetOf", args: "symbol", description: "Get floorsheet data for a specific company. Only works while the market is closed." },
  { name: "get_price_history", route: "PriceVolumeHistory", args: "symbol", description: "Get historical price and volume data for a company." },
  { name: "get_market_depth", route: "MarketDepth", args: "symbol", description: "Get market depth (bid/ask) for a stock. Only works while the market is open." },
  { name: "validate_stock_symbol", route: "ValidateStock", args: "symbol", description: "Check whether a stock symbol is listed, with suggestions when it is not." },
  { name: "get_validation_stats", route: "ValidationStats", args: "none", description: "Get counts and samples of known stocks and indices." },
  { name: "find_symbol_by_company_name", route: "FindSymbolByCompanyName", args: "company", description: "Find stock symbols whose company name matches a search term." },
  { name: "find_company_name_by_symbol", route: "FindCompanyNameBySymbol", args: "symbol", description: "Get the company name for a stock symbol." },
];

export function findTool(name: string): ToolBinding | undefined {
  return TOOL_BINDINGS.find((t) => t.name === name);
}
