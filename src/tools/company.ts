import { z } from "zod";
import { defineTool } from "../registry/types.js";
import { limitSchema, SymbolSchema } from "../schemas/tool-inputs.js";
import { segment } from "../upstream/client.js";
import { defineLookupTool } from "./lookup.js";
import { firstOrSelf, parsePayload } from "./payload.js";

export const getStockInfo = defineTool({
  name: "get_stock_info",
  description: "Company profile and key metrics: price, market cap, sector, industry, description, CEO, website.",
  category: "Company",
  parameters: { symbol: SymbolSchema },
  async handler({ symbol }, { client, signal }) {
    const response = await client.call(`api/v3/profile/${segment(symbol)}`, {}, { signal });
    return firstOrSelf(response.payload);
  },
});

const CorporateActionsSchema = z.object({
  historical: z.array(z.record(z.unknown())).default([]),
});

/** Dividends first; splits are only requested once the dividend history parsed. */
export const getStockActions = defineTool({
  name: "get_stock_actions",
  description: "Dividend and stock split history for a symbol.",
  category: "Company",
  parameters: { symbol: SymbolSchema },
  async handler({ symbol }, { client, signal }) {
    const dividends = parsePayload(
      CorporateActionsSchema,
      await client.call(`api/v3/historical-price-full/stock_dividend/${segment(symbol)}`, {}, { signal })
    ).historical;
    const splits = parsePayload(
      CorporateActionsSchema,
      await client.call(`api/v3/historical-price-full/stock_split/${segment(symbol)}`, {}, { signal })
    ).historical;
    return { dividends, splits };
  },
});

export const searchCompanies = defineTool({
  name: "search_companies",
  description: "Search companies by name or ticker fragment, optionally on one exchange.",
  category: "Company",
  parameters: {
    query: z.string().trim().min(1, "Query is required").describe("Search keywords"),
    limit: limitSchema(100).default(10).describe("Max results"),
    exchange: z.string().trim().min(1).optional().describe('Exchange code, e.g. "NASDAQ"'),
  },
  async handler({ query, limit, exchange }, { client, signal }) {
    const response = await client.call("api/v3/search", { query, limit, exchange }, { signal });
    return response.payload;
  },
});

export const companyInfoExtended = defineLookupTool({
  name: "company_info_extended",
  description:
    "Extended company data: CIK profile, notes, peers, delistings, employee counts, market capitalization, share float.",
  category: "Company",
  selector: "info_type",
  kinds: [
    "profile_cik",
    "company_notes",
    "stock_peers",
    "delisted_companies",
    "employee_count",
    "historical_employee_count",
    "market_capitalization",
    "market_capitalization_batch",
    "historical_market_capitalization",
    "shares_float",
    "shares_float_all",
  ],
});

export const companyTools = [getStockInfo, getStockActions, searchCompanies, companyInfoExtended];
