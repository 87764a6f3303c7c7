import { z } from "zod";
import { defineTool } from "../registry/types.js";
import { limitSchema, SymbolSchema } from "../schemas/tool-inputs.js";
import { defineLookupTool } from "./lookup.js";
import { firstOrSelf } from "./payload.js";

export const analystData = defineLookupTool({
  name: "analyst_data",
  description:
    "Analyst coverage: financial estimates, ratings, price targets and grades, including their news feeds.",
  category: "Analyst",
  selector: "data_type",
  kinds: [
    "financial_estimates",
    "ratings_snapshot",
    "ratings_historical",
    "price_target_summary",
    "price_target_consensus",
    "price_target_news",
    "price_target_latest_news",
    "grades",
    "grades_historical",
    "grades_consensus",
    "grades_news",
    "grades_latest_news",
  ],
  paths: { financial_estimates: "analyst-estimates" },
});

const RATING_ENDPOINTS = {
  latest: "stable/ratings-snapshot",
  historical: "stable/ratings-historical",
} as const;

export const getAnalystRatings = defineTool({
  name: "get_analyst_ratings",
  description: "FMP rating for a symbol: the latest snapshot, or the historical series.",
  category: "Analyst",
  parameters: {
    symbol: SymbolSchema,
    mode: z.enum(["latest", "historical"]).default("latest").describe("Snapshot or history"),
    limit: limitSchema(1000).optional().describe("Max rows"),
  },
  async handler({ symbol, mode, limit }, { client, signal }) {
    const response = await client.call(RATING_ENDPOINTS[mode], { symbol, limit }, { signal });
    return response.payload;
  },
});

/** Consensus first; related news is only fetched once the consensus lookup succeeded. */
export const getPriceTargetOverview = defineTool({
  name: "get_price_target_overview",
  description: "Analyst price target consensus (high, low, median, consensus) plus the latest price target news.",
  category: "Analyst",
  parameters: {
    symbol: SymbolSchema,
    news_limit: limitSchema(50).default(10).describe("Max news items"),
  },
  async handler({ symbol, news_limit }, { client, signal }) {
    const consensus = await client.call("stable/price-target-consensus", { symbol }, { signal });
    const news = await client.call("stable/price-target-news", { symbol, limit: news_limit }, { signal });
    return {
      consensus: firstOrSelf(consensus.payload),
      news: news.payload,
    };
  },
});

export const analystTools = [analystData, getAnalystRatings, getPriceTargetOverview];
