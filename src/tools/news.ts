import { z } from "zod";
import { defineTool } from "../registry/types.js";
import { limitSchema, SymbolSchema } from "../schemas/tool-inputs.js";
import { defineLookupTool } from "./lookup.js";
import { parsePayload } from "./payload.js";

const NewsPayloadSchema = z.array(
  z.object({
    title: z.string().nullish(),
    text: z.string().nullish(),
    url: z.string().nullish(),
    publishedDate: z.string().nullish(),
  })
);

export interface NewsItem {
  title: string;
  summary: string;
  url: string;
  publishedDate: string | null;
}

export const getNewsSentiment = defineTool({
  name: "get_news_sentiment",
  description: "Recent news articles mentioning a symbol: title, summary, link and publication date.",
  category: "News",
  parameters: {
    symbol: SymbolSchema,
    limit: limitSchema(100).default(50).describe("Max articles"),
  },
  async handler({ symbol, limit }, { client, signal }): Promise<NewsItem[]> {
    const response = await client.call(
      "api/v4/general_news",
      { tickers: symbol, page: 0, size: limit },
      { signal }
    );
    return parsePayload(NewsPayloadSchema, response).map((item) => ({
      title: item.title ?? "",
      summary: item.text ?? "",
      url: item.url ?? "",
      publishedDate: item.publishedDate ?? null,
    }));
  },
});

export const cryptoNews = defineLookupTool({
  name: "crypto_news",
  description: "Cryptocurrency news: latest headlines, or a search by symbol via params.",
  category: "News",
  selector: "news_type",
  kinds: ["latest", "search"],
  paths: {
    latest: "news/crypto-latest",
    search: "news/crypto",
  },
});

export const newsTools = [getNewsSentiment, cryptoNews];
