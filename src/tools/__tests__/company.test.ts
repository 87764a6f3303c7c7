import { describe, it, expect } from "vitest";
import { createTestRegistry } from "../../__tests__/support/stubClient.js";
import { companyTools } from "../company.js";
import { fundamentalsTools } from "../fundamentals.js";
import { newsTools } from "../news.js";

describe("company tools", () => {
  it("get_stock_info returns an object payload unchanged", async () => {
    const { registry } = createTestRegistry(companyTools, {
      "api/v3/profile/AAPL": { symbol: "AAPL", price: 190.1 },
    });

    await expect(registry.dispatch("get_stock_info", { symbol: "AAPL" })).resolves.toEqual({
      symbol: "AAPL",
      price: 190.1,
    });
  });

  it("get_stock_info unwraps a one-element list", async () => {
    const { registry } = createTestRegistry(companyTools, {
      "api/v3/profile/BRK.B": [{ symbol: "BRK.B", sector: "Financial Services" }],
    });

    await expect(registry.dispatch("get_stock_info", { symbol: "brk.b" })).resolves.toEqual({
      symbol: "BRK.B",
      sector: "Financial Services",
    });
  });

  it("get_stock_actions combines dividends and splits", async () => {
    const { registry } = createTestRegistry(companyTools, {
      "api/v3/historical-price-full/stock_dividend/AAPL": {
        symbol: "AAPL",
        historical: [{ date: "2024-02-09", dividend: 0.24 }],
      },
      "api/v3/historical-price-full/stock_split/AAPL": {
        symbol: "AAPL",
        historical: [{ date: "2020-08-31", numerator: 4, denominator: 1 }],
      },
    });

    await expect(registry.dispatch("get_stock_actions", { symbol: "AAPL" })).resolves.toEqual({
      dividends: [{ date: "2024-02-09", dividend: 0.24 }],
      splits: [{ date: "2020-08-31", numerator: 4, denominator: 1 }],
    });
  });

  it("get_stock_actions treats an empty history object as no actions", async () => {
    const { registry } = createTestRegistry(companyTools, {
      "api/v3/historical-price-full/stock_dividend/TSLA": {},
      "api/v3/historical-price-full/stock_split/TSLA": { historical: [] },
    });

    await expect(registry.dispatch("get_stock_actions", { symbol: "TSLA" })).resolves.toEqual({
      dividends: [],
      splits: [],
    });
  });

  it("get_stock_actions does not request splits when dividends fail", async () => {
    const { registry, client } = createTestRegistry(companyTools);

    await expect(registry.dispatch("get_stock_actions", { symbol: "AAPL" })).rejects.toThrow(
      'Tool "get_stock_actions" failed: Upstream api/v3/historical-price-full/stock_dividend/AAPL responded with status 404'
    );
    expect(client.calls.map((c) => c.endpoint)).toEqual(["api/v3/historical-price-full/stock_dividend/AAPL"]);
  });

  it("get_stock_actions does not request splits when the dividend history is malformed", async () => {
    const { registry, client } = createTestRegistry(companyTools, {
      "api/v3/historical-price-full/stock_dividend/AAPL": { historical: "unavailable" },
      "api/v3/historical-price-full/stock_split/AAPL": { historical: [] },
    });

    await expect(registry.dispatch("get_stock_actions", { symbol: "AAPL" })).rejects.toThrow(
      "Malformed response from api/v3/historical-price-full/stock_dividend/AAPL: unexpected payload shape at historical"
    );
    expect(client.calls).toHaveLength(1);
  });

  it("search_companies passes query, limit and exchange", async () => {
    const { registry, client } = createTestRegistry(companyTools, { "api/v3/search": [] });

    await registry.dispatch("search_companies", { query: "  apple ", exchange: "NASDAQ" });

    expect(client.calls).toEqual([
      { endpoint: "api/v3/search", query: { query: "apple", limit: 10, exchange: "NASDAQ" } },
    ]);
  });
});

describe("get_financial_statement", () => {
  it.each([
    ["income", "api/v3/income-statement/MSFT"],
    ["balance", "api/v3/balance-sheet-statement/MSFT"],
    ["cashflow", "api/v3/cash-flow-statement/MSFT"],
  ])("maps %s to %s", async (statement, endpoint) => {
    const { registry, client } = createTestRegistry(fundamentalsTools, { [endpoint]: [] });

    await registry.dispatch("get_financial_statement", { symbol: "MSFT", statement, period: "quarter", limit: 4 });

    expect(client.calls).toEqual([{ endpoint, query: { period: "quarter", limit: 4 } }]);
  });

  it("defaults to annual periods", async () => {
    const { registry, client } = createTestRegistry(fundamentalsTools, { "api/v3/income-statement/MSFT": [] });

    await registry.dispatch("get_financial_statement", { symbol: "MSFT", statement: "income" });

    expect(client.calls[0]?.query).toEqual({ period: "annual" });
  });
});

describe("get_news_sentiment", () => {
  it("reshapes articles to title, summary, url and date", async () => {
    const { registry, client } = createTestRegistry(newsTools, {
      "api/v4/general_news": [
        {
          title: "Apple ships new chips",
          text: "The company announced...",
          url: "https://news.example.com/apple",
          publishedDate: "2024-03-14 10:00:00",
          site: "example",
        },
        { title: null },
      ],
    });

    const items = await registry.dispatch("get_news_sentiment", { symbol: "AAPL" });

    expect(items).toEqual([
      {
        title: "Apple ships new chips",
        summary: "The company announced...",
        url: "https://news.example.com/apple",
        publishedDate: "2024-03-14 10:00:00",
      },
      { title: "", summary: "", url: "", publishedDate: null },
    ]);
    expect(client.calls[0]?.query).toEqual({ tickers: "AAPL", page: 0, size: 50 });
  });
});
