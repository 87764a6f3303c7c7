import { z } from "zod";
import { defineTool } from "../registry/types.js";
import { IsoDateSchema, QueryParamsSchema, SymbolSchema } from "../schemas/tool-inputs.js";
import { segment } from "../upstream/client.js";
import { firstOrSelf, parsePayload } from "./payload.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export const PRICE_PERIODS = ["1d", "5d", "1mo", "3mo", "6mo", "1y", "2y", "5y", "10y", "ytd", "max"] as const;
export const PRICE_INTERVALS = ["1min", "5min", "15min", "30min", "1hour", "4hour", "1d"] as const;

export type PricePeriod = (typeof PRICE_PERIODS)[number];

const PERIOD_DAYS: Record<Exclude<PricePeriod, "ytd" | "max">, number> = {
  "1d": 1,
  "5d": 5,
  "1mo": 30,
  "3mo": 90,
  "6mo": 180,
  "1y": 365,
  "2y": 730,
  "5y": 1825,
  "10y": 3650,
};

const PriceRowSchema = z.object({
  date: z.string(),
  open: z.number().nullable(),
  high: z.number().nullable(),
  low: z.number().nullable(),
  close: z.number().nullable(),
  volume: z.number().nullable().default(null),
});

export type PriceRow = z.infer<typeof PriceRowSchema>;

const IntradayPayloadSchema = z.array(PriceRowSchema);
const DailyPayloadSchema = z.object({ historical: z.array(PriceRowSchema).default([]) });

/** Start of the window, or null for "max". */
export function periodStart(period: PricePeriod, now: Date): Date | null {
  if (period === "max") return null;
  if (period === "ytd") return new Date(Date.UTC(now.getUTCFullYear(), 0, 1));
  return new Date(now.getTime() - PERIOD_DAYS[period] * DAY_MS);
}

const EXCHANGE_TIME_ZONE = "America/New_York";

const exchangeOffsetFormat = new Intl.DateTimeFormat("en-US", {
  timeZone: EXCHANGE_TIME_ZONE,
  timeZoneName: "shortOffset",
});

/** Offset of exchange time from UTC at `instant`, in minutes ("GMT-4" gives -240). */
export function exchangeOffsetMinutes(instant: Date): number {
  const zone = exchangeOffsetFormat.formatToParts(instant).find((part) => part.type === "timeZoneName");
  const match = zone && /^GMT(?:([+-])(\d{1,2})(?::(\d{2}))?)?$/.exec(zone.value);
  if (!match || !match[1]) return 0;
  const minutes = Number(match[2]) * 60 + Number(match[3] ?? 0);
  return match[1] === "-" ? -minutes : minutes;
}

/**
 * Daily rows carry a date, read as UTC midnight. Intraday rows carry
 * "YYYY-MM-DD HH:mm:ss" in exchange time.
 */
export function rowTime(date: string): number {
  if (/^\d{4}-\d{2}-\d{2}$/.test(date)) return Date.parse(date);
  const wallClock = Date.parse(`${date.replace(" ", "T")}Z`);
  return wallClock - exchangeOffsetMinutes(new Date(wallClock)) * 60_000;
}

export const getHistoricalStockPrices = defineTool({
  name: "get_historical_stock_prices",
  description:
    "Historical OHLCV prices for a symbol. Intraday intervals (1min to 4hour) use the intraday chart; 1d uses daily bars. Rows are oldest first and limited to the requested period.",
  category: "MarketData",
  parameters: {
    symbol: SymbolSchema,
    period: z.enum(PRICE_PERIODS).default("1mo").describe("Lookback window"),
    interval: z.enum(PRICE_INTERVALS).default("1d").describe("Bar size"),
  },
  async handler({ symbol, period, interval }, { client, now, signal }) {
    let rows: PriceRow[];
    if (interval === "1d") {
      const response = await client.call(`api/v3/historical-price-full/${segment(symbol)}`, {}, { signal });
      rows = parsePayload(DailyPayloadSchema, response).historical;
    } else {
      const response = await client.call(
        `api/v3/historical-chart/${interval}/${segment(symbol)}`,
        {},
        { signal }
      );
      rows = parsePayload(IntradayPayloadSchema, response);
    }

    const start = periodStart(period, now());
    const inWindow = start === null ? rows : rows.filter((row) => rowTime(row.date) >= start.getTime());

    return inWindow
      .map(({ date, open, high, low, close, volume }) => ({ date, open, high, low, close, volume }))
      .sort((a, b) => rowTime(a.date) - rowTime(b.date));
  },
});

export const getStockQuote = defineTool({
  name: "get_stock_quote",
  description: "Real-time quote for a symbol: price, change, day range, volume, market cap.",
  category: "MarketData",
  parameters: { symbol: SymbolSchema },
  async handler({ symbol }, { client, signal }) {
    const response = await client.call(`api/v3/quote/${segment(symbol)}`, {}, { signal });
    return firstOrSelf(response.payload);
  },
});

function marketMovers(name: string, list: "gainers" | "losers" | "actives", description: string) {
  return defineTool({
    name,
    description,
    category: "MarketData",
    parameters: {},
    async handler(_args, { client, signal }) {
      const response = await client.call(`api/v3/stock_market/${list}`, {}, { signal });
      return response.payload;
    },
  });
}

export const getTopGainers = marketMovers("get_top_gainers", "gainers", "Stocks with the largest gains today.");
export const getTopLosers = marketMovers("get_top_losers", "losers", "Stocks with the largest losses today.");
export const getMostActive = marketMovers("get_most_active", "actives", "Most actively traded stocks today.");

export const bulkEod = defineTool({
  name: "bulk_eod",
  description: "End-of-day prices for every symbol on one trading date.",
  category: "MarketData",
  parameters: {
    date: IsoDateSchema.describe("Trading date, YYYY-MM-DD"),
    params: QueryParamsSchema,
  },
  async handler({ date, params }, { client, signal }) {
    const response = await client.call("stable/eod-bulk", { ...params, date }, { signal });
    return response.payload;
  },
});

export const marketDataTools = [
  getHistoricalStockPrices,
  getStockQuote,
  getTopGainers,
  getTopLosers,
  getMostActive,
  bulkEod,
];
