import { defineLookupTool } from "./lookup.js";

export const cryptoMarketData = defineLookupTool({
  name: "crypto_market_data",
  description:
    "Cryptocurrency market data: symbol list, quotes, batch quotes, end-of-day history and intraday charts. Pass the pair via params, e.g. {\"symbol\": \"BTCUSD\"}.",
  category: "Crypto",
  selector: "data_type",
  kinds: [
    "list",
    "quote",
    "quote_short",
    "batch_quotes",
    "historical_eod_light",
    "historical_eod_full",
    "intraday_1min",
    "intraday_5min",
    "intraday_1hour",
  ],
  paths: {
    list: "cryptocurrency-list",
    batch_quotes: "batch-crypto-quotes",
    historical_eod_light: "historical-price-eod/light",
    historical_eod_full: "historical-price-eod/full",
    intraday_1min: "historical-chart/1min",
    intraday_5min: "historical-chart/5min",
    intraday_1hour: "historical-chart/1hour",
  },
});

export const cryptoTools = [cryptoMarketData];
