import { defineLookupTool } from "./lookup.js";

export const searchFinancialData = defineLookupTool({
  name: "search_financial_data",
  description:
    "Search securities by symbol, company name, CIK, CUSIP, ISIN, or list a symbol's listings across exchanges. Put the search term in params, e.g. {\"query\": \"apple\"}.",
  category: "Reference",
  selector: "search_type",
  kinds: ["symbol", "name", "cik", "cusip", "isin", "exchange_variants"],
  prefix: "search-",
});

export const listDirectoryData = defineLookupTool({
  name: "list_directory_data",
  description:
    "Reference directories: stock, ETF and CIK lists, symbol changes, actively traded and transcript lists, available exchanges, sectors, industries and countries.",
  category: "Reference",
  selector: "list_type",
  kinds: [
    "stock_list",
    "financial_statement_symbol_list",
    "cik_list",
    "symbol_change",
    "etf_list",
    "actively_trading_list",
    "earnings_transcript_list",
    "available_exchanges",
    "available_sectors",
    "available_industries",
    "available_countries",
  ],
});

export const referenceTools = [searchFinancialData, listDirectoryData];
