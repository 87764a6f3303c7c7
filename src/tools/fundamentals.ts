import { z } from "zod";
import { defineTool } from "../registry/types.js";
import { limitSchema, SymbolSchema } from "../schemas/tool-inputs.js";
import { segment } from "../upstream/client.js";
import { defineLookupTool } from "./lookup.js";

export const STATEMENT_KINDS = ["income", "balance", "cashflow"] as const;
export const STATEMENT_PERIODS = ["annual", "quarter"] as const;

export type StatementKind = (typeof STATEMENT_KINDS)[number];

const STATEMENT_ENDPOINTS: Record<StatementKind, string> = {
  income: "income-statement",
  balance: "balance-sheet-statement",
  cashflow: "cash-flow-statement",
};

export const getFinancialStatement = defineTool({
  name: "get_financial_statement",
  description: "Income statement, balance sheet or cash flow statement, annual or quarterly, newest first.",
  category: "Fundamentals",
  parameters: {
    symbol: SymbolSchema,
    statement: z.enum(STATEMENT_KINDS).describe("Statement kind"),
    period: z.enum(STATEMENT_PERIODS).default("annual").describe("Reporting period"),
    limit: limitSchema(120).optional().describe("Max number of periods"),
  },
  async handler({ symbol, statement, period, limit }, { client, signal }) {
    const response = await client.call(
      `api/v3/${STATEMENT_ENDPOINTS[statement]}/${segment(symbol)}`,
      { period, limit },
      { signal }
    );
    return response.payload;
  },
});

export const dcfValuation = defineLookupTool({
  name: "dcf_valuation",
  description: "Discounted cash flow valuations: standard, levered, or custom with caller-supplied assumptions.",
  category: "Fundamentals",
  selector: "dcf_type",
  kinds: ["discounted_cash_flow", "levered_discounted_cash_flow", "custom_discounted_cash_flow"],
});

export const fundamentalsTools = [getFinancialStatement, dcfValuation];
