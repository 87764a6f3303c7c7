import { z } from "zod";
import { defineTool } from "../registry/types.js";
import { IsoDateSchema, SymbolSchema } from "../schemas/tool-inputs.js";
import { segment } from "../upstream/client.js";
import { parsePayload } from "./payload.js";

export const OPTION_SIDES = ["call", "put"] as const;
export type OptionSide = (typeof OPTION_SIDES)[number];

const ExpirationsPayloadSchema = z.union([
  z.array(z.string()),
  z.object({ expirations: z.array(z.string()).default([]) }),
]);

const OptionChainPayloadSchema = z.array(
  z
    .object({
      expirationDate: z.string().optional(),
      optionType: z.string().optional(),
    })
    .passthrough()
);

/** FMP tags contracts "call"/"put", older feeds "calls"/"puts", in any case. */
export function optionSideOf(optionType: string | undefined): OptionSide | null {
  const normalized = optionType?.trim().toLowerCase().replace(/s$/, "");
  return OPTION_SIDES.find((side) => side === normalized) ?? null;
}

export const getOptionExpirationDates = defineTool({
  name: "get_option_expiration_dates",
  description: "Available option expiration dates for a symbol, earliest first.",
  category: "Options",
  parameters: { symbol: SymbolSchema },
  async handler({ symbol }, { client, signal }) {
    const response = await client.call(
      `api/v3/options/available-expirations/${segment(symbol)}`,
      {},
      { signal }
    );
    const payload = parsePayload(ExpirationsPayloadSchema, response);
    const expirations = Array.isArray(payload) ? payload : payload.expirations;
    return [...expirations].sort();
  },
});

export const getOptionChain = defineTool({
  name: "get_option_chain",
  description: "Option chain for one expiration date, calls or puts only.",
  category: "Options",
  parameters: {
    symbol: SymbolSchema,
    expiration_date: IsoDateSchema.describe("Expiration date, YYYY-MM-DD"),
    side: z.enum(OPTION_SIDES).describe("Contract side"),
  },
  async handler({ symbol, expiration_date, side }, { client, signal }) {
    const response = await client.call(
      `api/v3/options/chain/${segment(symbol)}`,
      { expiration: expiration_date },
      { signal }
    );
    return parsePayload(OptionChainPayloadSchema, response).filter(
      (contract) =>
        (contract.expirationDate === undefined || contract.expirationDate === expiration_date) &&
        optionSideOf(contract.optionType) === side
    );
  },
});

export const optionsTools = [getOptionExpirationDates, getOptionChain];
