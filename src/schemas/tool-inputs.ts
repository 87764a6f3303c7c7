import { z } from "zod";

/**
 * Shared parameter schemas for the FMP tools.
 * Centralize formats and bounds so every tool validates the same way.
 */
export const InputConstraints = {
  maxSymbolLength: 24,
  /** Equities, share classes (BRK.B), indices (^GSPC), FX/futures (EURUSD=X) */
  symbolPattern: /^[A-Z0-9.^=-]+$/i,
  isoDatePattern: /^\d{4}-\d{2}-\d{2}$/,
} as const;

/** Ticker symbol, trimmed and upper-cased */
export const SymbolSchema = z
  .string()
  .trim()
  .min(1)
  .max(InputConstraints.maxSymbolLength)
  .regex(InputConstraints.symbolPattern, "Invalid symbol format")
  .transform((symbol) => symbol.toUpperCase())
  .describe('Ticker symbol, e.g. "AAPL"');

/** Calendar date as YYYY-MM-DD */
export const IsoDateSchema = z
  .string()
  .trim()
  .regex(InputConstraints.isoDatePattern, "Expected a date formatted YYYY-MM-DD");

/** Positive integer with an upper bound; numeric strings are coerced */
export function limitSchema(max: number): z.ZodNumber {
  return z.coerce.number().int().min(1).max(max);
}

export const QueryValueSchema = z.union([z.string(), z.number(), z.boolean()]);

/** Extra upstream query parameters for the generic lookup tools */
export const QueryParamsSchema = z
  .record(QueryValueSchema)
  .default({})
  .describe('Additional query parameters passed to the endpoint, e.g. {"symbol": "AAPL", "limit": 5}');
