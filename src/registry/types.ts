import type { z, ZodRawShape } from "zod";
import type { UpstreamClient } from "../upstream/client.js";

/** Recorded with every invocation so logs can be filtered by data family. */
export type ToolCategory =
  | "MarketData"
  | "Company"
  | "Fundamentals"
  | "News"
  | "Options"
  | "Analyst"
  | "Calendar"
  | "Crypto"
  | "Reference";

/** What a handler gets besides its arguments. */
export interface ToolContext {
  client: UpstreamClient;
  now: () => Date;
  signal?: AbortSignal;
}

/** Validated arguments: defaults filled, numeric strings coerced, unknown keys dropped. */
export type ToolArgs<S extends ZodRawShape> = z.objectOutputType<S, z.ZodTypeAny, "strip">;

/**
 * A registered tool. `parameters` is an ordered shape: key order is the
 * declared parameter order and decides which violation is reported first.
 */
export interface ToolDescriptor<S extends ZodRawShape = ZodRawShape> {
  name: string;
  description: string;
  category: ToolCategory;
  parameters: S;
  handler(args: ToolArgs<S>, context: ToolContext): Promise<unknown>;
}

export interface ToolSummary {
  name: string;
  description: string;
  category: ToolCategory;
  parameters: ZodRawShape;
}

/** Identity helper so handlers get their argument type from the shape. */
export function defineTool<S extends ZodRawShape>(descriptor: ToolDescriptor<S>): ToolDescriptor<S> {
  return descriptor;
}
