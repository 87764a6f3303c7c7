/**
 * Table-driven tools: one enumerated "kind" parameter selects a stable/
 * endpoint, `params` carries the rest of the query unchanged.
 */

import { z, type ZodRawShape } from "zod";
import { InvalidArgumentError } from "../errors.js";
import { defineTool, type ToolCategory, type ToolDescriptor } from "../registry/types.js";
import { QueryParamsSchema } from "../schemas/tool-inputs.js";

export interface LookupTable<K extends string> {
  name: string;
  description: string;
  category: ToolCategory;
  /** Parameter that selects the endpoint, e.g. "data_type" */
  selector: string;
  kinds: readonly [K, ...K[]];
  /** Prepended to the derived path, e.g. "search-" */
  prefix?: string;
  /** Explicit paths for kinds that do not follow the naming rule */
  paths?: Partial<Record<K, string>>;
}

/** Default rule: underscores become hyphens, under the optional prefix. */
export function lookupPath<K extends string>(table: LookupTable<K>, kind: K): string {
  return `stable/${table.paths?.[kind] ?? `${table.prefix ?? ""}${kind.replace(/_/g, "-")}`}`;
}

export function defineLookupTool<K extends string>(table: LookupTable<K>): ToolDescriptor {
  const parameters: ZodRawShape = {
    [table.selector]: z.enum(table.kinds).describe(`One of: ${table.kinds.join(", ")}`),
    params: QueryParamsSchema,
  };

  return defineTool({
    name: table.name,
    description: table.description,
    category: table.category,
    parameters,
    async handler(args, { client, signal }) {
      const kind = table.kinds.find((k) => k === args[table.selector]);
      if (kind === undefined) {
        throw new InvalidArgumentError(table.name, table.selector, `must be one of: ${table.kinds.join(", ")}`);
      }
      const params = QueryParamsSchema.parse(args.params);
      const response = await client.call(lookupPath(table, kind), params, { signal });
      return response.payload;
    },
  });
}
