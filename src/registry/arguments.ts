import { z, type ZodRawShape } from "zod";
import { InvalidArgumentError } from "../errors.js";
import type { ToolArgs } from "./types.js";

function describeIssue(issue: z.ZodIssue): string {
  if (issue.code === z.ZodIssueCode.invalid_type && issue.received === "undefined") {
    return "is required";
  }
  if (issue.code === z.ZodIssueCode.invalid_enum_value) {
    return `must be one of: ${issue.options.join(", ")}`;
  }
  return issue.message;
}

/**
 * Validate raw arguments against a tool's parameter shape.
 *
 * Reports only the first violation in declared parameter order, so the same
 * bad call always yields the same message.
 */
export function validateArguments<S extends ZodRawShape>(
  toolName: string,
  shape: S,
  args: unknown
): ToolArgs<S> {
  const result = z.object(shape).safeParse(args ?? {});
  if (result.success) return result.data;

  const order = Object.keys(shape);
  const rank = (issue: z.ZodIssue): number => {
    const index = order.indexOf(String(issue.path[0]));
    return index === -1 ? Number.MAX_SAFE_INTEGER : index;
  };
  const [first] = [...result.error.issues].sort((a, b) => rank(a) - rank(b));

  if (!first || first.path.length === 0) {
    throw new InvalidArgumentError(toolName, "arguments", "must be an object");
  }
  throw new InvalidArgumentError(toolName, first.path.map(String).join("."), describeIssue(first));
}
