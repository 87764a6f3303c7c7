import type { z } from "zod";
import { MalformedResponseError } from "../errors.js";
import type { UpstreamResponse } from "../upstream/client.js";

/**
 * Parse an upstream payload that a tool reshapes. A shape the tool cannot
 * work with is reported as a malformed response, not a crash.
 */
export function parsePayload<T extends z.ZodTypeAny>(schema: T, response: UpstreamResponse): z.output<T> {
  const parsed = schema.safeParse(response.payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new MalformedResponseError(
      response.endpoint,
      `unexpected payload shape${where}: ${issue?.message ?? "invalid"}`
    );
  }
  return parsed.data;
}

/** Single-entity endpoints answer with a one-element list. */
export function firstOrSelf(payload: unknown): unknown {
  return Array.isArray(payload) && payload.length > 0 ? payload[0] : payload;
}
