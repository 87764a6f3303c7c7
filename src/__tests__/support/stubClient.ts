import { UpstreamError } from "../../errors.js";
import { ToolRegistry } from "../../registry/ToolRegistry.js";
import type { ToolDescriptor } from "../../registry/types.js";
import type { CallOptions, QueryParams, UpstreamClient, UpstreamResponse } from "../../upstream/client.js";

export interface RecordedCall {
  endpoint: string;
  query: QueryParams;
}

/**
 * In-process stand-in for the FMP client. Routes map an endpoint path to the
 * payload it answers with, or to an error it throws. Unrouted paths answer 404.
 */
export class StubClient implements UpstreamClient {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly routes: Record<string, unknown> = {}) {}

  async call(endpoint: string, query: QueryParams = {}, _options?: CallOptions): Promise<UpstreamResponse> {
    this.calls.push({ endpoint, query });
    if (!(endpoint in this.routes)) {
      throw new UpstreamError(endpoint, 404, "Not Found");
    }
    const route = this.routes[endpoint];
    if (route instanceof Error) throw route;
    return { endpoint, status: 200, payload: route };
  }
}

export const FIXED_NOW = new Date("2024-03-15T00:00:00Z");

export function createTestRegistry(
  tools: readonly ToolDescriptor[],
  routes: Record<string, unknown> = {}
): { registry: ToolRegistry; client: StubClient } {
  const client = new StubClient(routes);
  const registry = new ToolRegistry({ client, now: () => FIXED_NOW });
  registry.registerAll(tools);
  return { registry, client };
}
