/**
 * Tool registry and dispatcher.
 *
 * Holds every tool descriptor by name and runs invocations:
 *   1. resolve the name (UnknownToolError)
 *   2. validate arguments in declared order (InvalidArgumentError)
 *   3. run the handler
 *   4. wrap handler failures in ToolExecutionError
 *
 * No retries, no shared mutable state between dispatches.
 */

import {
  DuplicateToolError,
  InvalidArgumentError,
  ServiceError,
  ToolExecutionError,
  UnknownToolError,
} from "../errors.js";
import type { InvocationLogger } from "../logging/invocationLog.js";
import type { UpstreamClient } from "../upstream/client.js";
import { validateArguments } from "./arguments.js";
import type { ToolDescriptor, ToolSummary } from "./types.js";

export interface ToolRegistryOptions {
  client: UpstreamClient;
  now?: () => Date;
  logInvocation?: InvocationLogger;
}

export interface DispatchOptions {
  signal?: AbortSignal;
}

function asRecord(args: unknown): Record<string, unknown> {
  return typeof args === "object" && args !== null && !Array.isArray(args) ? { ...args } : {};
}

function wrapHandlerError(toolName: string, error: unknown): ServiceError {
  if (error instanceof InvalidArgumentError || error instanceof ToolExecutionError) return error;
  return new ToolExecutionError(toolName, error);
}

export class ToolRegistry {
  private readonly tools = new Map<string, ToolDescriptor>();
  private readonly now: () => Date;

  constructor(private readonly options: ToolRegistryOptions) {
    this.now = options.now ?? (() => new Date());
  }

  // -----------------------------------------------------------------------
  // Registration
  // -----------------------------------------------------------------------

  register(descriptor: ToolDescriptor): void {
    if (this.tools.has(descriptor.name)) {
      throw new DuplicateToolError(descriptor.name);
    }
    this.tools.set(descriptor.name, descriptor);
  }

  registerAll(descriptors: readonly ToolDescriptor[]): void {
    for (const descriptor of descriptors) this.register(descriptor);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get size(): number {
    return this.tools.size;
  }

  /** Registration order. */
  list(): ToolSummary[] {
    return Array.from(this.tools.values(), ({ name, description, category, parameters }) => ({
      name,
      description,
      category,
      parameters,
    }));
  }

  // -----------------------------------------------------------------------
  // Dispatch
  // -----------------------------------------------------------------------

  async dispatch(name: string, args: unknown, options: DispatchOptions = {}): Promise<unknown> {
    const started = Date.now();
    const tool = this.tools.get(name);

    try {
      if (!tool) throw new UnknownToolError(name);

      const validated = validateArguments(name, tool.parameters, args);

      let result: unknown;
      try {
        result = await tool.handler(validated, {
          client: this.options.client,
          now: this.now,
          signal: options.signal,
        });
      } catch (e) {
        throw wrapHandlerError(name, e);
      }

      await this.record(name, tool, args, started);
      return result;
    } catch (e) {
      await this.record(name, tool, args, started, e);
      throw e;
    }
  }

  private async record(
    name: string,
    tool: ToolDescriptor | undefined,
    args: unknown,
    started: number,
    error?: unknown
  ): Promise<void> {
    const log = this.options.logInvocation;
    if (!log) return;

    const failed = error !== undefined;
    try {
      await log({
        eventType: "tool_invocation",
        timestamp: new Date().toISOString(),
        invocationId: `${name}-${started}`,
        toolName: name,
        category: tool?.category,
        args: asRecord(args),
        outcome: failed ? "failed" : "succeeded",
        errorCode: !failed ? undefined : error instanceof ServiceError ? error.code : "INTERNAL_ERROR",
        errorMessage: !failed ? undefined : error instanceof Error ? error.message : String(error),
        durationMs: Date.now() - started,
      });
    } catch (logError) {
      console.error("[registry] Invocation logger failed:", logError);
    }
  }
}
