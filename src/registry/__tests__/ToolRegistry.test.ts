import { describe, it, expect, vi, beforeEach } from "vitest";
import { z } from "zod";
import {
  DuplicateToolError,
  InvalidArgumentError,
  ToolExecutionError,
  UnknownToolError,
  UpstreamError,
} from "../../errors.js";
import type { InvocationRecord } from "../../logging/invocationLog.js";
import { limitSchema, SymbolSchema } from "../../schemas/tool-inputs.js";
import { allTools } from "../../tools/index.js";
import { ToolRegistry } from "../ToolRegistry.js";
import { defineTool } from "../types.js";
import { StubClient } from "../../__tests__/support/stubClient.js";

const echoTool = defineTool({
  name: "echo_options",
  description: "Echoes validated arguments",
  category: "Options",
  parameters: {
    symbol: SymbolSchema,
    side: z.enum(["call", "put"]),
    period: z.enum(["annual", "quarter"]).default("annual"),
    limit: limitSchema(100).optional(),
  },
  async handler(args) {
    return args;
  },
});

async function failureOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (e) {
    return e;
  }
  throw new Error("expected the dispatch to fail");
}

describe("ToolRegistry", () => {
  let client: StubClient;
  let registry: ToolRegistry;

  beforeEach(() => {
    client = new StubClient();
    registry = new ToolRegistry({ client });
  });

  describe("register", () => {
    it("registers a tool", () => {
      registry.register(echoTool);
      expect(registry.has("echo_options")).toBe(true);
      expect(registry.size).toBe(1);
      expect(registry.list().map((t) => t.name)).toEqual(["echo_options"]);
    });

    it("rejects a duplicate name and keeps the first registration", async () => {
      registry.register(echoTool);
      const impostor = defineTool({
        name: "echo_options",
        description: "Impostor",
        category: "Options",
        parameters: {},
        async handler() {
          return "impostor";
        },
      });

      expect(() => registry.register(impostor)).toThrow(DuplicateToolError);
      expect(registry.size).toBe(1);
      await expect(registry.dispatch("echo_options", { symbol: "AAPL", side: "call" })).resolves.toEqual({
        symbol: "AAPL",
        side: "call",
        period: "annual",
      });
    });

    it("registers the full catalog without collisions", () => {
      registry.registerAll(allTools);
      expect(registry.size).toBe(25);
    });
  });

  describe("dispatch", () => {
    beforeEach(() => {
      registry.register(echoTool);
    });

    it("fails with UnknownToolError without touching the network", async () => {
      const error = await failureOf(registry.dispatch("get_everything", {}));

      expect(error).toBeInstanceOf(UnknownToolError);
      expect(error).toMatchObject({ message: 'Unknown tool: "get_everything"' });
      expect(client.calls).toEqual([]);
    });

    it("names the missing required parameter", async () => {
      const error = await failureOf(registry.dispatch("echo_options", { side: "put" }));

      expect(error).toBeInstanceOf(InvalidArgumentError);
      expect(error).toMatchObject({ parameter: "symbol", constraint: "is required" });
    });

    it("reports the first violation in declared order", async () => {
      const error = await failureOf(registry.dispatch("echo_options", { limit: 0, side: "both" }));

      expect(error).toMatchObject({ parameter: "symbol", constraint: "is required" });
    });

    it("lists the allowed values of an enumerated parameter", async () => {
      const error = await failureOf(registry.dispatch("echo_options", { symbol: "AAPL", side: "both" }));

      expect(error).toMatchObject({
        parameter: "side",
        constraint: "must be one of: call, put",
        message: 'Invalid argument "side" for tool "echo_options": must be one of: call, put',
      });
    });

    it("rejects non-object arguments", async () => {
      const error = await failureOf(registry.dispatch("echo_options", ["AAPL"]));

      expect(error).toMatchObject({ parameter: "arguments", constraint: "must be an object" });
    });

    it("fills defaults, coerces numbers and drops unknown keys", async () => {
      const result = await registry.dispatch("echo_options", {
        symbol: " msft ",
        side: "put",
        limit: "25",
        verbose: true,
      });

      expect(result).toEqual({ symbol: "MSFT", side: "put", period: "annual", limit: 25 });
    });

    it("wraps upstream failures in ToolExecutionError", async () => {
      registry.register(
        defineTool({
          name: "always_404",
          description: "Calls an unrouted endpoint",
          category: "Company",
          parameters: {},
          async handler(_args, { client }) {
            return client.call("api/v3/profile/NOPE");
          },
        })
      );

      const error = await failureOf(registry.dispatch("always_404", {}));

      expect(error).toBeInstanceOf(ToolExecutionError);
      expect(error).toMatchObject({ code: "TOOL_EXECUTION_ERROR" });
      const cause = error instanceof ToolExecutionError ? error.cause : undefined;
      expect(cause).toBeInstanceOf(UpstreamError);
      expect(cause).toMatchObject({ status: 404 });
    });

    it("wraps unexpected handler errors too", async () => {
      registry.register(
        defineTool({
          name: "broken",
          description: "Throws",
          category: "Reference",
          parameters: {},
          async handler() {
            throw new RangeError("boom");
          },
        })
      );

      await expect(registry.dispatch("broken", {})).rejects.toThrow('Tool "broken" failed: boom');
    });

    it("lets argument errors raised by a handler pass through", async () => {
      const rejection = new InvalidArgumentError("picky", "params", "must name a symbol");
      registry.register(
        defineTool({
          name: "picky",
          description: "Rejects its params",
          category: "Reference",
          parameters: {},
          async handler() {
            throw rejection;
          },
        })
      );

      await expect(registry.dispatch("picky", {})).rejects.toBe(rejection);
    });

    it("passes the cancellation signal to the handler", async () => {
      const seen: Array<AbortSignal | undefined> = [];
      registry.register(
        defineTool({
          name: "signal_recorder",
          description: "Records the signal",
          category: "Reference",
          parameters: {},
          async handler(_args, { signal }) {
            seen.push(signal);
            return null;
          },
        })
      );
      const controller = new AbortController();

      await registry.dispatch("signal_recorder", {}, { signal: controller.signal });

      expect(seen).toEqual([controller.signal]);
    });
  });

  describe("invocation log", () => {
    it("records successes and failures", async () => {
      const records: InvocationRecord[] = [];
      const logInvocation = vi.fn(async (record: InvocationRecord) => {
        records.push(record);
      });
      registry = new ToolRegistry({ client, logInvocation });
      registry.register(echoTool);

      await registry.dispatch("echo_options", { symbol: "AAPL", side: "call" });
      await failureOf(registry.dispatch("echo_options", { symbol: "AAPL" }));
      await failureOf(registry.dispatch("missing_tool", { symbol: "AAPL" }));

      expect(logInvocation).toHaveBeenCalledTimes(3);
      expect(records.map(({ toolName, category, outcome, errorCode }) => ({ toolName, category, outcome, errorCode })))
        .toEqual([
          { toolName: "echo_options", category: "Options", outcome: "succeeded", errorCode: undefined },
          { toolName: "echo_options", category: "Options", outcome: "failed", errorCode: "INVALID_ARGUMENT" },
          { toolName: "missing_tool", category: undefined, outcome: "failed", errorCode: "UNKNOWN_TOOL" },
        ]);
      expect(records[0]).toMatchObject({
        eventType: "tool_invocation",
        args: { symbol: "AAPL", side: "call" },
      });
    });

    it("does not fail a dispatch when the logger throws", async () => {
      const stderr = vi.spyOn(console, "error").mockImplementation(() => undefined);
      registry = new ToolRegistry({
        client,
        logInvocation: async () => {
          throw new Error("disk full");
        },
      });
      registry.register(echoTool);

      await expect(registry.dispatch("echo_options", { symbol: "AAPL", side: "call" })).resolves.toMatchObject({
        symbol: "AAPL",
      });
      expect(stderr).toHaveBeenCalledTimes(1);
      stderr.mockRestore();
    });
  });
});
