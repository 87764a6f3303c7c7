/**
 * Invocation log: one JSON line per tool dispatch.
 *
 * Records tool name, category, outcome and error code so usage and upstream
 * failures can be analysed offline. Writes never fail a dispatch.
 */

import { promises as fs } from "node:fs";
import path from "node:path";
import type { ToolCategory } from "../registry/types.js";

export interface InvocationRecord {
  eventType: "tool_invocation";
  timestamp: string;
  invocationId: string;
  toolName: string;
  /** Absent when the tool name is unknown */
  category?: ToolCategory;
  args: Record<string, unknown>;
  outcome: "succeeded" | "failed";
  errorCode?: string;
  errorMessage?: string;
  durationMs: number;
}

export type InvocationLogger = (record: InvocationRecord) => Promise<void>;

async function appendJsonLine(filePath: string, record: InvocationRecord): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.appendFile(filePath, `${JSON.stringify(record)}\n`, "utf8");
}

export function createJsonlInvocationLogger(filePath: string): InvocationLogger {
  return async (record) => {
    try {
      await appendJsonLine(filePath, record);
    } catch (err) {
      // stderr only: stdout belongs to JSON-RPC
      console.error("[invocationLog] Failed to write log:", err);
    }
  };
}
