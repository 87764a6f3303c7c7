import path from "node:path";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";

export const DEFAULT_BASE_URL = "https://financialmodelingprep.com/";
export const DEFAULT_TIMEOUT_MS = 10_000;

/** Process-wide settings. Built once at startup and passed down explicitly. */
export interface ServerConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  /** JSONL invocation log path; null when disabled */
  invocationLogPath: string | null;
}

const EnvSchema = z.object({
  FMP_API_KEY: z
    .string({ required_error: "FMP_API_KEY is required" })
    .trim()
    .min(1, "FMP_API_KEY must not be empty"),
  FMP_BASE_URL: z.string().url("FMP_BASE_URL must be an absolute URL").default(DEFAULT_BASE_URL),
  FMP_TIMEOUT_MS: z.coerce
    .number()
    .int("FMP_TIMEOUT_MS must be an integer")
    .positive("FMP_TIMEOUT_MS must be positive")
    .default(DEFAULT_TIMEOUT_MS),
  FMP_MCP_INVOCATION_LOG: z.string().optional(),
});

/** Relative URL resolution drops the last path segment unless the base ends in "/". */
function withTrailingSlash(url: string): string {
  return url.endsWith("/") ? url : `${url}/`;
}

/**
 * Read and validate configuration from an environment map.
 * Throws ConfigurationError listing every offending variable.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => issue.message);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }

  const { FMP_API_KEY, FMP_BASE_URL, FMP_TIMEOUT_MS, FMP_MCP_INVOCATION_LOG } = parsed.data;
  const logSetting = FMP_MCP_INVOCATION_LOG?.trim();

  return {
    apiKey: FMP_API_KEY,
    baseUrl: withTrailingSlash(FMP_BASE_URL),
    timeoutMs: FMP_TIMEOUT_MS,
    invocationLogPath:
      logSetting === "off"
        ? null
        : logSetting
          ? path.resolve(cwd, logSetting)
          : path.join(cwd, "logs", "invocations.jsonl"),
  };
}
