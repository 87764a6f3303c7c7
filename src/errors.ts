/**
 * Error taxonomy for the FMP MCP server.
 *
 * Every throw site uses one of these. `code` is stable and is what callers see
 * in the structured failure result; `details` carries the context needed to
 * act on it (parameter name, HTTP status, endpoint).
 */

export class ServiceError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.code = code;
    this.details = details;
    this.name = new.target.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

// ---------------------------------------------------------------------------
// Startup
// ---------------------------------------------------------------------------

/** Required environment is missing or malformed. Fatal at startup. */
export class ConfigurationError extends ServiceError {
  constructor(message: string, issues: string[]) {
    super(message, "CONFIGURATION_ERROR", { issues });
  }
}

/** A second tool tried to claim an already registered name. */
export class DuplicateToolError extends ServiceError {
  constructor(toolName: string) {
    super(`Tool already registered: "${toolName}"`, "DUPLICATE_TOOL", { toolName });
  }
}

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

export class UnknownToolError extends ServiceError {
  constructor(toolName: string) {
    super(`Unknown tool: "${toolName}"`, "UNKNOWN_TOOL", { toolName });
  }
}

export class InvalidArgumentError extends ServiceError {
  readonly parameter: string;
  readonly constraint: string;

  constructor(toolName: string, parameter: string, constraint: string) {
    super(
      `Invalid argument "${parameter}" for tool "${toolName}": ${constraint}`,
      "INVALID_ARGUMENT",
      { toolName, parameter, constraint }
    );
    this.parameter = parameter;
    this.constraint = constraint;
  }
}

// ---------------------------------------------------------------------------
// Upstream (raised by the FMP client)
// ---------------------------------------------------------------------------

/** The request never produced an HTTP response: DNS, refused, reset, timeout, abort. */
export class TransportError extends ServiceError {
  readonly timedOut: boolean;

  constructor(endpoint: string, reason: string, timedOut: boolean, cause?: unknown) {
    super(
      timedOut
        ? `Request to ${endpoint} timed out: ${reason}`
        : `Request to ${endpoint} failed: ${reason}`,
      "TRANSPORT_ERROR",
      { endpoint, timedOut },
      { cause }
    );
    this.timedOut = timedOut;
  }
}

/** FMP answered with a non-success status (or an error payload). */
export class UpstreamError extends ServiceError {
  readonly status: number;
  readonly body: string;

  constructor(endpoint: string, status: number, body: string) {
    super(`Upstream ${endpoint} responded with status ${status}`, "UPSTREAM_ERROR", {
      endpoint,
      status,
      body,
    });
    this.status = status;
    this.body = body;
  }
}

/** The body was not JSON, or not the JSON shape a reshaping tool relies on. */
export class MalformedResponseError extends ServiceError {
  constructor(endpoint: string, reason: string, excerpt?: string) {
    super(`Malformed response from ${endpoint}: ${reason}`, "MALFORMED_RESPONSE", {
      endpoint,
      excerpt,
    });
  }
}

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

/** Wraps whatever a handler raised. The original error is kept as `cause`. */
export class ToolExecutionError extends ServiceError {
  constructor(toolName: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Tool "${toolName}" failed: ${reason}`,
      "TOOL_EXECUTION_ERROR",
      { toolName },
      { cause }
    );
  }

  override toJSON(): Record<string, unknown> {
    const cause = this.cause;
    return {
      ...super.toJSON(),
      cause:
        cause instanceof ServiceError
          ? cause.toJSON()
          : cause instanceof Error
            ? { name: cause.name, message: cause.message }
            : cause,
    };
  }
}
