/**
 * Error classes.
 *
 * Invocation-time failures (permission, unknown tool, arguments, executor,
 * timeout) never escape the gateway: they are converted to a CallError and
 * stored on the call record. Registration, ledger, config and backend
 * errors are thrown.
 */

export type ErrorCode =
  | "PERMISSION_DENIED"
  | "UNKNOWN_TOOL"
  | "INVALID_ARGUMENTS"
  | "EXECUTOR_ERROR"
  | "TIMEOUT"
  | "DUPLICATE_TOOL"
  | "LEDGER_ERROR"
  | "CONFIG_ERROR"
  | "BACKEND_ERROR";

export class ToolgateError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ToolgateError";
  }
}

export class PermissionDeniedError extends ToolgateError {
  constructor(
    public readonly toolName: string,
    public readonly callerId: string,
  ) {
    super(
      "PERMISSION_DENIED",
      `Tool '${toolName}' is not available to agent '${callerId}'`,
    );
    this.name = "PermissionDeniedError";
  }
}

export class UnknownToolError extends ToolgateError {
  constructor(public readonly toolName: string) {
    super("UNKNOWN_TOOL", `Tool '${toolName}' is not registered`);
    this.name = "UnknownToolError";
  }
}

export interface ArgumentIssue {
  path: string;
  message: string;
}

export class InvalidArgumentsError extends ToolgateError {
  constructor(
    public readonly toolName: string,
    public readonly issues: ArgumentIssue[],
  ) {
    super(
      "INVALID_ARGUMENTS",
      `Invalid arguments for '${toolName}': ${issues
        .map((i) => (i.path ? `${i.path}: ${i.message}` : i.message))
        .join("; ")}`,
    );
    this.name = "InvalidArgumentsError";
  }
}

export class ExecutorError extends ToolgateError {
  constructor(
    public readonly toolName: string,
    cause: unknown,
  ) {
    super("EXECUTOR_ERROR", `Tool '${toolName}' failed: ${errorMessage(cause)}`, {
      cause,
    });
    this.name = "ExecutorError";
  }
}

export class ToolTimeoutError extends ToolgateError {
  constructor(
    public readonly toolName: string,
    public readonly timeoutMs: number,
  ) {
    super("TIMEOUT", `Tool '${toolName}' timed out after ${timeoutMs}ms`);
    this.name = "ToolTimeoutError";
  }
}

export class DuplicateToolError extends ToolgateError {
  constructor(public readonly toolName: string) {
    super("DUPLICATE_TOOL", `Tool '${toolName}' is already registered`);
    this.name = "DuplicateToolError";
  }
}

export class LedgerError extends ToolgateError {
  constructor(message: string) {
    super("LEDGER_ERROR", message);
    this.name = "LedgerError";
  }
}

export class ConfigError extends ToolgateError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super("CONFIG_ERROR", issues.length ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
  }
}

export class BackendError extends ToolgateError {
  constructor(
    public readonly status: number,
    public readonly body: string,
    public readonly endpoint: string,
    message = `HTTP ${status} from ${endpoint}: ${body}`,
  ) {
    super("BACKEND_ERROR", message);
    this.name = "BackendError";
  }
}

/** Raised without a request while the backend circuit is open. */
export class CircuitOpenError extends BackendError {
  constructor(
    endpoint: string,
    public readonly retryInMs: number,
  ) {
    super(503, "", endpoint, `Backend unavailable (circuit open), not calling ${endpoint}; retry in ${retryInMs}ms`);
    this.name = "CircuitOpenError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
