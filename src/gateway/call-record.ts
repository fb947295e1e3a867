/**
 * Call Record - one invocation attempt, immutable once appended.
 */

import {
  ExecutorError,
  InvalidArgumentsError,
  PermissionDeniedError,
  ToolTimeoutError,
  UnknownToolError,
  errorMessage,
} from "../errors.js";
import type { ToolArguments } from "../tools/interface.js";

export type CallErrorKind =
  | "permission_denied"
  | "unknown_tool"
  | "invalid_arguments"
  | "executor_error"
  | "timeout";

export interface CallError {
  kind: CallErrorKind;
  message: string;
  /** Message of the underlying failure, for executor errors. */
  cause?: string;
}

interface CallRecordBase {
  callId: string;
  callerId: string;
  contextId: string;
  toolName: string;
  arguments: ToolArguments;
  startTime: string;
  endTime: string;
  durationMs: number;
}

export interface SuccessCallRecord extends CallRecordBase {
  status: "success";
  result: unknown;
}

export interface FailedCallRecord extends CallRecordBase {
  status: "error";
  error: CallError;
}

export type CallRecord = SuccessCallRecord | FailedCallRecord;

/** Outward transcript shape, as stored on chat messages. */
export interface ToolCallEntry {
  tool_name: string;
  arguments: ToolArguments;
  result: unknown;
  error: CallError | null;
  start_time: string;
  end_time: string;
}

export function toCallError(err: unknown): CallError {
  if (err instanceof PermissionDeniedError) {
    return { kind: "permission_denied", message: err.message };
  }
  if (err instanceof UnknownToolError) {
    return { kind: "unknown_tool", message: err.message };
  }
  if (err instanceof InvalidArgumentsError) {
    return { kind: "invalid_arguments", message: err.message };
  }
  if (err instanceof ToolTimeoutError) {
    return { kind: "timeout", message: err.message };
  }
  if (err instanceof ExecutorError) {
    return { kind: "executor_error", message: err.message, cause: errorMessage(err.cause) };
  }
  return { kind: "executor_error", message: errorMessage(err), cause: errorMessage(err) };
}

export function isRefusal(record: CallRecord): boolean {
  return (
    record.status === "error" &&
    (record.error.kind === "permission_denied" || record.error.kind === "unknown_tool")
  );
}

/** Wording for the end user (or for the agent to relay). */
export function describeOutcome(record: CallRecord): string {
  if (record.status === "success") {
    return `${record.toolName} completed`;
  }
  switch (record.error.kind) {
    case "permission_denied":
    case "unknown_tool":
      return `${record.toolName}: this capability is not available to this agent`;
    case "invalid_arguments":
      return `${record.toolName}: the request was rejected (${record.error.message})`;
    case "timeout":
      return `${record.toolName}: the action was attempted but did not finish in time`;
    case "executor_error":
      return `${record.toolName}: the action was attempted and failed (${record.error.cause ?? record.error.message})`;
  }
}

export function toToolCall(record: CallRecord): ToolCallEntry {
  return {
    tool_name: record.toolName,
    arguments: record.arguments,
    result: record.status === "success" ? (record.result ?? null) : null,
    error: record.status === "error" ? record.error : null,
    start_time: record.startTime,
    end_time: record.endTime,
  };
}

/** Freeze a value and everything reachable from it. */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

export function freezeRecord(record: CallRecord): CallRecord {
  return deepFreeze(record);
}
