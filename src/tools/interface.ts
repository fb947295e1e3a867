/**
 * Tool contract shared by the registry, the gateway and the builtin tools.
 */

export type JsonSchemaType =
  | "string"
  | "number"
  | "integer"
  | "boolean"
  | "object"
  | "array";

export interface JsonSchemaProperty {
  type?: JsonSchemaType;
  description?: string;
  enum?: readonly (string | number)[];
  items?: JsonSchemaProperty;
  default?: unknown;
}

export interface JsonSchema {
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  required?: string[];
}

export type ToolArguments = Record<string, unknown>;

/** Passed to every executor invocation. */
export interface ToolContext {
  callId: string;
  callerId: string;
  contextId: string;
  /** Aborted when the gateway gives up on the call (timeout). */
  signal: AbortSignal;
}

export type ToolExecutor = (
  args: ToolArguments,
  ctx: ToolContext,
) => Promise<unknown>;

export interface ToolDefinition {
  name: string;
  description: string;
  /** Grouping used for discovery, e.g. "tickets" or "system". */
  category: string;
  parameters: JsonSchema;
  security: {
    level: "read" | "write";
  };
  /** Per-tool timeout; overrides the gateway default. */
  timeoutMs?: number;
  execute: ToolExecutor;
}

export interface ModelTool {
  name: string;
  description: string;
  input_schema: JsonSchema;
}

/** Largest delay a Node timer accepts; longer timeouts are clamped to it. */
export const MAX_TIMEOUT_MS = 2_147_483_647;
