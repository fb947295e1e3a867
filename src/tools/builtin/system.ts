import type { ToolDefinition } from "../interface.js";
import type { BackendClient } from "./backend-client.js";

export function createSystemHealthTool(backend: BackendClient): ToolDefinition {
  return {
    name: "get_system_health",
    description: "Check the overall health and status of the backend system.",
    category: "system",
    parameters: { type: "object", properties: {} },
    security: { level: "read" },
    timeoutMs: 10_000,
    async execute(_args, ctx) {
      return backend.get("/health", undefined, ctx.signal);
    },
  };
}
