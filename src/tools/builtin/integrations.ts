import type { ToolDefinition } from "../interface.js";
import type { BackendClient } from "./backend-client.js";

const INTEGRATIONS = "/api/v1/integrations";

export function createListIntegrationsTool(backend: BackendClient): ToolDefinition {
  return {
    name: "list_integrations",
    description: "List the organization's integrations, optionally filtered by type or status.",
    category: "integrations",
    parameters: {
      type: "object",
      properties: {
        integration_type: { type: "string", description: "e.g. jira, salesforce" },
        status: { type: "string", description: "e.g. active, inactive, error" },
      },
    },
    security: { level: "read" },
    async execute(args, ctx) {
      return backend.get(
        INTEGRATIONS,
        {
          integration_type: typeof args.integration_type === "string" ? args.integration_type : undefined,
          status: typeof args.status === "string" ? args.status : undefined,
        },
        ctx.signal,
      );
    },
  };
}

export function createGetActiveIntegrationsTool(backend: BackendClient): ToolDefinition {
  return {
    name: "get_active_integrations",
    description: "Get integrations that can currently receive tickets.",
    category: "integrations",
    parameters: {
      type: "object",
      properties: {
        supports_category: { type: "string", description: "Only integrations handling this ticket category" },
      },
    },
    security: { level: "read" },
    async execute(args, ctx) {
      return backend.get(
        `${INTEGRATIONS}/active`,
        {
          supports_category:
            typeof args.supports_category === "string" ? args.supports_category : undefined,
        },
        ctx.signal,
      );
    },
  };
}
