/**
 * Builtin tools factory
 *
 * Tools are organized by category:
 * - **system**: get_system_health
 * - **tickets**: create_ticket, list_tickets, search_tickets, get_ticket
 * - **integrations**: list_integrations, get_active_integrations
 *
 * Usage:
 * ```ts
 * const registry = createToolRegistry(createBuiltinTools({ backend }));
 * ```
 */

import type { ToolDefinition } from "../interface.js";
import { ToolRegistry } from "../registry.js";
import { BackendClient, type BackendClientOptions } from "./backend-client.js";
import { createGetActiveIntegrationsTool, createListIntegrationsTool } from "./integrations.js";
import { createSystemHealthTool } from "./system.js";
import {
  createCreateTicketTool,
  createGetTicketTool,
  createListTicketsTool,
  createSearchTicketsTool,
} from "./tickets.js";

export interface BuiltinToolsOptions {
  /** Client instance, or options to build one. */
  backend: BackendClient | BackendClientOptions;
}

export function createBuiltinTools(opts: BuiltinToolsOptions): ToolDefinition[] {
  const backend =
    opts.backend instanceof BackendClient ? opts.backend : new BackendClient(opts.backend);

  return [
    createSystemHealthTool(backend),

    createCreateTicketTool(backend),
    createListTicketsTool(backend),
    createSearchTicketsTool(backend),
    createGetTicketTool(backend),

    createListIntegrationsTool(backend),
    createGetActiveIntegrationsTool(backend),
  ];
}

/** Register every tool once, at startup. */
export function createToolRegistry(tools: readonly ToolDefinition[]): ToolRegistry {
  const registry = new ToolRegistry();
  for (const tool of tools) {
    registry.register(tool);
  }
  return registry;
}
