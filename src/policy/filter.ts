/**
 * Tool visibility for one agent.
 *
 * Unlike an allow/deny policy where an empty allow list means "all
 * tools", an empty capability set exposes nothing.
 */

import type { ToolDefinition } from "../tools/interface.js";
import type { ToolRegistry } from "../tools/registry.js";
import type { CapabilitySet } from "./capability-set.js";

export function filterToolsByCapabilities(
  tools: readonly ToolDefinition[],
  caps: CapabilitySet,
): ToolDefinition[] {
  return tools.filter((tool) => caps.permits(tool.name));
}

/** Registered tools the agent may call, in registration order. */
export function visibleTools(
  registry: ToolRegistry,
  caps: CapabilitySet,
): ToolDefinition[] {
  return filterToolsByCapabilities(registry.list(), caps);
}

/** Configured names with no registered tool behind them. */
export function unresolvedCapabilities(
  registry: ToolRegistry,
  caps: CapabilitySet,
): string[] {
  return caps.names().filter((name) => !registry.has(name));
}
