/**
 * Versioned per-agent capability snapshots.
 *
 * Updates replace the stored CapabilitySet with a new value; a context
 * that already took a snapshot keeps using it until it is closed.
 */

import { createLogger } from "../utils/logger.js";
import { CapabilitySet } from "./capability-set.js";

const log = createLogger("capabilities");

export interface AgentToolConfig {
  id: string;
  tools?: readonly string[];
}

export class CapabilityStore {
  private readonly sets = new Map<string, CapabilitySet>();

  constructor(agents: readonly AgentToolConfig[] = []) {
    this.load(agents);
  }

  load(agents: readonly AgentToolConfig[]): void {
    for (const agent of agents) {
      this.set(agent.id, agent.tools ?? []);
    }
  }

  set(agentId: string, tools: readonly string[]): CapabilitySet {
    const current = this.sets.get(agentId);
    const next = current
      ? current.withNames(tools)
      : CapabilitySet.fromConfig(agentId, tools);
    this.sets.set(agentId, next);
    log.info(
      { agentId, version: next.version, tools: next.names() },
      "capability set updated",
    );
    if (next.isEmpty()) {
      log.warn({ agentId }, "agent has no tools configured; every call will be denied");
    }
    return next;
  }

  /** Current snapshot. Unknown agents get an empty set. */
  get(agentId: string): CapabilitySet {
    return this.sets.get(agentId) ?? CapabilitySet.empty(agentId);
  }

  has(agentId: string): boolean {
    return this.sets.has(agentId);
  }

  remove(agentId: string): boolean {
    return this.sets.delete(agentId);
  }

  agentIds(): string[] {
    return Array.from(this.sets.keys()).sort();
  }
}
