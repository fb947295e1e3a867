/**
 * Wires config into a registry, a capability store, a gateway and a
 * context manager.
 */

import { join } from "node:path";
import type { Config } from "./config/types.js";
import { ContextManager } from "./gateway/context.js";
import { InvocationGateway } from "./gateway/gateway.js";
import type { LedgerSink } from "./gateway/ledger.js";
import { JsonlLedgerSink } from "./ledger/jsonl-sink.js";
import { CapabilityStore } from "./policy/capability-store.js";
import { unresolvedCapabilities } from "./policy/filter.js";
import { createBuiltinTools, createToolRegistry } from "./tools/builtin/factory.js";
import type { ToolDefinition } from "./tools/interface.js";
import type { ToolRegistry } from "./tools/registry.js";
import { createLogger } from "./utils/logger.js";
import { ledgerFileName } from "./utils/paths.js";

const log = createLogger("app");

export interface ToolgateOptions {
  config: Config;
  /** Replaces the builtin tools. */
  tools?: readonly ToolDefinition[];
  fetchImpl?: typeof fetch;
}

export interface Toolgate {
  registry: ToolRegistry;
  capabilities: CapabilityStore;
  gateway: InvocationGateway;
  contexts: ContextManager;
  /** File sinks created so far, keyed by context id. */
  sinks: Map<string, JsonlLedgerSink>;
  /** Wait for pending ledger file writes. */
  flush(): Promise<void>;
}

export function createToolgate(opts: ToolgateOptions): Toolgate {
  const { config } = opts;

  const tools =
    opts.tools ??
    createBuiltinTools({
      backend: {
        baseUrl: config.backend.baseUrl,
        token: config.backend.token,
        circuitBreaker: config.backend.circuitBreaker,
        fetchImpl: opts.fetchImpl,
      },
    });
  const registry = createToolRegistry(tools);
  const capabilities = new CapabilityStore(config.agents);

  for (const agentId of capabilities.agentIds()) {
    const missing = unresolvedCapabilities(registry, capabilities.get(agentId));
    if (missing.length > 0) {
      log.warn({ agentId, missing }, "agent lists tools that are not registered");
    }
  }

  const gateway = new InvocationGateway({
    registry,
    defaultTimeoutMs: config.gateway.defaultTimeoutMs,
  });

  const sinks = new Map<string, JsonlLedgerSink>();
  const ledgerDir = config.ledger.dir;
  const sinksFor = ledgerDir
    ? (contextId: string): LedgerSink[] => {
        const sink = new JsonlLedgerSink(join(ledgerDir, ledgerFileName(contextId)));
        sinks.set(contextId, sink);
        return [sink];
      }
    : undefined;

  const contexts = new ContextManager({ gateway, capabilities, sinksFor });

  return {
    registry,
    capabilities,
    gateway,
    contexts,
    sinks,
    async flush() {
      await Promise.all(Array.from(sinks.values(), (s) => s.flush()));
    },
  };
}
