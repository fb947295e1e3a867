/**
 * Invocation contexts: one per conversation thread.
 *
 * A context binds a caller to the capability snapshot taken when it was
 * opened and owns that thread's ledger.
 */

import { LedgerError } from "../errors.js";
import type { CapabilitySet } from "../policy/capability-set.js";
import type { CapabilityStore } from "../policy/capability-store.js";
import { visibleTools } from "../policy/filter.js";
import type { ModelTool, ToolArguments } from "../tools/interface.js";
import { createLogger } from "../utils/logger.js";
import { toToolCall, type CallRecord, type ToolCallEntry } from "./call-record.js";
import type { InvocationGateway } from "./gateway.js";
import { CallLedger, type LedgerSink } from "./ledger.js";

const log = createLogger("context");

export interface InvokeOptions {
  timeoutMs?: number;
}

export class InvocationContext {
  constructor(
    private readonly gateway: InvocationGateway,
    readonly callerId: string,
    readonly capabilities: CapabilitySet,
    readonly ledger: CallLedger,
  ) {}

  get contextId(): string {
    return this.ledger.contextId;
  }

  invoke(toolName: string, args: ToolArguments = {}, opts: InvokeOptions = {}): Promise<CallRecord> {
    return this.gateway.invoke({
      callerId: this.callerId,
      capabilities: this.capabilities,
      toolName,
      arguments: args,
      ledger: this.ledger,
      timeoutMs: opts.timeoutMs,
    });
  }

  /** Tools to advertise to the model for this caller. */
  availableTools(): ModelTool[] {
    return this.gateway.registry.toModelFormat(
      visibleTools(this.gateway.registry, this.capabilities).map((t) => t.name),
    );
  }

  history(): ToolCallEntry[] {
    return this.ledger.all().map(toToolCall);
  }

  /** Refuse new calls, then wait for running ones to land. */
  close(): Promise<readonly CallRecord[]> {
    this.ledger.close();
    return this.ledger.settled();
  }
}

export interface ContextManagerOptions {
  gateway: InvocationGateway;
  capabilities: CapabilityStore;
  /** Sinks for a new context's ledger, e.g. a JSONL file per context. */
  sinksFor?: (contextId: string) => LedgerSink[];
}

export class ContextManager {
  private readonly contexts = new Map<string, InvocationContext>();

  constructor(private readonly opts: ContextManagerOptions) {}

  /**
   * Open (or return the already open) context. The capability snapshot is
   * taken here; later store updates only affect contexts opened afterwards.
   */
  open(contextId: string, callerId: string): InvocationContext {
    const existing = this.contexts.get(contextId);
    if (existing) {
      if (existing.callerId !== callerId) {
        log.warn({ contextId, callerId, owner: existing.callerId }, "context owned by another caller");
        throw new LedgerError(`Context '${contextId}' belongs to another caller`);
      }
      return existing;
    }

    const caps = this.opts.capabilities.get(callerId);
    const ledger = new CallLedger(contextId, { sinks: this.opts.sinksFor?.(contextId) });
    const ctx = new InvocationContext(this.opts.gateway, callerId, caps, ledger);
    this.contexts.set(contextId, ctx);
    log.debug({ contextId, callerId, capabilityVersion: caps.version }, "context opened");
    return ctx;
  }

  get(contextId: string): InvocationContext | undefined {
    return this.contexts.get(contextId);
  }

  /**
   * Archive the context. Resolves with its final records once calls that
   * were already running have been recorded.
   */
  async close(contextId: string): Promise<readonly CallRecord[]> {
    const ctx = this.contexts.get(contextId);
    if (!ctx) return [];
    this.contexts.delete(contextId);
    const pending = ctx.ledger.pending;
    const records = await ctx.close();
    log.debug({ contextId, calls: records.length, awaited: pending }, "context closed");
    return records;
  }

  get openCount(): number {
    return this.contexts.size;
  }
}
