/**
 * Invocation Gateway - the single choke point for tool calls.
 *
 * Every attempt, allowed or not, ends as exactly one CallRecord appended
 * to the context's ledger. invoke() does not throw for invocation-time
 * failures; they are returned on the record.
 */

import { monotonicFactory } from "ulid";
import {
  ExecutorError,
  InvalidArgumentsError,
  PermissionDeniedError,
  ToolTimeoutError,
} from "../errors.js";
import type { CapabilitySet } from "../policy/capability-set.js";
import {
  MAX_TIMEOUT_MS,
  type ToolArguments,
  type ToolContext,
  type ToolDefinition,
} from "../tools/interface.js";
import type { ToolRegistry } from "../tools/registry.js";
import { validateArguments } from "../tools/validate.js";
import { createLogger } from "../utils/logger.js";
import { freezeRecord, toCallError, type CallError, type CallRecord } from "./call-record.js";
import type { CallLedger } from "./ledger.js";

const log = createLogger("gateway");

export interface InvocationGatewayOptions {
  registry: ToolRegistry;
  /** Applied when neither the request nor the tool sets a timeout. 0 = none. */
  defaultTimeoutMs?: number;
  /** Clock in epoch milliseconds. */
  now?: () => number;
  /** Call id generator. Defaults to monotonic ULIDs. */
  nextId?: () => string;
}

export interface InvokeRequest {
  callerId: string;
  capabilities: CapabilitySet;
  toolName: string;
  arguments?: ToolArguments;
  ledger: CallLedger;
  timeoutMs?: number;
}

type Outcome = { ok: true; result: unknown } | { ok: false; error: CallError };

/** Private copy of a value; undefined when it holds functions, symbols or the like. */
function cloneValue<T>(value: T): T | undefined {
  try {
    return structuredClone(value);
  } catch {
    return undefined;
  }
}

export class InvocationGateway {
  readonly registry: ToolRegistry;
  private readonly defaultTimeoutMs: number;
  private readonly now: () => number;
  private readonly nextId: () => string;

  constructor(opts: InvocationGatewayOptions) {
    this.registry = opts.registry;
    this.defaultTimeoutMs = opts.defaultTimeoutMs ?? 0;
    this.now = opts.now ?? (() => Date.now());
    this.nextId = opts.nextId ?? monotonicFactory();
  }

  async invoke(req: InvokeRequest): Promise<CallRecord> {
    const callId = this.nextId();
    // Throws on a closed ledger before anything runs.
    req.ledger.reserve(callId);
    try {
      const startMs = this.now();
      const args = cloneValue(req.arguments ?? {});

      const outcome = await this.attempt(callId, req, args);

      const endMs = Math.max(this.now(), startMs);
      const base = {
        callId,
        callerId: req.callerId,
        contextId: req.ledger.contextId,
        toolName: req.toolName,
        arguments: args ?? {},
        startTime: new Date(startMs).toISOString(),
        endTime: new Date(endMs).toISOString(),
        durationMs: endMs - startMs,
      };
      const record = freezeRecord(
        outcome.ok
          ? { ...base, status: "success", result: outcome.result }
          : { ...base, status: "error", error: outcome.error },
      );

      req.ledger.append(record);
      return record;
    } finally {
      req.ledger.release(callId);
    }
  }

  private async attempt(
    callId: string,
    req: InvokeRequest,
    args: ToolArguments | undefined,
  ): Promise<Outcome> {
    const { callerId, toolName } = req;
    const fields = { callId, callerId, toolName, contextId: req.ledger.contextId };

    if (!req.capabilities.permits(toolName)) {
      log.info(fields, "tool call denied: not in agent capabilities");
      return { ok: false, error: toCallError(new PermissionDeniedError(toolName, callerId)) };
    }

    let tool: ToolDefinition;
    try {
      tool = this.registry.lookup(toolName);
    } catch (err) {
      log.warn(fields, "tool call refused: permitted but not registered");
      return { ok: false, error: toCallError(err) };
    }

    if (args === undefined) {
      const issues = [{ path: "", message: "arguments must be plain JSON data" }];
      log.info({ ...fields, issues }, "tool call refused: invalid arguments");
      return { ok: false, error: toCallError(new InvalidArgumentsError(toolName, issues)) };
    }

    const issues = validateArguments(tool.parameters, args);
    if (issues.length > 0) {
      log.info({ ...fields, issues }, "tool call refused: invalid arguments");
      return { ok: false, error: toCallError(new InvalidArgumentsError(toolName, issues)) };
    }

    const requested = req.timeoutMs ?? tool.timeoutMs ?? this.defaultTimeoutMs;
    const timeoutMs = Math.min(requested, MAX_TIMEOUT_MS);
    if (timeoutMs < requested) {
      log.warn({ ...fields, requested, timeoutMs }, "timeout clamped to timer maximum");
    }
    try {
      const raw = await this.runWithTimeout(
        tool,
        args,
        { callId, callerId, contextId: req.ledger.contextId },
        timeoutMs,
      );
      const result = cloneValue(raw ?? null);
      if (result === undefined) {
        const err = new ExecutorError(toolName, new Error("result is not plain JSON data"));
        log.warn({ ...fields, err }, "tool returned an unstorable result");
        return { ok: false, error: toCallError(err) };
      }
      log.debug(fields, "tool call succeeded");
      return { ok: true, result };
    } catch (err) {
      if (err instanceof ToolTimeoutError) {
        log.warn({ ...fields, timeoutMs }, "tool call timed out");
        return { ok: false, error: toCallError(err) };
      }
      log.warn({ ...fields, err }, "tool executor failed");
      return { ok: false, error: toCallError(new ExecutorError(toolName, err)) };
    }
  }

  private runWithTimeout(
    tool: ToolDefinition,
    args: ToolArguments,
    base: Omit<ToolContext, "signal">,
    timeoutMs: number,
  ): Promise<unknown> {
    const controller = new AbortController();
    const ctx: ToolContext = { ...base, signal: controller.signal };
    const run = Promise.resolve().then(() => tool.execute(structuredClone(args), ctx));

    if (!(timeoutMs > 0)) {
      return run;
    }

    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        timedOut = true;
        const err = new ToolTimeoutError(tool.name, timeoutMs);
        controller.abort(err);
        reject(err);
      }, timeoutMs);
    });

    // Late settlement after a timeout is discarded.
    void run.then(
      () => {
        if (timedOut) log.debug({ callId: base.callId, tool: tool.name }, "late tool result discarded");
      },
      (err: unknown) => {
        if (timedOut) log.debug({ callId: base.callId, tool: tool.name, err }, "late tool failure discarded");
      },
    );

    return Promise.race([run, deadline]).finally(() => clearTimeout(timer));
  }
}
