import { describe, it, expect } from "vitest";
import { InvocationGateway } from "../gateway.js";
import { CallLedger } from "../ledger.js";
import { toToolCall, type CallRecord } from "../call-record.js";
import { LedgerError } from "../../errors.js";
import { CapabilitySet } from "../../policy/capability-set.js";
import { ToolRegistry } from "../../tools/registry.js";
import type { JsonSchema, ToolContext, ToolDefinition, ToolExecutor } from "../../tools/interface.js";
import { isPlainObject } from "../../tools/validate.js";

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

function createTool(
  name: string,
  execute: ToolExecutor,
  parameters: JsonSchema = { type: "object", properties: {} },
  timeoutMs?: number,
): ToolDefinition {
  return {
    name,
    description: `Test tool: ${name}`,
    category: "test",
    parameters,
    security: { level: "read" },
    timeoutMs,
    execute,
  };
}

function setup() {
  const calls = { health: 0, create: 0 };
  const registry = new ToolRegistry();
  registry.register(
    createTool("get_system_health", async () => {
      calls.health++;
      return { status: "healthy" };
    }),
  );
  registry.register(
    createTool(
      "create_ticket",
      async (args) => {
        calls.create++;
        return { id: "ticket-1", title: args.title };
      },
      { type: "object", properties: { title: { type: "string" } }, required: ["title"] },
    ),
  );
  registry.register(
    createTool("flaky", async () => {
      throw new Error("backend down");
    }),
  );

  const gateway = new InvocationGateway({ registry });
  const ledger = new CallLedger("thread-1");
  return { calls, registry, gateway, ledger };
}

function expectRecordInvariant(record: CallRecord) {
  if (record.status === "success") {
    expect("error" in record).toBe(false);
  } else {
    expect("result" in record).toBe(false);
    expect(record.error.message).not.toBe("");
  }
  expect(Date.parse(record.endTime)).toBeGreaterThanOrEqual(Date.parse(record.startTime));
  expect(record.durationMs).toBeGreaterThanOrEqual(0);
}

describe("InvocationGateway", () => {
  it("runs a permitted tool and records the result", async () => {
    const { gateway, ledger, calls } = setup();
    const caps = CapabilitySet.fromConfig("agent-1", ["get_system_health"]);

    const record = await gateway.invoke({
      callerId: "agent-1",
      capabilities: caps,
      toolName: "get_system_health",
      arguments: {},
      ledger,
    });

    expect(record.status).toBe("success");
    if (record.status !== "success") return;
    expect(record.result).toEqual({ status: "healthy" });
    expect(record.callerId).toBe("agent-1");
    expect(record.contextId).toBe("thread-1");
    expect(calls.health).toBe(1);
    expect(ledger.all()).toEqual([record]);
    expectRecordInvariant(record);
  });

  it("denies a tool outside the capability set without running it", async () => {
    const { gateway, ledger, calls } = setup();
    const caps = CapabilitySet.fromConfig("agent-1", ["get_system_health"]);

    const record = await gateway.invoke({
      callerId: "agent-1",
      capabilities: caps,
      toolName: "create_ticket",
      arguments: { title: "Printer on fire" },
      ledger,
    });

    expect(record.status).toBe("error");
    if (record.status !== "error") return;
    expect(record.error).toEqual({
      kind: "permission_denied",
      message: "Tool 'create_ticket' is not available to agent 'agent-1'",
    });
    expect(calls.create).toBe(0);
    expect(ledger.size).toBe(1);
    expectRecordInvariant(record);
  });

  it("denies every tool for an empty capability set, registered or not", async () => {
    const { gateway, ledger, calls, registry } = setup();
    const caps = CapabilitySet.fromConfig("agent-2", []);

    for (const toolName of [...registry.listNames(), "does_not_exist"]) {
      const record = await gateway.invoke({
        callerId: "agent-2",
        capabilities: caps,
        toolName,
        arguments: { title: "x" },
        ledger,
      });
      expect(record.status === "error" && record.error.kind).toBe("permission_denied");
    }

    expect(calls).toEqual({ health: 0, create: 0 });
    expect(ledger.size).toBe(4);
  });

  it("reports a permitted but unregistered tool as unknown", async () => {
    const { gateway, ledger } = setup();
    const caps = CapabilitySet.fromConfig("agent-1", ["retired_tool"]);

    const record = await gateway.invoke({
      callerId: "agent-1",
      capabilities: caps,
      toolName: "retired_tool",
      ledger,
    });

    expect(record.status === "error" && record.error).toEqual({
      kind: "unknown_tool",
      message: "Tool 'retired_tool' is not registered",
    });
    expect(ledger.size).toBe(1);
  });

  it("treats a tool removed after startup as unknown", async () => {
    const { gateway, ledger, registry } = setup();
    const caps = CapabilitySet.fromConfig("agent-1", ["get_system_health"]);
    registry.unregister("get_system_health");

    const record = await gateway.invoke({
      callerId: "agent-1",
      capabilities: caps,
      toolName: "get_system_health",
      ledger,
    });

    expect(record.status === "error" && record.error.kind).toBe("unknown_tool");
  });

  it("refuses invalid arguments before the executor runs", async () => {
    const { gateway, ledger, calls } = setup();
    const caps = CapabilitySet.fromConfig("agent-1", ["create_ticket"]);

    const record = await gateway.invoke({
      callerId: "agent-1",
      capabilities: caps,
      toolName: "create_ticket",
      arguments: { title: 42 },
      ledger,
    });

    expect(record.status === "error" && record.error).toEqual({
      kind: "invalid_arguments",
      message: "Invalid arguments for 'create_ticket': title: expected string",
    });
    expect(calls.create).toBe(0);
  });

  it("records executor failures with their cause", async () => {
    const { gateway, ledger } = setup();
    const caps = CapabilitySet.fromConfig("agent-1", ["flaky"]);

    const record = await gateway.invoke({
      callerId: "agent-1",
      capabilities: caps,
      toolName: "flaky",
      ledger,
    });

    expect(record.status === "error" && record.error).toEqual({
      kind: "executor_error",
      message: "Tool 'flaky' failed: backend down",
      cause: "backend down",
    });
    expectRecordInvariant(record);
  });

  it("captures executors that throw synchronously", async () => {
    const registry = new ToolRegistry();
    registry.register(
      createTool("sync_throw", () => {
        throw new Error("boom");
      }),
    );
    const gateway = new InvocationGateway({ registry });
    const ledger = new CallLedger("t");

    const record = await gateway.invoke({
      callerId: "a",
      capabilities: CapabilitySet.fromConfig("a", ["sync_throw"]),
      toolName: "sync_throw",
      ledger,
    });

    expect(record.status === "error" && record.error.cause).toBe("boom");
    expect(ledger.size).toBe(1);
  });

  it("does not let the executor mutate the recorded arguments", async () => {
    const registry = new ToolRegistry();
    registry.register(
      createTool("mutator", async (args) => {
        args.injected = true;
        return "done";
      }),
    );
    const gateway = new InvocationGateway({ registry });
    const input = { a: 1 };

    const record = await gateway.invoke({
      callerId: "a",
      capabilities: CapabilitySet.fromConfig("a", ["mutator"]),
      toolName: "mutator",
      arguments: input,
      ledger: new CallLedger("t"),
    });

    expect(record.arguments).toEqual({ a: 1 });
    expect(input).toEqual({ a: 1 });
    expect(Object.isFrozen(record)).toBe(true);
  });

  it("throws on a closed ledger without running the tool", async () => {
    const { gateway, ledger, calls } = setup();
    ledger.close();

    await expect(
      gateway.invoke({
        callerId: "agent-1",
        capabilities: CapabilitySet.fromConfig("agent-1", ["get_system_health"]),
        toolName: "get_system_health",
        ledger,
      }),
    ).rejects.toThrow(LedgerError);
    await expect(
      gateway.invoke({
        callerId: "agent-1",
        capabilities: CapabilitySet.fromConfig("agent-1", []),
        toolName: "get_system_health",
        ledger,
      }),
    ).rejects.toThrow("Ledger for context 'thread-1' is closed");

    expect(calls.health).toBe(0);
    expect(ledger.size).toBe(0);
  });

  it("records a call that was running when the ledger closed", async () => {
    const registry = new ToolRegistry();
    registry.register(createTool("slow_ok", () => sleep(20).then(() => "done")));
    const gateway = new InvocationGateway({ registry });
    const ledger = new CallLedger("t");

    const running = gateway.invoke({
      callerId: "a",
      capabilities: CapabilitySet.fromConfig("a", ["slow_ok"]),
      toolName: "slow_ok",
      ledger,
    });
    ledger.close();
    const record = await running;

    expect(record.status === "success" && record.result).toBe("done");
    expect(await ledger.settled()).toEqual([record]);
  });

  it("keeps nested arguments and results from changing after the call", async () => {
    const registry = new ToolRegistry();
    registry.register(
      createTool("echo", async (args) => ({ ticket: args.ticket, tags: ["a"] })),
    );
    const gateway = new InvocationGateway({ registry });
    const input = { ticket: { title: "Printer jam" } };

    const record = await gateway.invoke({
      callerId: "a",
      capabilities: CapabilitySet.fromConfig("a", ["echo"]),
      toolName: "echo",
      arguments: input,
      ledger: new CallLedger("t"),
    });
    input.ticket.title = "edited by caller";

    expect(record.arguments).toEqual({ ticket: { title: "Printer jam" } });
    expect(record.status === "success" && record.result).toEqual({
      ticket: { title: "Printer jam" },
      tags: ["a"],
    });
    expect(Object.isFrozen(record.arguments.ticket)).toBe(true);
    if (record.status !== "success" || !isPlainObject(record.result)) return;
    expect(Object.isFrozen(record.result)).toBe(true);
    expect(Object.isFrozen(record.result.tags)).toBe(true);
  });

  it("ignores nested argument changes made by a timed-out tool", async () => {
    const registry = new ToolRegistry();
    registry.register(
      createTool("late_writer", async (args) => {
        await sleep(30);
        const ticket = args.ticket;
        if (isPlainObject(ticket)) ticket.title = "changed late";
        return "late";
      }),
    );
    const gateway = new InvocationGateway({ registry });
    const ledger = new CallLedger("t");

    const record = await gateway.invoke({
      callerId: "a",
      capabilities: CapabilitySet.fromConfig("a", ["late_writer"]),
      toolName: "late_writer",
      arguments: { ticket: { title: "original" } },
      ledger,
      timeoutMs: 5,
    });
    await sleep(60);

    expect(record.status === "error" && record.error.kind).toBe("timeout");
    expect(ledger.all()[0].arguments).toEqual({ ticket: { title: "original" } });
  });

  it("refuses arguments that are not plain data", async () => {
    const registry = new ToolRegistry();
    let ran = false;
    registry.register(
      createTool("plain", async () => {
        ran = true;
        return "ok";
      }),
    );
    const gateway = new InvocationGateway({ registry });

    const record = await gateway.invoke({
      callerId: "a",
      capabilities: CapabilitySet.fromConfig("a", ["plain"]),
      toolName: "plain",
      arguments: { callback: () => "nope" },
      ledger: new CallLedger("t"),
    });

    expect(record.status === "error" && record.error).toEqual({
      kind: "invalid_arguments",
      message: "Invalid arguments for 'plain': arguments must be plain JSON data",
    });
    expect(record.arguments).toEqual({});
    expect(ran).toBe(false);
  });

  it("records a tool that returns nothing as a null result", async () => {
    const registry = new ToolRegistry();
    registry.register(createTool("fire_and_forget", async () => undefined));
    const gateway = new InvocationGateway({ registry });

    const record = await gateway.invoke({
      callerId: "a",
      capabilities: CapabilitySet.fromConfig("a", ["fire_and_forget"]),
      toolName: "fire_and_forget",
      ledger: new CallLedger("t"),
    });

    expect(record.status).toBe("success");
    expect(record.status === "success" && record.result).toBeNull();
    const entry = JSON.parse(JSON.stringify(toToolCall(record)));
    expect(entry.result).toBeNull();
    expect(Object.keys(entry)).toContain("result");
  });

  describe("timeouts", () => {
    it("records a timeout and ignores the late completion", async () => {
      let completedLate = false;
      let signal: AbortSignal | undefined;
      const registry = new ToolRegistry();
      registry.register(
        createTool("slow", async (_args, ctx: ToolContext) => {
          signal = ctx.signal;
          await sleep(60);
          completedLate = true;
          return "too late";
        }),
      );
      const gateway = new InvocationGateway({ registry });
      const ledger = new CallLedger("t");

      const record = await gateway.invoke({
        callerId: "a",
        capabilities: CapabilitySet.fromConfig("a", ["slow"]),
        toolName: "slow",
        ledger,
        timeoutMs: 10,
      });

      expect(record.status === "error" && record.error).toEqual({
        kind: "timeout",
        message: "Tool 'slow' timed out after 10ms",
      });
      expect(signal?.aborted).toBe(true);
      expect(ledger.size).toBe(1);

      await sleep(100);
      expect(completedLate).toBe(true);
      expect(ledger.size).toBe(1);
    });

    it("ignores a late failure as well", async () => {
      const registry = new ToolRegistry();
      registry.register(
        createTool("slow_fail", async () => {
          await sleep(40);
          throw new Error("late failure");
        }),
      );
      const gateway = new InvocationGateway({ registry });
      const ledger = new CallLedger("t");

      const record = await gateway.invoke({
        callerId: "a",
        capabilities: CapabilitySet.fromConfig("a", ["slow_fail"]),
        toolName: "slow_fail",
        ledger,
        timeoutMs: 5,
      });
      await sleep(80);

      expect(record.status === "error" && record.error.kind).toBe("timeout");
      expect(ledger.size).toBe(1);
    });

    it("uses the tool timeout, then the gateway default", async () => {
      const registry = new ToolRegistry();
      registry.register(createTool("tool_limited", () => sleep(50).then(() => "x"), undefined, 5));
      registry.register(createTool("default_limited", () => sleep(50).then(() => "x")));
      const gateway = new InvocationGateway({ registry, defaultTimeoutMs: 8 });
      const caps = CapabilitySet.fromConfig("a", ["tool_limited", "default_limited"]);
      const ledger = new CallLedger("t");

      const a = await gateway.invoke({ callerId: "a", capabilities: caps, toolName: "tool_limited", ledger });
      const b = await gateway.invoke({ callerId: "a", capabilities: caps, toolName: "default_limited", ledger });

      expect(a.status === "error" && a.error.message).toBe("Tool 'tool_limited' timed out after 5ms");
      expect(b.status === "error" && b.error.message).toBe("Tool 'default_limited' timed out after 8ms");
    });

    it("clamps a timeout beyond the timer maximum instead of firing at once", async () => {
      const registry = new ToolRegistry();
      registry.register(createTool("steady", () => sleep(20).then(() => "ok")));
      const gateway = new InvocationGateway({ registry, defaultTimeoutMs: 3_000_000_000 });

      const record = await gateway.invoke({
        callerId: "a",
        capabilities: CapabilitySet.fromConfig("a", ["steady"]),
        toolName: "steady",
        ledger: new CallLedger("t"),
      });

      expect(record.status === "success" && record.result).toBe("ok");
    });

    it("finishes normally when the executor beats the timeout", async () => {
      const registry = new ToolRegistry();
      registry.register(createTool("quick", async () => "fast"));
      const gateway = new InvocationGateway({ registry, defaultTimeoutMs: 1000 });

      const record = await gateway.invoke({
        callerId: "a",
        capabilities: CapabilitySet.fromConfig("a", ["quick"]),
        toolName: "quick",
        ledger: new CallLedger("t"),
      });

      expect(record.status === "success" && record.result).toBe("fast");
    });
  });

  it("stamps start and end from the clock and never goes backwards", async () => {
    const ticks = [1_000, 400];
    const registry = new ToolRegistry();
    registry.register(createTool("noop", async () => null));
    const gateway = new InvocationGateway({
      registry,
      now: () => ticks.shift() ?? 0,
      nextId: () => "call-1",
    });

    const record = await gateway.invoke({
      callerId: "a",
      capabilities: CapabilitySet.fromConfig("a", ["noop"]),
      toolName: "noop",
      ledger: new CallLedger("t"),
    });

    expect(record.callId).toBe("call-1");
    expect(record.startTime).toBe("1970-01-01T00:00:01.000Z");
    expect(record.endTime).toBe("1970-01-01T00:00:01.000Z");
    expect(record.durationMs).toBe(0);
  });

  it("records ten concurrent calls exactly once each, in completion order", async () => {
    const registry = new ToolRegistry();
    registry.register(
      createTool(
        "wait",
        async (args) => {
          await sleep(Number(args.ms));
          return args.ms;
        },
        { type: "object", properties: { ms: { type: "integer" } }, required: ["ms"] },
      ),
    );
    registry.register(createTool("forbidden", async () => "never"));
    const gateway = new InvocationGateway({ registry });
    const caps = CapabilitySet.fromConfig("a", ["wait"]);
    const ledger = new CallLedger("t");

    const completed: string[] = [];
    const records = await Promise.all(
      Array.from({ length: 10 }, (_, i) =>
        gateway
          .invoke({
            callerId: "a",
            capabilities: caps,
            toolName: i % 3 === 0 ? "forbidden" : "wait",
            arguments: { ms: (10 - i) * 3 },
            ledger,
          })
          .then((r) => {
            completed.push(r.callId);
            return r;
          }),
      ),
    );

    const all = ledger.all();
    expect(all).toHaveLength(10);
    expect(new Set(all.map((r) => r.callId)).size).toBe(10);
    expect(all.map((r) => r.callId)).toEqual(completed);
    expect(all.filter((r) => r.status === "error")).toHaveLength(4);
    for (const r of records) expectRecordInvariant(r);
  });
});
