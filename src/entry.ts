#!/usr/bin/env node
/**
 * toolgate entry point
 */

import { program } from "commander";
import JSON5 from "json5";
import { createToolgate } from "./app.js";
import { loadConfig } from "./config/loader.js";
import { readLedgerFile } from "./ledger/jsonl-sink.js";
import { visibleTools } from "./policy/filter.js";
import { MAX_TIMEOUT_MS } from "./tools/interface.js";
import { isPlainObject } from "./tools/validate.js";
import { createLogger } from "./utils/logger.js";
import { defaultConfigPath, resolvePathLike } from "./utils/paths.js";

const log = createLogger("cli");

function print(value: unknown): void {
  process.stdout.write(
    (typeof value === "string" ? value : JSON.stringify(value, null, 2)) + "\n",
  );
}

async function loadApp() {
  const { config } = program.opts<{ config: string }>();
  return createToolgate({ config: await loadConfig(config) });
}

program
  .name("toolgate")
  .description("Capability-filtered tool gateway for AI agents")
  .version("0.1.0")
  .option("-c, --config <path>", "Config file path", defaultConfigPath());

program
  .command("tools")
  .description("List registered tools, or the tools one agent may call")
  .option("--category <name>", "Only tools in this category")
  .option("--agent <id>", "Only tools visible to this agent")
  .action(async (options: { category?: string; agent?: string }) => {
    try {
      const app = await loadApp();
      let tools = app.registry.list({ category: options.category });
      if (options.agent) {
        const visible = new Set(
          visibleTools(app.registry, app.capabilities.get(options.agent)).map((t) => t.name),
        );
        tools = tools.filter((t) => visible.has(t.name));
      }
      print(
        tools.map((t) => ({
          name: t.name,
          category: t.category,
          level: t.security.level,
          description: t.description,
        })),
      );
    } catch (err) {
      log.error({ err }, "Failed to list tools");
      process.exit(1);
    }
  });

program
  .command("check")
  .description("Check whether an agent may call a tool")
  .argument("<agent>", "Agent id")
  .argument("<tool>", "Tool name")
  .action(async (agent: string, tool: string) => {
    try {
      const app = await loadApp();
      const caps = app.capabilities.get(agent);
      if (!caps.permits(tool)) {
        print("denied");
        process.exitCode = 1;
      } else if (!app.registry.has(tool)) {
        print("unknown");
        process.exitCode = 1;
      } else {
        print("allowed");
      }
    } catch (err) {
      log.error({ err }, "Check failed");
      process.exit(1);
    }
  });

program
  .command("invoke")
  .description("Invoke a tool through the gateway as an agent")
  .argument("<agent>", "Agent id")
  .argument("<tool>", "Tool name")
  .option("--args <json5>", "Tool arguments", "{}")
  .option("--timeout <ms>", "Timeout in milliseconds")
  .option("--context <id>", "Context (thread) id; defaults to cli-<agent>")
  .action(
    async (
      agent: string,
      tool: string,
      options: { args: string; timeout?: string; context?: string },
    ) => {
      try {
        const parsed: unknown = JSON5.parse(options.args);
        if (!isPlainObject(parsed)) {
          log.error("--args must be an object");
          process.exit(1);
        }
        const timeoutMs = options.timeout === undefined ? undefined : Number(options.timeout);
        const timeoutOk =
          timeoutMs === undefined ||
          (Number.isFinite(timeoutMs) && timeoutMs >= 0 && timeoutMs <= MAX_TIMEOUT_MS);
        if (!timeoutOk) {
          log.error({ max: MAX_TIMEOUT_MS }, "--timeout must be a number between 0 and the timer maximum");
          process.exit(1);
        }

        const app = await loadApp();
        const ctx = app.contexts.open(options.context ?? `cli-${agent}`, agent);
        const record = await ctx.invoke(tool, parsed, { timeoutMs });
        await app.contexts.close(ctx.contextId);
        await app.flush();

        print(record);
        if (record.status === "error") process.exitCode = 1;
      } catch (err) {
        log.error({ err }, "Invocation failed");
        process.exit(1);
      }
    },
  );

program
  .command("ledger")
  .description("Print a stored ledger file as a tool_calls transcript")
  .argument("<file>", "Ledger .jsonl file")
  .action(async (file: string) => {
    try {
      print(await readLedgerFile(resolvePathLike(file)));
    } catch (err) {
      log.error({ err }, "Failed to read ledger");
      process.exit(1);
    }
  });

program.parseAsync().catch((err: unknown) => {
  log.error({ err }, "Command failed");
  process.exit(1);
});
