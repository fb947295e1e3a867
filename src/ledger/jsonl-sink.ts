/**
 * JSONL persistence for call ledgers.
 *
 * One line per appended record. Writes are serialised; when a write fails
 * the sink goes degraded and keeps lines in memory until the next write
 * succeeds.
 */

import { appendFile, mkdir, readFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import type { CallRecord, ToolCallEntry } from "../gateway/call-record.js";
import { toToolCall } from "../gateway/call-record.js";
import type { LedgerSink } from "../gateway/ledger.js";
import { createLogger } from "../utils/logger.js";
import { redactParams } from "./redact.js";

const log = createLogger("ledger-file");

export interface LedgerLine extends ToolCallEntry {
  call_id: string;
  caller_id: string;
  context_id: string;
  status: CallRecord["status"];
  duration_ms: number;
}

const callErrorSchema = z.object({
  kind: z.enum([
    "permission_denied",
    "unknown_tool",
    "invalid_arguments",
    "executor_error",
    "timeout",
  ]),
  message: z.string(),
  cause: z.string().optional(),
});

const ledgerLineSchema = z.object({
  call_id: z.string(),
  caller_id: z.string(),
  context_id: z.string(),
  status: z.enum(["success", "error"]),
  duration_ms: z.number(),
  tool_name: z.string(),
  arguments: z.record(z.unknown()),
  result: z.unknown(),
  error: callErrorSchema.nullable(),
  start_time: z.string(),
  end_time: z.string(),
});

export function toLedgerLine(record: CallRecord): LedgerLine {
  const entry = toToolCall(record);
  return {
    call_id: record.callId,
    caller_id: record.callerId,
    context_id: record.contextId,
    status: record.status,
    duration_ms: record.durationMs,
    ...entry,
    arguments: redactParams(entry.arguments),
  };
}

export class JsonlLedgerSink implements LedgerSink {
  private degraded = false;
  private memoryBuffer: string[] = [];
  private readonly maxBufferSize = 1000;
  private pending: Promise<void> = Promise.resolve();
  private dirReady = false;

  constructor(readonly filePath: string) {}

  write(record: CallRecord): void {
    const line = JSON.stringify(toLedgerLine(record));
    this.pending = this.pending.then(() => this.writeLine(line));
  }

  /** Resolves once every write queued so far has been attempted. */
  flush(): Promise<void> {
    return this.pending;
  }

  isDegraded(): boolean {
    return this.degraded;
  }

  private async writeLine(line: string): Promise<void> {
    try {
      if (!this.dirReady) {
        await mkdir(dirname(this.filePath), { recursive: true });
        this.dirReady = true;
      }
      if (this.memoryBuffer.length > 0) {
        const buffered = this.memoryBuffer.join("\n") + "\n";
        await appendFile(this.filePath, buffered, "utf-8");
        this.memoryBuffer = [];
        this.degraded = false;
        log.info({ file: this.filePath }, "ledger buffer flushed, file writes recovered");
      }
      await appendFile(this.filePath, line + "\n", "utf-8");
    } catch (err) {
      log.error({ err, file: this.filePath }, "ledger write failed, entering degraded mode");
      this.degraded = true;
      this.bufferLine(line);
    }
  }

  private bufferLine(line: string): void {
    if (this.memoryBuffer.length >= this.maxBufferSize) {
      this.memoryBuffer.shift(); // drop oldest
      log.warn({ file: this.filePath }, "ledger buffer full, dropping oldest line");
    }
    this.memoryBuffer.push(line);
  }
}

/** Read a ledger file back. Unparsable lines are skipped. Missing file = []. */
export async function readLedgerFile(filePath: string): Promise<LedgerLine[]> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return [];
    }
    throw err;
  }

  const lines: LedgerLine[] = [];
  for (const raw of content.split("\n")) {
    if (!raw.trim()) continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (parseErr) {
      log.warn({ err: parseErr, file: filePath }, "skipping unparsable ledger line");
      continue;
    }
    const checked = ledgerLineSchema.safeParse(parsed);
    if (!checked.success) {
      log.warn({ file: filePath, issues: checked.error.issues.length }, "skipping malformed ledger line");
      continue;
    }
    lines.push({ ...checked.data, result: checked.data.result ?? null });
  }
  return lines;
}
