/**
 * Call Ledger - append-only, ordered call records for one context
 * (typically one chat thread).
 *
 * append() is synchronous, so records from concurrent invocations are
 * added one at a time and readers never see a partial record.
 *
 * A call reserves its id before it runs. close() refuses new
 * reservations, but calls reserved before the close still append.
 */

import { LedgerError } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import type { CallRecord } from "./call-record.js";

const log = createLogger("ledger");

/** Receives each record right after it is appended. */
export interface LedgerSink {
  write(record: CallRecord): void;
}

export interface CallLedgerOptions {
  sinks?: LedgerSink[];
}

export class CallLedger {
  private readonly records: CallRecord[] = [];
  private readonly ids = new Set<string>();
  private readonly sinks: LedgerSink[];
  private readonly inFlight = new Set<string>();
  private waiters: Array<() => void> = [];
  private isClosed = false;

  constructor(
    readonly contextId: string,
    opts: CallLedgerOptions = {},
  ) {
    this.sinks = opts.sinks ?? [];
  }

  /** Claim a call id before running the call. Throws once the ledger is closed. */
  reserve(callId: string): void {
    if (this.isClosed) {
      throw new LedgerError(`Ledger for context '${this.contextId}' is closed`);
    }
    if (this.ids.has(callId) || this.inFlight.has(callId)) {
      throw new LedgerError(`Duplicate call id '${callId}'`);
    }
    this.inFlight.add(callId);
  }

  /** Drop a reservation that will not be appended. No-op after append. */
  release(callId: string): void {
    if (this.inFlight.delete(callId)) this.notifyIfSettled();
  }

  append(record: CallRecord): void {
    if (this.ids.has(record.callId)) {
      throw new LedgerError(`Duplicate call id '${record.callId}'`);
    }
    const reserved = this.inFlight.has(record.callId);
    if (this.isClosed && !reserved) {
      throw new LedgerError(`Ledger for context '${this.contextId}' is closed`);
    }
    this.inFlight.delete(record.callId);
    this.ids.add(record.callId);
    this.records.push(record);

    for (const sink of this.sinks) {
      try {
        sink.write(record);
      } catch (err) {
        // sink failures never undo the append
        log.error({ err, contextId: this.contextId, callId: record.callId }, "ledger sink failed");
      }
    }

    if (reserved) this.notifyIfSettled();
  }

  /** Snapshot in append order. */
  all(): readonly CallRecord[] {
    return Object.freeze(this.records.slice());
  }

  get(callId: string): CallRecord | undefined {
    return this.records.find((r) => r.callId === callId);
  }

  get size(): number {
    return this.records.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Calls reserved but not yet appended. */
  get pending(): number {
    return this.inFlight.size;
  }

  /** Archive the ledger. New calls are refused; calls already running still land. */
  close(): readonly CallRecord[] {
    this.isClosed = true;
    return this.all();
  }

  /** Resolves with every record once no reserved call is outstanding. */
  settled(): Promise<readonly CallRecord[]> {
    if (this.inFlight.size === 0) return Promise.resolve(this.all());
    return new Promise((resolve) => {
      this.waiters.push(() => resolve(this.all()));
    });
  }

  private notifyIfSettled(): void {
    if (this.inFlight.size > 0 || this.waiters.length === 0) return;
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) wake();
  }
}
