import { AsyncLocalStorage } from "node:async_hooks";
import { EventEmitter } from "node:events";

import { LoanLoopError, errorMessage, newTraceId } from "@loanloop/common";
import type { Address } from "@loanloop/common";

import type { ExecutionEvent, RuntimeLog } from "../events.js";
import { logLine } from "../log.js";
import { AsyncMutex } from "./async-mutex.js";

/**
 * State that survives across transactions. `snapshot` captures the current
 * state and returns a function that puts it back.
 */
export interface Snapshottable {
  snapshot(): () => void;
}

export type Clock = () => number;

export type TxReceipt<T> = {
  tx_index: number;
  result: T;
  logs: RuntimeLog[];
};

type TxFrame = {
  tx_index: number;
  logs: RuntimeLog[];
};

const LOG_EVENT = "log";
const SERVICE = "execution/runtime";

export function systemClock(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * Atomic execution substrate. Top-level transactions run one at a time; a
 * transaction that throws leaves every registered participant exactly as it
 * found it and publishes none of its events.
 */
export class Runtime {
  private readonly mutex = new AsyncMutex();
  private readonly scope = new AsyncLocalStorage<TxFrame>();
  private readonly participants: Snapshottable[] = [];
  private readonly emitter = new EventEmitter();
  private readonly clock: Clock;
  private txCount = 0;

  constructor(opts?: { clock?: Clock }) {
    this.clock = opts?.clock ?? systemClock;
  }

  register<T extends Snapshottable>(participant: T): T {
    this.participants.push(participant);
    return participant;
  }

  /** Unix seconds, as seen by the transaction currently running. */
  now(): number {
    return this.clock();
  }

  inTransaction(): boolean {
    return this.scope.getStore() !== undefined;
  }

  /** Entry points that change state call this before touching anything. */
  requireTransaction(operation: string): void {
    if (!this.inTransaction()) {
      throw new LoanLoopError("RUNTIME_NO_TX", `${operation} called outside a transaction`);
    }
  }

  emit(emitter: Address, event: ExecutionEvent): void {
    const frame = this.scope.getStore();
    if (!frame) {
      throw new LoanLoopError("RUNTIME_NO_TX", `event ${event.type} emitted outside a transaction`);
    }
    frame.logs.push({ emitter, event });
  }

  /**
   * Subscribes to committed logs; returns the unsubscribe function. A
   * listener that throws is logged and cannot affect the transaction that
   * produced the log.
   */
  onLog(listener: (log: RuntimeLog) => void): () => void {
    const isolated = (log: RuntimeLog): void => {
      try {
        listener(log);
      } catch (err: unknown) {
        logLine(SERVICE, "error", newTraceId(), "log listener failed", {
          event: log.event.type,
          emitter: log.emitter,
          error: errorMessage(err),
        });
      }
    };
    this.emitter.on(LOG_EVENT, isolated);
    return () => {
      this.emitter.off(LOG_EVENT, isolated);
    };
  }

  async transact<T>(fn: () => Promise<T>): Promise<TxReceipt<T>> {
    if (this.inTransaction()) {
      throw new LoanLoopError("REENTRANT_CALL", "transaction started from inside a transaction");
    }
    return this.mutex.runExclusive(() => this.commit(fn));
  }

  private async commit<T>(fn: () => Promise<T>): Promise<TxReceipt<T>> {
    const restores = this.participants.map((p) => p.snapshot());
    const frame: TxFrame = { tx_index: this.txCount, logs: [] };

    let result: T;
    try {
      result = await this.scope.run(frame, fn);
    } catch (err: unknown) {
      for (let i = restores.length - 1; i >= 0; i -= 1) restores[i]();
      throw err;
    }

    // Committed from here on; publication runs under the lock so logs stay in tx order.
    this.txCount += 1;
    for (const log of frame.logs) this.emitter.emit(LOG_EVENT, log);
    return { tx_index: frame.tx_index, result, logs: frame.logs };
  }
}
