import { LoanLoopError, asLoanLoopError, newTraceId } from "@loanloop/common";
import type { Address, LoanRequest, TraceId } from "@loanloop/common";

import type { LedgerStats } from "./core/ledger.js";
import type { SimulationResult } from "./core/orchestrator.js";
import type { Devnet } from "./devnet.js";
import type { ArbitrageExecutedEvent, RuntimeLog, SwapExecutedEvent } from "./events.js";
import { logLine } from "./log.js";
import type { OperationJournal, OperationRecord } from "./storage/postgres.js";
import type { StatsPublisher } from "./storage/redis.js";

const SERVICE = "execution";

export type OperationOutcome = {
  trace_id: TraceId;
  tx_index: number;
  asset: Address;
  amount: bigint;
  fee: bigint;
  profit: bigint;
  beneficiary: Address;
  swaps: SwapExecutedEvent[];
};

export type SweepTarget = { token: Address } | { native: true };

export type ExecutionServiceDeps = {
  devnet: Devnet;
  journal: OperationJournal;
  stats: StatsPublisher;
};

function swapEvents(logs: RuntimeLog[]): SwapExecutedEvent[] {
  const out: SwapExecutedEvent[] = [];
  for (const { event } of logs) if (event.type === "SwapExecuted") out.push(event);
  return out;
}

function settlement(logs: RuntimeLog[]): ArbitrageExecutedEvent {
  for (const { event } of logs) if (event.type === "ArbitrageExecuted") return event;
  throw new LoanLoopError("INTERNAL_ERROR", "committed operation has no settlement event");
}

/**
 * Process-level client of the orchestrator. Every call runs as one runtime
 * transaction; operations are journaled and the ledger is published after
 * each success.
 */
export class ExecutionService {
  constructor(private readonly deps: ExecutionServiceDeps) {}

  async submit(
    caller: Address,
    request: LoanRequest,
    trace_id: TraceId = newTraceId(),
  ): Promise<OperationOutcome> {
    const { devnet } = this.deps;
    logLine(SERVICE, "info", trace_id, "operation submitted", {
      caller,
      asset: request.asset,
      amount: request.amount,
    });

    let outcome: OperationOutcome;
    try {
      const receipt = await devnet.runtime.transact(() =>
        devnet.orchestrator.initiate(caller, request),
      );
      const settled = settlement(receipt.logs);
      outcome = {
        trace_id,
        tx_index: receipt.tx_index,
        asset: settled.asset,
        amount: settled.amount,
        fee: settled.fee,
        profit: settled.profit,
        beneficiary: settled.beneficiary,
        swaps: swapEvents(receipt.logs),
      };
    } catch (err: unknown) {
      const e = asLoanLoopError(err, "INTERNAL_ERROR", "operation failed");
      logLine(SERVICE, "warn", trace_id, `operation reverted: ${e.message}`, {
        code: e.code,
        details: e.details,
      });
      await this.journal({
        trace_id,
        status: "failed",
        asset: request.asset,
        amount: request.amount,
        profit: null,
        tx_index: null,
        error_code: e.code,
        error_message: e.message,
        swaps: [],
      });
      throw e;
    }

    logLine(SERVICE, "info", trace_id, "operation settled", {
      tx_index: outcome.tx_index,
      profit: outcome.profit,
      fee: outcome.fee,
      swaps: outcome.swaps.length,
    });
    await this.journal({
      trace_id,
      status: "succeeded",
      asset: outcome.asset,
      amount: outcome.amount,
      profit: outcome.profit,
      tx_index: outcome.tx_index,
      error_code: null,
      error_message: null,
      swaps: outcome.swaps,
    });
    await this.publishStats(trace_id);
    return outcome;
  }

  async simulate(request: LoanRequest): Promise<SimulationResult> {
    return this.deps.devnet.orchestrator.simulate(request);
  }

  async setRouterApproval(caller: Address, venue: Address, approved: boolean): Promise<boolean> {
    const { devnet } = this.deps;
    const trace_id = newTraceId();
    const { result } = await devnet.runtime.transact(async () =>
      devnet.admin.setRouterApproval(caller, venue, approved),
    );
    logLine(SERVICE, "info", trace_id, "router approval", { venue, approved, changed: result });
    return result;
  }

  async sweep(caller: Address, target: SweepTarget): Promise<bigint> {
    const { devnet } = this.deps;
    const trace_id = newTraceId();
    const { result } = await devnet.runtime.transact(async () =>
      "native" in target
        ? devnet.admin.sweepNative(caller)
        : devnet.admin.sweepToken(caller, target.token),
    );
    logLine(SERVICE, "info", trace_id, "sweep", { target, amount: result });
    return result;
  }

  stats(): LedgerStats {
    return this.deps.devnet.orchestrator.stats();
  }

  routers(): Address[] {
    return this.deps.devnet.allowlist.list();
  }

  // Storage trails the committed state; a failed write is logged, the
  // operation's result stands.
  private async journal(entry: OperationRecord): Promise<void> {
    try {
      await this.deps.journal.record(entry);
    } catch (err: unknown) {
      const e = asLoanLoopError(err, "PG_INSERT_FAILED", "journal write failed");
      logLine(SERVICE, "error", entry.trace_id, e.message, { code: e.code });
    }
  }

  private async publishStats(trace_id: TraceId): Promise<void> {
    try {
      await this.deps.stats.publish(this.stats());
    } catch (err: unknown) {
      const e = asLoanLoopError(err, "REDIS_WRITE_FAILED", "stats publish failed");
      logLine(SERVICE, "error", trace_id, e.message, { code: e.code });
    }
  }
}
