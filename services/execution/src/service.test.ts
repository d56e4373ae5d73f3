import { LoanLoopError, NATIVE_TOKEN } from "@loanloop/common";
import { describe, expect, it } from "vitest";

import {
  BENEFICIARY,
  BORROW,
  FEE,
  ONE,
  OPERATOR,
  OWNER,
  TKA,
  V1,
  V2,
  rejectsWith,
  roundTripPayload,
  scenarioDevnet,
} from "./__fixtures__/scenario.js";
import type { LedgerStats } from "./core/ledger.js";
import { ExecutionService } from "./service.js";
import type { OperationJournal, OperationRecord } from "./storage/postgres.js";
import type { StatsPublisher } from "./storage/redis.js";

class MemoryJournal implements OperationJournal {
  readonly records: OperationRecord[] = [];
  fail = false;

  async record(entry: OperationRecord): Promise<void> {
    if (this.fail) throw new LoanLoopError("PG_INSERT_FAILED", "postgres down");
    this.records.push(entry);
  }
}

class MemoryStats implements StatsPublisher {
  readonly published: LedgerStats[] = [];

  async publish(stats: LedgerStats): Promise<void> {
    this.published.push(stats);
  }
}

function setup() {
  const { devnet } = scenarioDevnet();
  const journal = new MemoryJournal();
  const stats = new MemoryStats();
  const service = new ExecutionService({ devnet, journal, stats });
  return { devnet, journal, stats, service };
}

describe("ExecutionService", () => {
  it("settles an operation, journals it and publishes the ledger", async () => {
    const { journal, stats, service } = setup();
    const outcome = await service.submit(
      OPERATOR,
      { asset: TKA, amount: BORROW, payload: roundTripPayload(5n * 10n ** 17n) },
      "trace-1",
    );

    expect(outcome).toMatchObject({
      trace_id: "trace-1",
      tx_index: 0,
      asset: TKA,
      amount: BORROW,
      fee: FEE,
      profit: 95n * 10n ** 16n,
      beneficiary: BENEFICIARY,
    });
    expect(outcome.swaps.map((s) => [s.venue, s.amount_out])).toEqual([
      [V1, 98n * ONE],
      [V2, 101n * ONE],
    ]);
    expect(journal.records).toHaveLength(1);
    expect(journal.records[0]).toMatchObject({
      trace_id: "trace-1",
      status: "succeeded",
      profit: 95n * 10n ** 16n,
      error_code: null,
    });
    expect(stats.published).toEqual([{ operation_count: 1, cumulative_profit: 95n * 10n ** 16n }]);
  });

  it("journals a reverted operation and rethrows its error", async () => {
    const { journal, stats, service } = setup();
    await rejectsWith(
      service.submit(
        OPERATOR,
        { asset: TKA, amount: BORROW, payload: roundTripPayload(2n * ONE) },
        "trace-2",
      ),
      "INSUFFICIENT_PROFIT",
    );

    expect(journal.records).toEqual([
      {
        trace_id: "trace-2",
        status: "failed",
        asset: TKA,
        amount: BORROW,
        profit: null,
        tx_index: null,
        error_code: "INSUFFICIENT_PROFIT",
        error_message: `ending balance ${101n * ONE} short of ${102n * ONE + FEE} by ${ONE + FEE}`,
        swaps: [],
      },
    ]);
    expect(stats.published).toEqual([]);
  });

  it("keeps a settled result when the journal is down", async () => {
    const { journal, service } = setup();
    journal.fail = true;

    const outcome = await service.submit(OPERATOR, {
      asset: TKA,
      amount: BORROW,
      payload: roundTripPayload(0n),
    });
    expect(outcome.profit).toBe(95n * 10n ** 16n);
    expect(service.stats().operation_count).toBe(1);
  });

  it("runs admin calls as transactions", async () => {
    const { devnet, service } = setup();
    expect(await service.setRouterApproval(OWNER, V2, false)).toBe(true);
    expect(service.routers()).not.toContain(V2);

    devnet.bank.mint(NATIVE_TOKEN, devnet.orchestrator.address, 9n);
    expect(await service.sweep(OWNER, { native: true })).toBe(9n);
    expect(await service.sweep(OWNER, { token: TKA })).toBe(0n);
  });
});
