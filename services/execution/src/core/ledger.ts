import { invariant } from "@loanloop/common";

import type { Snapshottable } from "../runtime/runtime.js";

export type LedgerStats = {
  operation_count: number;
  cumulative_profit: bigint;
};

/** Running totals of successful operations. There is no decrement path. */
export class Ledger implements Snapshottable {
  private operationCount = 0;
  private cumulativeProfit = 0n;

  record(profit: bigint): void {
    invariant(profit >= 0n, "ARITHMETIC_UNDERFLOW", "recorded profit must be >= 0");
    this.operationCount += 1;
    this.cumulativeProfit += profit;
  }

  stats(): LedgerStats {
    return {
      operation_count: this.operationCount,
      cumulative_profit: this.cumulativeProfit,
    };
  }

  snapshot(): () => void {
    const { operation_count, cumulative_profit } = this.stats();
    return () => {
      this.operationCount = operation_count;
      this.cumulativeProfit = cumulative_profit;
    };
  }
}
