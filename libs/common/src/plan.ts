import type { Address } from "./address.js";

/** One exchange leg. `path[0]` is sold, `path[path.length - 1]` is bought. */
export type SwapStep = {
  readonly venue: Address;
  readonly path: readonly Address[];
  readonly amount_in: bigint;
  readonly min_amount_out: bigint;
  /** Unix seconds; the step executes while `now <= deadline`. */
  readonly deadline: number;
};

export type ArbitragePlan = {
  readonly swaps: readonly SwapStep[];
  /** Denominated in the borrowed asset. */
  readonly min_profit: bigint;
  readonly profit_token: Address;
};

export type LoanRequest = {
  asset: Address;
  amount: bigint;
  /** ABI-encoded ArbitragePlan, 0x-prefixed hex. */
  payload: string;
};
