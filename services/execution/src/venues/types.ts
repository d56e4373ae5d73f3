import type { Address } from "@loanloop/common";

export type ExchangeRequest = {
  caller: Address;
  amount_in: bigint;
  min_amount_out: bigint;
  path: readonly Address[];
  recipient: Address;
  deadline: number;
};

/**
 * Router-style exchange. `exchange` draws `amount_in` of `path[0]` from the
 * caller through its allowance and pays at least `min_amount_out` of the
 * last token to `recipient`, or throws. The returned amounts are advisory.
 */
export interface Venue {
  readonly address: Address;
  readonly name: string;
  exchange(request: ExchangeRequest): Promise<bigint[]>;
  getAmountsOut(amountIn: bigint, path: readonly Address[]): Promise<bigint[]>;
}
