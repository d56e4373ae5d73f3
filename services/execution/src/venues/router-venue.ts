import { LoanLoopError, invariant } from "@loanloop/common";
import type { Address } from "@loanloop/common";

import type { Runtime } from "../runtime/runtime.js";
import type { TokenBank } from "../runtime/token-bank.js";
import type { ExchangeRequest, Venue } from "./types.js";

export abstract class RouterVenue implements Venue {
  constructor(
    readonly address: Address,
    readonly name: string,
    protected readonly runtime: Runtime,
    protected readonly bank: TokenBank,
  ) {}

  /** Output of one hop against current state, without changing it. */
  protected abstract quoteHop(amountIn: bigint, tokenIn: Address, tokenOut: Address): bigint;

  protected applyHop(
    _tokenIn: Address,
    _tokenOut: Address,
    _amountIn: bigint,
    _amountOut: bigint,
  ): void {}

  async getAmountsOut(amountIn: bigint, path: readonly Address[]): Promise<bigint[]> {
    return this.quote(amountIn, path, false);
  }

  async exchange(request: ExchangeRequest): Promise<bigint[]> {
    const { caller, amount_in, min_amount_out, path, recipient, deadline } = request;
    this.runtime.requireTransaction(`${this.name}.exchange`);
    invariant(path.length >= 2, "INVALID_PATH", `${this.name}: path needs at least 2 tokens`);
    invariant(
      this.runtime.now() <= deadline,
      "DEADLINE_EXPIRED",
      `${this.name}: expired at ${deadline}`,
    );

    this.bank.transferFrom(path[0], this.address, caller, this.address, amount_in);
    const amounts = this.quote(amount_in, path, true);
    const amountOut = amounts[amounts.length - 1];
    if (amountOut < min_amount_out) {
      throw new LoanLoopError(
        "SLIPPAGE_EXCEEDED",
        `${this.name}: output ${amountOut.toString()} below minimum ${min_amount_out.toString()}`,
        { details: { amount_out: amountOut, min_amount_out } },
      );
    }

    const tokenOut = path[path.length - 1];
    const inventory = this.bank.balanceOf(tokenOut, this.address);
    invariant(
      inventory >= amountOut,
      "INSUFFICIENT_VENUE_LIQUIDITY",
      `${this.name}: holds ${inventory.toString()} of ${tokenOut}`,
    );
    this.bank.transfer(tokenOut, this.address, recipient, amountOut);
    return amounts;
  }

  private quote(amountIn: bigint, path: readonly Address[], apply: boolean): bigint[] {
    invariant(path.length >= 2, "INVALID_PATH", `${this.name}: path needs at least 2 tokens`);
    invariant(amountIn > 0n, "INVALID_AMOUNT", `${this.name}: amountIn must be > 0`);

    const amounts = [amountIn];
    for (let i = 0; i < path.length - 1; i += 1) {
      const hopIn = amounts[i];
      const hopOut = this.quoteHop(hopIn, path[i], path[i + 1]);
      if (apply) this.applyHop(path[i], path[i + 1], hopIn, hopOut);
      amounts.push(hopOut);
    }
    return amounts;
  }
}
