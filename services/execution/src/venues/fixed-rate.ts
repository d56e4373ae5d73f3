import { LoanLoopError, getAmountOutAtRate, invariant } from "@loanloop/common";
import type { Address } from "@loanloop/common";

import { RouterVenue } from "./router-venue.js";

export type ExchangeRate = { numerator: bigint; denominator: bigint };

/**
 * Venue quoting each directed pair at a configured rate and paying out of
 * its own inventory. Rates do not move with volume.
 */
export class FixedRateVenue extends RouterVenue {
  private readonly rates = new Map<string, ExchangeRate>();

  setRate(tokenIn: Address, tokenOut: Address, rate: ExchangeRate): void {
    invariant(rate.denominator > 0n, "DEVNET_INVALID", "rate denominator must be > 0");
    invariant(rate.numerator >= 0n, "DEVNET_INVALID", "rate numerator must be >= 0");
    this.rates.set(`${tokenIn}->${tokenOut}`, rate);
  }

  protected quoteHop(amountIn: bigint, tokenIn: Address, tokenOut: Address): bigint {
    const rate = this.rates.get(`${tokenIn}->${tokenOut}`);
    if (!rate) {
      throw new LoanLoopError(
        "PAIR_UNSUPPORTED",
        `${this.name}: no rate for ${tokenIn} -> ${tokenOut}`,
      );
    }
    return getAmountOutAtRate({ amount_in: amountIn, ...rate });
  }
}
