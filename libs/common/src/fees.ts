import { LoanLoopError, invariant } from "./errors.js";

export const BPS_DENOMINATOR = 10_000n;

/** Typical lender premium, 0.05 %. */
export const DEFAULT_FLASH_FEE_BPS = 5;

/** Typical constant-product venue fee per hop, 0.30 %. */
export const DEFAULT_VENUE_FEE_BPS = 30;

export function toBps(value: number, field: string): bigint {
  if (!Number.isInteger(value) || value < 0 || value > 10_000) {
    throw new LoanLoopError("ENV_INVALID", `invalid ${field}: ${String(value)}`);
  }
  return BigInt(value);
}

/** `a - b`, failing instead of going negative. */
export function checkedSub(a: bigint, b: bigint, what: string): bigint {
  if (b > a) {
    throw new LoanLoopError(
      "ARITHMETIC_UNDERFLOW",
      `${what}: ${a.toString()} - ${b.toString()} underflows`,
    );
  }
  return a - b;
}

export function flashLoanFee(amount: bigint, feeBps: number): bigint {
  invariant(amount >= 0n, "INVALID_AMOUNT", "amount must be >= 0");
  return (amount * toBps(feeBps, "feeBps")) / BPS_DENOMINATOR;
}

export function totalRepayment(amount: bigint, feeBps: number): bigint {
  return amount + flashLoanFee(amount, feeBps);
}

export function applyFeeBps(amountIn: bigint, feeBps: number): bigint {
  invariant(amountIn >= 0n, "SWAP_SIM_INVALID", "amountIn must be >= 0");
  const fee = toBps(feeBps, "feeBps");
  return (amountIn * (BPS_DENOMINATOR - fee)) / BPS_DENOMINATOR;
}

export type ProfitEstimate = {
  gross_profit: bigint;
  net_profit: bigint;
  flash_fee: bigint;
};

/**
 * Planner-side estimate: gross is return minus principal, net also pays the
 * lender. Both may be negative.
 */
export function estimateFlashLoanProfit(opts: {
  loan_amount: bigint;
  expected_return: bigint;
  flash_fee: bigint;
}): ProfitEstimate {
  const gross_profit = opts.expected_return - opts.loan_amount;
  return {
    gross_profit,
    net_profit: gross_profit - opts.flash_fee,
    flash_fee: opts.flash_fee,
  };
}
