import { describe, expect, it } from "vitest";

import { LoanLoopError } from "./errors.js";
import {
  applyFeeBps,
  checkedSub,
  estimateFlashLoanProfit,
  flashLoanFee,
  totalRepayment,
} from "./fees.js";
import { getAmountOut, getAmountOutAtRate } from "./swap.js";

const ONE = 10n ** 18n;

describe("fees", () => {
  it("charges 0.05 % on a 100 unit loan", () => {
    expect(flashLoanFee(100n * ONE, 5)).toBe(5n * 10n ** 16n);
    expect(totalRepayment(100n * ONE, 5)).toBe(100n * ONE + 5n * 10n ** 16n);
  });

  it("rounds the fee down", () => {
    expect(flashLoanFee(1_999n, 5)).toBe(0n);
    expect(flashLoanFee(2_000n, 5)).toBe(1n);
  });

  it("rejects fee bps outside 0..10000", () => {
    expect(() => flashLoanFee(1n, 10_001)).toThrow(LoanLoopError);
    expect(() => flashLoanFee(1n, 0.5)).toThrow(LoanLoopError);
  });

  it("applies a venue fee to the input", () => {
    expect(applyFeeBps(10_000n, 30)).toBe(9_970n);
  });

  it("estimates gross and net profit", () => {
    expect(
      estimateFlashLoanProfit({
        loan_amount: 100n * ONE,
        expected_return: 101n * ONE,
        flash_fee: flashLoanFee(100n * ONE, 5),
      }),
    ).toEqual({
      gross_profit: ONE,
      net_profit: 95n * 10n ** 16n,
      flash_fee: 5n * 10n ** 16n,
    });
  });

  it("reports a loss as a negative net profit", () => {
    const est = estimateFlashLoanProfit({ loan_amount: 100n, expected_return: 100n, flash_fee: 1n });
    expect(est.net_profit).toBe(-1n);
  });

  it("fails checked subtraction instead of wrapping", () => {
    expect(checkedSub(5n, 3n, "x")).toBe(2n);
    try {
      checkedSub(1n, 2n, "balance");
      throw new Error("expected checkedSub to throw");
    } catch (err: unknown) {
      expect((err as LoanLoopError).code).toBe("ARITHMETIC_UNDERFLOW");
    }
  });
});

describe("swap math", () => {
  it("quotes a constant-product hop with a 0.30 % fee", () => {
    expect(
      getAmountOut({ amount_in: 1_000n, reserve_in: 100_000n, reserve_out: 100_000n, fee_bps: 30 }),
    ).toBe(987n);
  });

  it("refuses empty pools", () => {
    try {
      getAmountOut({ amount_in: 1n, reserve_in: 0n, reserve_out: 10n, fee_bps: 30 });
      throw new Error("expected getAmountOut to throw");
    } catch (err: unknown) {
      expect((err as LoanLoopError).code).toBe("INSUFFICIENT_VENUE_LIQUIDITY");
    }
  });

  it("quotes a fixed-rate hop", () => {
    expect(getAmountOutAtRate({ amount_in: 98n * ONE, numerator: 101n, denominator: 98n })).toBe(
      101n * ONE,
    );
  });
});
