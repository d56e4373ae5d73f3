import { LoanLoopError, checkedSub, invariant } from "@loanloop/common";

export type ProfitCheck = {
  start_balance: bigint;
  end_balance: bigint;
  amount_owed: bigint;
  min_profit: bigint;
};

export type ProfitReport = {
  /** `end_balance - amount_owed`; what is left after the lender is paid. */
  profit: bigint;
  /** `end_balance - start_balance`; negative when the swaps lost value. */
  gross_delta: bigint;
};

/**
 * Accepts iff `end_balance >= amount_owed + min_profit`. No subtraction here
 * may go negative: a wrapped value would let a loss pass as a small profit.
 */
export function validateProfit(check: ProfitCheck): ProfitReport {
  const { start_balance, end_balance, amount_owed, min_profit } = check;
  invariant(
    start_balance >= 0n && end_balance >= 0n && amount_owed >= 0n && min_profit >= 0n,
    "ARITHMETIC_UNDERFLOW",
    "profit check inputs must be >= 0",
  );

  const required = amount_owed + min_profit;
  if (end_balance < required) {
    const shortfall = checkedSub(required, end_balance, "shortfall");
    throw new LoanLoopError(
      "INSUFFICIENT_PROFIT",
      `ending balance ${end_balance.toString()} short of ${required.toString()} by ${shortfall.toString()}`,
      { details: { end_balance, amount_owed, min_profit, required, shortfall } },
    );
  }

  return {
    profit: checkedSub(end_balance, amount_owed, "profit"),
    gross_delta: end_balance - start_balance,
  };
}
