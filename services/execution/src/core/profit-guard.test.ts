import { describe, expect, it } from "vitest";

import { throwsWith } from "../__fixtures__/scenario.js";
import { validateProfit } from "./profit-guard.js";

describe("validateProfit", () => {
  it("accepts exactly owed + minProfit", () => {
    expect(
      validateProfit({ start_balance: 100n, end_balance: 110n, amount_owed: 105n, min_profit: 5n }),
    ).toEqual({ profit: 5n, gross_delta: 10n });
  });

  it("rejects one unit short and reports the shortfall", () => {
    const err = throwsWith(
      () =>
        validateProfit({ start_balance: 100n, end_balance: 109n, amount_owed: 105n, min_profit: 5n }),
      "INSUFFICIENT_PROFIT",
    );
    expect(err.details).toEqual({
      end_balance: 109n,
      amount_owed: 105n,
      min_profit: 5n,
      required: 110n,
      shortfall: 1n,
    });
  });

  it("rejects a loss rather than wrapping it into a profit", () => {
    throwsWith(
      () => validateProfit({ start_balance: 100n, end_balance: 90n, amount_owed: 100n, min_profit: 0n }),
      "INSUFFICIENT_PROFIT",
    );
  });

  it("reports a negative gross delta when the swaps lost value but the floor still holds", () => {
    expect(
      validateProfit({ start_balance: 120n, end_balance: 110n, amount_owed: 100n, min_profit: 0n }),
    ).toEqual({ profit: 10n, gross_delta: -10n });
  });

  it("rejects negative inputs", () => {
    throwsWith(
      () => validateProfit({ start_balance: 0n, end_balance: 10n, amount_owed: 5n, min_profit: -1n }),
      "ARITHMETIC_UNDERFLOW",
    );
  });
});
