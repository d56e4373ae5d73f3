import { AbiCoder } from "ethers";
import { describe, expect, it } from "vitest";

import { LoanLoopError } from "./errors.js";
import type { ArbitragePlan } from "./plan.js";
import { MAX_PLAN_SWAPS, decodePlan, encodePlan } from "./plan-codec.js";

const tokenA = "0x00000000000000000000000000000000000000a1";
const tokenB = "0x00000000000000000000000000000000000000b2";
const venue1 = "0x0000000000000000000000000000000000000e01";
const venue2 = "0x0000000000000000000000000000000000000e02";

function plan(): ArbitragePlan {
  return {
    swaps: [
      {
        venue: venue1,
        path: [tokenA, tokenB],
        amount_in: 100n * 10n ** 18n,
        min_amount_out: 97n * 10n ** 18n,
        deadline: 1_700_000_000,
      },
      {
        venue: venue2,
        path: [tokenB, tokenA],
        amount_in: 98n * 10n ** 18n,
        min_amount_out: 100n * 10n ** 18n,
        deadline: 1_700_000_060,
      },
    ],
    min_profit: 5n * 10n ** 17n,
    profit_token: tokenA,
  };
}

function expectCode(fn: () => unknown, code: string): void {
  try {
    fn();
    throw new Error("expected call to throw");
  } catch (err: unknown) {
    expect(err).toBeInstanceOf(LoanLoopError);
    expect((err as LoanLoopError).code).toBe(code);
  }
}

describe("plan-codec", () => {
  it("decodes what it encodes, field for field", () => {
    const decoded = decodePlan(encodePlan(plan()));

    expect(decoded.min_profit).toBe(5n * 10n ** 17n);
    expect(decoded.profit_token).toBe(tokenA);
    expect(decoded.swaps).toHaveLength(2);
    expect(decoded.swaps[1]).toEqual({
      venue: venue2,
      path: [tokenB, tokenA],
      amount_in: 98n * 10n ** 18n,
      min_amount_out: 100n * 10n ** 18n,
      deadline: 1_700_000_060,
    });
  });

  it("returns frozen steps", () => {
    const decoded = decodePlan(encodePlan(plan()));
    expect(Object.isFrozen(decoded.swaps)).toBe(true);
    expect(Object.isFrozen(decoded.swaps[0])).toBe(true);
    expect(Object.isFrozen(decoded.swaps[0].path)).toBe(true);
  });

  it("keeps single-token paths so the pipeline can reject them", () => {
    const short = { ...plan(), swaps: [{ ...plan().swaps[0], path: [tokenA] }] };
    expect(decodePlan(encodePlan(short)).swaps[0].path).toEqual([tokenA]);
  });

  it("rejects payloads that are not hex", () => {
    expectCode(() => decodePlan("not-hex"), "MALFORMED_PLAN");
    expectCode(() => decodePlan("0x"), "MALFORMED_PLAN");
  });

  it("rejects truncated payloads", () => {
    const encoded = encodePlan(plan());
    expectCode(() => decodePlan(encoded.slice(0, 130)), "MALFORMED_PLAN");
  });

  it("rejects a payload with no swaps", () => {
    const empty = AbiCoder.defaultAbiCoder().encode(
      [
        "tuple(tuple(address,address[],uint256,uint256,uint256)[],uint256,address)",
      ],
      [[[], 1n, tokenA]],
    );
    expectCode(() => decodePlan(empty), "MALFORMED_PLAN");
  });

  it("refuses to encode more than the swap limit", () => {
    const step = plan().swaps[0];
    const tooMany = {
      ...plan(),
      swaps: Array.from({ length: MAX_PLAN_SWAPS + 1 }, () => step),
    };
    expectCode(() => encodePlan(tooMany), "MALFORMED_PLAN");
  });

  it("rejects deadlines beyond the safe integer range", () => {
    const huge = AbiCoder.defaultAbiCoder().encode(
      [
        "tuple(tuple(address,address[],uint256,uint256,uint256)[],uint256,address)",
      ],
      [[[[venue1, [tokenA, tokenB], 1n, 1n, 2n ** 60n]], 0n, tokenA]],
    );
    expectCode(() => decodePlan(huge), "MALFORMED_PLAN");
  });
});
