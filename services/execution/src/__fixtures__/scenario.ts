import { LoanLoopError, encodePlan, labelAddress } from "@loanloop/common";
import type { Address, ArbitragePlan, ErrorCode, SwapStep } from "@loanloop/common";
import { expect } from "vitest";

import { createDevnet } from "../devnet.js";
import type { Devnet, DevnetSpec } from "../devnet.js";

export const ONE = 10n ** 18n;
export const NOW = 1_700_000_000;

export const TKA = "0x00000000000000000000000000000000000a0001";
export const TKB = "0x00000000000000000000000000000000000b0001";
export const V1 = "0x0000000000000000000000000000000000001001";
export const V2 = "0x0000000000000000000000000000000000001002";
export const POOL = "0x0000000000000000000000000000000000001003";

export const OWNER = labelAddress("test:owner");
export const OPERATOR = labelAddress("test:operator");
export const BENEFICIARY = labelAddress("test:beneficiary");
export const STRANGER = labelAddress("test:stranger");

export const LENDER_LIQUIDITY = 10_000n * ONE;
export const VENUE_INVENTORY = 10_000n * ONE;
export const BORROW = 100n * ONE;
/** 0.05 % of BORROW. */
export const FEE = 5n * 10n ** 16n;

export type TestClock = { now: number };

/**
 * V1 sells TKA for TKB at 0.98, V2 sells TKB for TKA at 101/98, so
 * 100 TKA -> 98 TKB -> 101 TKA. POOL is a 5000/5000 constant-product pool.
 */
export function scenarioSpec(overrides?: Partial<DevnetSpec>): DevnetSpec {
  return {
    owner: OWNER,
    operator: OPERATOR,
    beneficiary: BENEFICIARY,
    lender: {
      fee_bps: 5,
      liquidity: [{ token: TKA, amount: LENDER_LIQUIDITY }],
    },
    venues: [
      {
        kind: "fixed-rate",
        address: V1,
        name: "v1",
        rates: [{ token_in: TKA, token_out: TKB, numerator: 98n, denominator: 100n }],
        inventory: [{ token: TKB, amount: VENUE_INVENTORY }],
      },
      {
        kind: "fixed-rate",
        address: V2,
        name: "v2",
        rates: [{ token_in: TKB, token_out: TKA, numerator: 101n, denominator: 98n }],
        inventory: [{ token: TKA, amount: VENUE_INVENTORY }],
      },
      {
        kind: "constant-product",
        address: POOL,
        name: "pool",
        fee_bps: 30,
        pools: [{ token_a: TKA, token_b: TKB, reserve_a: 5_000n * ONE, reserve_b: 5_000n * ONE }],
      },
    ],
    allowlist: [V1, V2, POOL],
    ...overrides,
  };
}

export function scenarioDevnet(overrides?: Partial<DevnetSpec>): {
  devnet: Devnet;
  clock: TestClock;
} {
  const clock: TestClock = { now: NOW };
  const devnet = createDevnet(scenarioSpec(overrides), { clock: () => clock.now });
  return { devnet, clock };
}

export function step(overrides: Partial<SwapStep> & Pick<SwapStep, "venue" | "path">): SwapStep {
  return {
    amount_in: BORROW,
    min_amount_out: 0n,
    deadline: NOW + 60,
    ...overrides,
  };
}

/** The two-leg round trip: TKA -> TKB on V1, TKB -> TKA on V2. */
export function roundTripPlan(minProfit: bigint, deadline: number = NOW + 60): ArbitragePlan {
  return {
    swaps: [
      step({ venue: V1, path: [TKA, TKB], amount_in: BORROW, deadline }),
      step({ venue: V2, path: [TKB, TKA], amount_in: 98n * ONE, deadline }),
    ],
    min_profit: minProfit,
    profit_token: TKA,
  };
}

export function roundTripPayload(minProfit: bigint, deadline?: number): string {
  return encodePlan(roundTripPlan(minProfit, deadline));
}

export function balancesOf(devnet: Devnet, holders: Address[]): Record<string, bigint> {
  const out: Record<string, bigint> = {};
  for (const token of [TKA, TKB]) {
    for (const holder of holders) out[`${token}:${holder}`] = devnet.bank.balanceOf(token, holder);
  }
  return out;
}

export async function rejectsWith(
  promise: Promise<unknown>,
  code: ErrorCode,
): Promise<LoanLoopError> {
  try {
    await promise;
  } catch (err: unknown) {
    if (!(err instanceof LoanLoopError)) throw err;
    expect(err.code).toBe(code);
    return err;
  }
  throw new Error(`expected rejection with ${code}`);
}

export function throwsWith(fn: () => unknown, code: ErrorCode): LoanLoopError {
  try {
    fn();
  } catch (err: unknown) {
    if (!(err instanceof LoanLoopError)) throw err;
    expect(err.code).toBe(code);
    return err;
  }
  throw new Error(`expected throw with ${code}`);
}
