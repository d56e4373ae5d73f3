import { describe, expect, it } from "vitest";

import { rejectsWith, throwsWith } from "../__fixtures__/scenario.js";
import { Runtime } from "../runtime/runtime.js";
import { TokenBank } from "../runtime/token-bank.js";
import { ConstantProductVenue } from "./constant-product.js";
import { FixedRateVenue } from "./fixed-rate.js";

const A = "0x00000000000000000000000000000000000000a1";
const B = "0x00000000000000000000000000000000000000b2";
const C = "0x00000000000000000000000000000000000000c3";
const VENUE = "0x0000000000000000000000000000000000001001";
const TRADER = "0x0000000000000000000000000000000000000a11";

function setup() {
  const clock = { now: 100 };
  const runtime = new Runtime({ clock: () => clock.now });
  const bank = runtime.register(new TokenBank());
  bank.mint(A, TRADER, 1_000_000n);
  return { clock, runtime, bank };
}

describe("FixedRateVenue", () => {
  function fixed() {
    const env = setup();
    const venue = new FixedRateVenue(VENUE, "fixed", env.runtime, env.bank);
    venue.setRate(A, B, { numerator: 98n, denominator: 100n });
    env.bank.mint(B, VENUE, 500n);
    return { ...env, venue };
  }

  function exchange(env: ReturnType<typeof fixed>, amountIn: bigint, minOut = 0n, deadline = 100) {
    env.bank.approve(A, TRADER, VENUE, amountIn);
    return env.runtime.transact(() =>
      env.venue.exchange({
        caller: TRADER,
        amount_in: amountIn,
        min_amount_out: minOut,
        path: [A, B],
        recipient: TRADER,
        deadline,
      }),
    );
  }

  it("pays out of inventory at the configured rate", async () => {
    const env = fixed();
    const { result } = await exchange(env, 100n);
    expect(result).toEqual([100n, 98n]);
    expect(env.bank.balanceOf(B, TRADER)).toBe(98n);
    expect(env.bank.balanceOf(A, VENUE)).toBe(100n);
  });

  it("quotes without moving anything", async () => {
    const env = fixed();
    expect(await env.venue.getAmountsOut(1_000n, [A, B])).toEqual([1_000n, 980n]);
    expect(env.bank.balanceOf(B, VENUE)).toBe(500n);
  });

  it("enforces the minimum output", async () => {
    await rejectsWith(exchange(fixed(), 100n, 99n), "SLIPPAGE_EXCEEDED");
  });

  it("refuses to trade outside a transaction", async () => {
    const env = fixed();
    env.bank.approve(A, TRADER, VENUE, 100n);
    await rejectsWith(
      env.venue.exchange({
        caller: TRADER,
        amount_in: 100n,
        min_amount_out: 0n,
        path: [A, B],
        recipient: TRADER,
        deadline: 100,
      }),
      "RUNTIME_NO_TX",
    );
    expect(env.bank.balanceOf(A, TRADER)).toBe(1_000_000n);
    expect(env.bank.balanceOf(B, VENUE)).toBe(500n);
  });

  it("enforces its own deadline", async () => {
    const env = fixed();
    env.clock.now = 101;
    await rejectsWith(exchange(env, 100n), "DEADLINE_EXPIRED");
  });

  it("fails when inventory runs short", async () => {
    await rejectsWith(exchange(fixed(), 1_000n), "INSUFFICIENT_VENUE_LIQUIDITY");
  });

  it("refuses a pair it has no rate for", async () => {
    const env = fixed();
    await rejectsWith(env.venue.getAmountsOut(1n, [B, A]), "PAIR_UNSUPPORTED");
    throwsWith(() => env.venue.setRate(A, C, { numerator: 1n, denominator: 0n }), "DEVNET_INVALID");
  });
});

describe("ConstantProductVenue", () => {
  function pool() {
    const env = setup();
    const venue = env.runtime.register(
      new ConstantProductVenue(VENUE, "cp", env.runtime, env.bank, 30),
    );
    venue.addPool(A, B, 100_000n, 100_000n);
    return { ...env, venue };
  }

  function swap(env: ReturnType<typeof pool>, amountIn: bigint) {
    env.bank.approve(A, TRADER, VENUE, amountIn);
    return env.runtime.transact(() =>
      env.venue.exchange({
        caller: TRADER,
        amount_in: amountIn,
        min_amount_out: 0n,
        path: [A, B],
        recipient: TRADER,
        deadline: 100,
      }),
    );
  }

  it("moves reserves with each swap", async () => {
    const env = pool();
    const { result } = await swap(env, 1_000n);
    expect(result).toEqual([1_000n, 987n]);
    expect(env.venue.reserves(A, B)).toEqual({ reserve_in: 101_000n, reserve_out: 99_013n });
    expect(env.venue.reserves(B, A)).toEqual({ reserve_in: 99_013n, reserve_out: 101_000n });
  });

  it("rolls reserves back with the transaction", async () => {
    const env = pool();
    await expect(
      env.runtime.transact(async () => {
        env.bank.approve(A, TRADER, VENUE, 1_000n);
        await env.venue.exchange({
          caller: TRADER,
          amount_in: 1_000n,
          min_amount_out: 0n,
          path: [A, B],
          recipient: TRADER,
          deadline: 100,
        });
        throw new Error("abort");
      }),
    ).rejects.toThrow("abort");
    expect(env.venue.reserves(A, B)).toEqual({ reserve_in: 100_000n, reserve_out: 100_000n });
    expect(env.bank.balanceOf(A, TRADER)).toBe(1_000_000n);
  });

  it("refuses a duplicate or unknown pool", async () => {
    const env = pool();
    throwsWith(() => env.venue.addPool(B, A, 1n, 1n), "DEVNET_INVALID");
    await rejectsWith(env.venue.getAmountsOut(1n, [A, C]), "PAIR_UNSUPPORTED");
  });
});
