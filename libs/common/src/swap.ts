import { invariant } from "./errors.js";
import { BPS_DENOMINATOR, toBps } from "./fees.js";

export type Reserves = { reserve_in: bigint; reserve_out: bigint };

/** x·y=k output for an exact input, fee taken from the input side. */
export function getAmountOut(opts: {
  amount_in: bigint;
  reserve_in: bigint;
  reserve_out: bigint;
  fee_bps: number;
}): bigint {
  invariant(opts.amount_in > 0n, "SWAP_SIM_INVALID", "amountIn must be > 0");
  invariant(
    opts.reserve_in > 0n && opts.reserve_out > 0n,
    "INSUFFICIENT_VENUE_LIQUIDITY",
    "reserves must be > 0",
  );

  const feeNumer = BPS_DENOMINATOR - toBps(opts.fee_bps, "feeBps");
  const amountInWithFee = opts.amount_in * feeNumer;
  const numerator = amountInWithFee * opts.reserve_out;
  const denominator = opts.reserve_in * BPS_DENOMINATOR + amountInWithFee;
  const amountOut = numerator / denominator;

  invariant(amountOut > 0n, "SWAP_SIM_INVALID", "amountOut must be > 0");
  invariant(
    amountOut < opts.reserve_out,
    "INSUFFICIENT_VENUE_LIQUIDITY",
    "amountOut exceeds reserveOut",
  );
  return amountOut;
}

/** Applies a swap to the reserves it was quoted against. */
export function applySwapToReserves(
  reserves: Reserves,
  amountIn: bigint,
  amountOut: bigint,
): Reserves {
  invariant(amountOut < reserves.reserve_out, "SWAP_SIM_INVALID", "reserveOut exhausted");
  return {
    reserve_in: reserves.reserve_in + amountIn,
    reserve_out: reserves.reserve_out - amountOut,
  };
}

/** Output of a fixed-rate hop: `amountIn * numerator / denominator`. */
export function getAmountOutAtRate(opts: {
  amount_in: bigint;
  numerator: bigint;
  denominator: bigint;
}): bigint {
  invariant(opts.amount_in > 0n, "SWAP_SIM_INVALID", "amountIn must be > 0");
  invariant(opts.denominator > 0n, "SWAP_SIM_INVALID", "rate denominator must be > 0");
  invariant(opts.numerator >= 0n, "SWAP_SIM_INVALID", "rate numerator must be >= 0");
  return (opts.amount_in * opts.numerator) / opts.denominator;
}
