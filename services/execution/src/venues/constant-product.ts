import {
  DEFAULT_VENUE_FEE_BPS,
  LoanLoopError,
  applySwapToReserves,
  getAmountOut,
  invariant,
} from "@loanloop/common";
import type { Address } from "@loanloop/common";

import type { Runtime, Snapshottable } from "../runtime/runtime.js";
import type { TokenBank } from "../runtime/token-bank.js";
import { RouterVenue } from "./router-venue.js";

type Pool = { token0: Address; token1: Address; reserve0: bigint; reserve1: bigint };

function pairKey(a: Address, b: Address): string {
  return a < b ? `${a}:${b}` : `${b}:${a}`;
}

/** x·y=k pools behind one router; reserves move with every swap. */
export class ConstantProductVenue extends RouterVenue implements Snapshottable {
  private pools = new Map<string, Pool>();

  constructor(
    address: Address,
    name: string,
    runtime: Runtime,
    bank: TokenBank,
    readonly fee_bps: number = DEFAULT_VENUE_FEE_BPS,
  ) {
    super(address, name, runtime, bank);
  }

  /** Registers a pool and mints its reserves into the venue's inventory. */
  addPool(tokenA: Address, tokenB: Address, reserveA: bigint, reserveB: bigint): void {
    invariant(tokenA !== tokenB, "DEVNET_INVALID", "pool tokens must differ");
    invariant(reserveA > 0n && reserveB > 0n, "DEVNET_INVALID", "pool reserves must be > 0");
    const key = pairKey(tokenA, tokenB);
    invariant(!this.pools.has(key), "DEVNET_INVALID", `duplicate pool ${key}`);

    const [token0, token1] = tokenA < tokenB ? [tokenA, tokenB] : [tokenB, tokenA];
    const [reserve0, reserve1] = tokenA < tokenB ? [reserveA, reserveB] : [reserveB, reserveA];
    this.pools.set(key, { token0, token1, reserve0, reserve1 });
    this.bank.mint(tokenA, this.address, reserveA);
    this.bank.mint(tokenB, this.address, reserveB);
  }

  reserves(tokenIn: Address, tokenOut: Address): { reserve_in: bigint; reserve_out: bigint } {
    const pool = this.pool(tokenIn, tokenOut);
    return tokenIn === pool.token0
      ? { reserve_in: pool.reserve0, reserve_out: pool.reserve1 }
      : { reserve_in: pool.reserve1, reserve_out: pool.reserve0 };
  }

  protected quoteHop(amountIn: bigint, tokenIn: Address, tokenOut: Address): bigint {
    return getAmountOut({ amount_in: amountIn, ...this.reserves(tokenIn, tokenOut), fee_bps: this.fee_bps });
  }

  protected applyHop(tokenIn: Address, tokenOut: Address, amountIn: bigint, amountOut: bigint): void {
    const pool = this.pool(tokenIn, tokenOut);
    const next = applySwapToReserves(this.reserves(tokenIn, tokenOut), amountIn, amountOut);
    const updated =
      tokenIn === pool.token0
        ? { ...pool, reserve0: next.reserve_in, reserve1: next.reserve_out }
        : { ...pool, reserve0: next.reserve_out, reserve1: next.reserve_in };
    this.pools.set(pairKey(tokenIn, tokenOut), updated);
  }

  snapshot(): () => void {
    const pools = new Map(this.pools);
    return () => {
      this.pools = pools;
    };
  }

  private pool(tokenIn: Address, tokenOut: Address): Pool {
    const pool = this.pools.get(pairKey(tokenIn, tokenOut));
    if (!pool) {
      throw new LoanLoopError(
        "PAIR_UNSUPPORTED",
        `${this.name}: no pool for ${tokenIn} / ${tokenOut}`,
      );
    }
    return pool;
  }
}
