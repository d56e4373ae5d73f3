import { LoanLoopError, checkedSub, errorMessage } from "@loanloop/common";
import type { Address, ErrorCode, SwapStep } from "@loanloop/common";

import type { ContractRegistry } from "../runtime/registry.js";
import type { Runtime } from "../runtime/runtime.js";
import type { TokenBank } from "../runtime/token-bank.js";
import type { RouterAllowlist } from "./router-allowlist.js";

export type SwapResult = {
  step_index: number;
  venue: Address;
  token_in: Address;
  token_out: Address;
  amount_in: bigint;
  amount_out: bigint;
};

export type SwapPipelineDeps = {
  /** The account whose funds are swapped. */
  self: Address;
  runtime: Runtime;
  bank: TokenBank;
  registry: ContractRegistry;
  allowlist: RouterAllowlist;
};

function stepError(code: ErrorCode, index: number, message: string): LoanLoopError {
  return new LoanLoopError(code, `swap step ${index}: ${message}`, {
    details: { step_index: index },
  });
}

export class SwapPipeline {
  constructor(private readonly deps: SwapPipelineDeps) {}

  async execute(step: SwapStep, index: number): Promise<SwapResult> {
    const { self, runtime, bank, registry, allowlist } = this.deps;

    if (!allowlist.isApproved(step.venue)) {
      throw stepError("VENUE_NOT_APPROVED", index, `venue ${step.venue} is not approved`);
    }
    if (step.path.length < 2) {
      throw stepError("INVALID_PATH", index, `path has ${step.path.length} tokens`);
    }
    const now = runtime.now();
    if (now > step.deadline) {
      throw stepError("DEADLINE_EXPIRED", index, `deadline ${step.deadline} passed at ${now}`);
    }

    const venue = registry.findVenue(step.venue);
    if (!venue) {
      throw stepError("VENUE_UNAVAILABLE", index, `no venue deployed at ${step.venue}`);
    }
    const tokenIn = step.path[0];
    const tokenOut = step.path[step.path.length - 1];

    bank.approve(tokenIn, self, venue.address, step.amount_in);
    const before = bank.balanceOf(tokenOut, self);

    try {
      await venue.exchange({
        caller: self,
        amount_in: step.amount_in,
        min_amount_out: step.min_amount_out,
        path: step.path,
        recipient: self,
        deadline: step.deadline,
      });
    } catch (err: unknown) {
      throw new LoanLoopError(
        "SWAP_FAILED",
        `swap step ${index} at ${venue.name} failed: ${errorMessage(err)}`,
        { cause: err, details: { step_index: index, venue: venue.address } },
      );
    }

    const after = bank.balanceOf(tokenOut, self);
    const drawn = checkedSub(step.amount_in, bank.allowance(tokenIn, self, venue.address), "drawn");
    bank.approve(tokenIn, self, venue.address, 0n);

    // On a cyclic path the drawn input left the same balance the output landed in.
    const amountOut =
      tokenIn === tokenOut
        ? checkedSub(after + drawn, before, "amount out")
        : checkedSub(after, before, "amount out");

    runtime.emit(self, {
      type: "SwapExecuted",
      step_index: index,
      venue: venue.address,
      token_in: tokenIn,
      token_out: tokenOut,
      amount_in: step.amount_in,
      amount_out: amountOut,
    });

    return {
      step_index: index,
      venue: venue.address,
      token_in: tokenIn,
      token_out: tokenOut,
      amount_in: step.amount_in,
      amount_out: amountOut,
    };
  }

  /** Strictly sequential: each step may spend what the previous one produced. */
  async executeAll(steps: readonly SwapStep[]): Promise<SwapResult[]> {
    const results: SwapResult[] = [];
    for (const [index, step] of steps.entries()) {
      results.push(await this.execute(step, index));
    }
    return results;
  }
}
