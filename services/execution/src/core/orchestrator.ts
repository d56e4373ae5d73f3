import { LoanLoopError, decodePlan, estimateFlashLoanProfit, invariant } from "@loanloop/common";
import type { Address, ArbitragePlan, LoanRequest } from "@loanloop/common";

import type { Lender, LoanCallback, LoanReceiver } from "../lender/types.js";
import type { ContractRegistry } from "../runtime/registry.js";
import type { Runtime } from "../runtime/runtime.js";
import type { TokenBank } from "../runtime/token-bank.js";
import type { Ledger, LedgerStats } from "./ledger.js";
import { OperationGuard } from "./operation-guard.js";
import { validateProfit } from "./profit-guard.js";
import type { RouterAllowlist } from "./router-allowlist.js";
import type { SwapPipeline } from "./swap-pipeline.js";

export type OrchestratorDeps = {
  address: Address;
  operator: Address;
  /** Receives the surplus of every successful operation. */
  beneficiary: Address;
  lender: Lender;
  runtime: Runtime;
  bank: TokenBank;
  registry: ContractRegistry;
  allowlist: RouterAllowlist;
  ledger: Ledger;
  pipeline: SwapPipeline;
};

export type SimulationResult = {
  expected_end_balance: bigint;
  amount_owed: bigint;
  flash_fee: bigint;
  /** May be negative. */
  expected_profit: bigint;
  min_profit: bigint;
  profitable: boolean;
  unapproved_venues: Address[];
};

export class LoanOrchestrator implements LoanReceiver {
  readonly address: Address;
  private readonly guard = new OperationGuard();

  constructor(private readonly deps: OrchestratorDeps) {
    this.address = deps.address;
  }

  /** Operator entry point. Everything up to the lender's reclaim happens inside this call. */
  async initiate(caller: Address, request: LoanRequest): Promise<void> {
    const { operator, lender, runtime } = this.deps;
    runtime.requireTransaction("initiate");
    invariant(
      this.guard.phase() === "IDLE",
      "REENTRANT_CALL",
      "initiate called while an operation is in progress",
    );
    invariant(caller === operator, "NOT_OPERATOR", `caller ${caller} is not the operator`);
    invariant(request.amount > 0n, "INVALID_AMOUNT", "loan amount must be > 0");

    await this.guard.hold("AWAITING_CALLBACK", () =>
      lender.borrow(this.address, {
        recipient: this.address,
        asset: request.asset,
        amount: request.amount,
        payload: request.payload,
        referral_code: 0,
      }),
    );
  }

  async onLoanReceived(caller: Address, loan: LoanCallback): Promise<boolean> {
    const { lender, runtime, bank, ledger, pipeline, beneficiary } = this.deps;

    if (caller !== lender.address) {
      throw new LoanLoopError("UNAUTHORIZED_CALLBACK", `callback from ${caller}, expected lender`);
    }
    if (loan.initiator !== this.address) {
      throw new LoanLoopError(
        "UNTRUSTED_INITIATOR",
        `loan initiated by ${loan.initiator}, not by this orchestrator`,
      );
    }
    runtime.requireTransaction("onLoanReceived");
    this.guard.advance("AWAITING_CALLBACK", "EXECUTING");

    const plan = this.decode(loan.asset, loan.payload);
    const startBalance = bank.balanceOf(loan.asset, this.address);

    const swaps = await pipeline.executeAll(plan.swaps);

    const endBalance = bank.balanceOf(loan.asset, this.address);
    const owed = loan.amount + loan.fee;
    const { profit } = validateProfit({
      start_balance: startBalance,
      end_balance: endBalance,
      amount_owed: owed,
      min_profit: plan.min_profit,
    });

    bank.approve(loan.asset, this.address, lender.address, owed);
    ledger.record(profit);
    if (profit > 0n) bank.transfer(loan.asset, this.address, beneficiary, profit);

    runtime.emit(this.address, {
      type: "ArbitrageExecuted",
      asset: loan.asset,
      amount: loan.amount,
      fee: loan.fee,
      profit,
      beneficiary,
      swaps: swaps.length,
    });
    return true;
  }

  stats(): LedgerStats {
    return this.deps.ledger.stats();
  }

  /**
   * Walks the plan over venue quotes without touching state. An estimate
   * only: the real outcome is measured from balances at execution time.
   */
  async simulate(request: LoanRequest): Promise<SimulationResult> {
    const { lender, bank, registry, allowlist } = this.deps;
    const plan = this.decode(request.asset, request.payload);
    const fee = lender.flashFee(request.asset, request.amount);

    const balances = new Map<Address, bigint>([
      [request.asset, bank.balanceOf(request.asset, this.address) + request.amount],
    ]);
    const unapproved = new Set<Address>();

    for (const step of plan.swaps) {
      if (!allowlist.isApproved(step.venue)) unapproved.add(step.venue);
      const amounts = await registry.venue(step.venue).getAmountsOut(step.amount_in, step.path);
      const tokenIn = step.path[0];
      const tokenOut = step.path[step.path.length - 1];
      balances.set(tokenIn, (balances.get(tokenIn) ?? 0n) - step.amount_in);
      balances.set(tokenOut, (balances.get(tokenOut) ?? 0n) + amounts[amounts.length - 1]);
    }

    const end = balances.get(request.asset) ?? 0n;
    const { net_profit } = estimateFlashLoanProfit({
      loan_amount: request.amount,
      expected_return: end,
      flash_fee: fee,
    });

    return {
      expected_end_balance: end,
      amount_owed: request.amount + fee,
      flash_fee: fee,
      expected_profit: net_profit,
      min_profit: plan.min_profit,
      profitable: unapproved.size === 0 && net_profit >= plan.min_profit,
      unapproved_venues: Array.from(unapproved),
    };
  }

  private decode(asset: Address, payload: string): ArbitragePlan {
    const plan = decodePlan(payload);
    if (plan.profit_token !== asset) {
      throw new LoanLoopError(
        "MALFORMED_PLAN",
        `profit token ${plan.profit_token} differs from borrowed asset ${asset}`,
      );
    }
    return plan;
  }
}
