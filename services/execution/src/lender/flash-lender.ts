import { LoanLoopError, flashLoanFee, invariant, toBps } from "@loanloop/common";
import type { Address } from "@loanloop/common";

import type { ContractRegistry } from "../runtime/registry.js";
import type { Runtime } from "../runtime/runtime.js";
import type { TokenBank } from "../runtime/token-bank.js";
import type { BorrowRequest, Lender } from "./types.js";

export type FlashLenderOptions = {
  address: Address;
  fee_bps: number;
  /** Assets this pool lends; others are refused regardless of balance. */
  assets: Address[];
};

/**
 * Single-asset flash lender: transfer, call back, reclaim principal plus
 * premium through the receiver's allowance. Any failure along the way
 * throws, which aborts the enclosing transaction.
 */
export class FlashLender implements Lender {
  readonly address: Address;
  readonly fee_bps: number;
  private readonly assets: Set<Address>;

  constructor(
    private readonly runtime: Runtime,
    private readonly bank: TokenBank,
    private readonly registry: ContractRegistry,
    opts: FlashLenderOptions,
  ) {
    toBps(opts.fee_bps, "fee_bps");
    this.address = opts.address;
    this.fee_bps = opts.fee_bps;
    this.assets = new Set(opts.assets);
  }

  maxFlashLoan(asset: Address): bigint {
    if (!this.assets.has(asset)) return 0n;
    return this.bank.balanceOf(asset, this.address);
  }

  flashFee(asset: Address, amount: bigint): bigint {
    invariant(this.assets.has(asset), "INSUFFICIENT_LIQUIDITY", `asset not lent: ${asset}`);
    return flashLoanFee(amount, this.fee_bps);
  }

  async borrow(caller: Address, request: BorrowRequest): Promise<void> {
    const { recipient, asset, amount, payload, referral_code } = request;
    this.runtime.requireTransaction("borrow");
    invariant(amount > 0n, "INVALID_AMOUNT", "loan amount must be > 0");
    invariant(
      Number.isInteger(referral_code) && referral_code >= 0 && referral_code <= 0xffff,
      "REQUEST_INVALID",
      `invalid referral code: ${String(referral_code)}`,
    );

    const available = this.maxFlashLoan(asset);
    if (available < amount) {
      throw new LoanLoopError(
        "INSUFFICIENT_LIQUIDITY",
        `lender has ${available.toString()} of ${asset}, asked for ${amount.toString()}`,
        { details: { asset, available, requested: amount } },
      );
    }

    const fee = this.flashFee(asset, amount);
    const receiver = this.registry.receiver(recipient);

    this.bank.transfer(asset, this.address, recipient, amount);
    const ok = await receiver.onLoanReceived(this.address, {
      asset,
      amount,
      fee,
      initiator: caller,
      payload,
    });
    invariant(ok === true, "CALLBACK_FAILED", "loan receiver did not confirm the callback");

    this.bank.transferFrom(asset, this.address, recipient, this.address, amount + fee);

    this.runtime.emit(this.address, {
      type: "FlashLoan",
      receiver: recipient,
      initiator: caller,
      asset,
      amount,
      fee,
      referral_code,
    });
  }
}
