import type { Address } from "@loanloop/common";

export type LoanCallback = {
  asset: Address;
  amount: bigint;
  fee: bigint;
  /** Whoever called `borrow`. */
  initiator: Address;
  payload: string;
};

export interface LoanReceiver {
  readonly address: Address;
  /**
   * Invoked by the lender after the funds have moved. Must leave an
   * allowance of `amount + fee` for the lender and return true.
   */
  onLoanReceived(caller: Address, loan: LoanCallback): Promise<boolean>;
}

export type BorrowRequest = {
  recipient: Address;
  asset: Address;
  amount: bigint;
  payload: string;
  referral_code: number;
};

export interface Lender {
  readonly address: Address;
  borrow(caller: Address, request: BorrowRequest): Promise<void>;
  flashFee(asset: Address, amount: bigint): bigint;
  maxFlashLoan(asset: Address): bigint;
}
