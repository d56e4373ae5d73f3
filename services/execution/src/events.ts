import type { Address } from "@loanloop/common";

export type SwapExecutedEvent = {
  type: "SwapExecuted";
  step_index: number;
  venue: Address;
  token_in: Address;
  token_out: Address;
  amount_in: bigint;
  amount_out: bigint;
};

export type ArbitrageExecutedEvent = {
  type: "ArbitrageExecuted";
  asset: Address;
  amount: bigint;
  fee: bigint;
  profit: bigint;
  beneficiary: Address;
  swaps: number;
};

export type FlashLoanEvent = {
  type: "FlashLoan";
  receiver: Address;
  initiator: Address;
  asset: Address;
  amount: bigint;
  fee: bigint;
  referral_code: number;
};

export type RouterApprovalChangedEvent = {
  type: "RouterApprovalChanged";
  venue: Address;
  approved: boolean;
};

export type SweptEvent = {
  type: "Swept";
  token: Address;
  to: Address;
  amount: bigint;
};

export type ExecutionEvent =
  | SwapExecutedEvent
  | ArbitrageExecutedEvent
  | FlashLoanEvent
  | RouterApprovalChangedEvent
  | SweptEvent;

export type RuntimeLog = {
  emitter: Address;
  event: ExecutionEvent;
};
