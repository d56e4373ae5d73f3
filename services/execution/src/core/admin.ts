import { NATIVE_TOKEN, invariant } from "@loanloop/common";
import type { Address } from "@loanloop/common";

import type { Runtime } from "../runtime/runtime.js";
import type { TokenBank } from "../runtime/token-bank.js";
import type { RouterAllowlist } from "./router-allowlist.js";

export type AdminSurfaceDeps = {
  owner: Address;
  /** The orchestrator whose balances are swept. */
  self: Address;
  runtime: Runtime;
  bank: TokenBank;
  allowlist: RouterAllowlist;
};

/** Owner-only maintenance paths. None of them touch an operation's logic. */
export class AdminSurface {
  constructor(private readonly deps: AdminSurfaceDeps) {}

  setRouterApproval(caller: Address, venue: Address, approved: boolean): boolean {
    this.deps.runtime.requireTransaction("setRouterApproval");
    const changed = this.deps.allowlist.setApproval(caller, venue, approved);
    if (changed) {
      this.deps.runtime.emit(this.deps.self, { type: "RouterApprovalChanged", venue, approved });
    }
    return changed;
  }

  /** Moves the orchestrator's whole balance of `token` to the owner. */
  sweepToken(caller: Address, token: Address): bigint {
    const { owner, self, runtime, bank } = this.deps;
    runtime.requireTransaction("sweepToken");
    invariant(caller === owner, "NOT_OWNER", `caller ${caller} is not the owner`);

    const amount = bank.balanceOf(token, self);
    if (amount === 0n) return 0n;
    bank.transfer(token, self, owner, amount);
    runtime.emit(self, { type: "Swept", token, to: owner, amount });
    return amount;
  }

  sweepNative(caller: Address): bigint {
    return this.sweepToken(caller, NATIVE_TOKEN);
  }
}
