import { LoanLoopError, invariant } from "@loanloop/common";
import type { Address } from "@loanloop/common";

import type { Snapshottable } from "./runtime.js";

function allowanceKey(token: Address, owner: Address, spender: Address): string {
  return `${token}:${owner}:${spender}`;
}

function copyBalances(
  source: Map<Address, Map<Address, bigint>>,
): Map<Address, Map<Address, bigint>> {
  return new Map(Array.from(source, ([token, holders]) => [token, new Map(holders)]));
}

/**
 * Balances and allowances of every token, keyed by lowercase address. The
 * native currency is held under NATIVE_TOKEN like any other token.
 */
export class TokenBank implements Snapshottable {
  private balances = new Map<Address, Map<Address, bigint>>();
  private allowances = new Map<string, bigint>();

  balanceOf(token: Address, holder: Address): bigint {
    return this.balances.get(token)?.get(holder) ?? 0n;
  }

  mint(token: Address, to: Address, amount: bigint): void {
    invariant(amount >= 0n, "INVALID_AMOUNT", "mint amount must be >= 0");
    this.setBalance(token, to, this.balanceOf(token, to) + amount);
  }

  transfer(token: Address, from: Address, to: Address, amount: bigint): void {
    invariant(amount >= 0n, "INVALID_AMOUNT", "transfer amount must be >= 0");
    const balance = this.balanceOf(token, from);
    if (balance < amount) {
      throw new LoanLoopError(
        "INSUFFICIENT_BALANCE",
        `${from} holds ${balance.toString()} of ${token}, needs ${amount.toString()}`,
        { details: { token, holder: from, balance, required: amount } },
      );
    }
    this.setBalance(token, from, balance - amount);
    this.setBalance(token, to, this.balanceOf(token, to) + amount);
  }

  approve(token: Address, owner: Address, spender: Address, amount: bigint): void {
    invariant(amount >= 0n, "INVALID_AMOUNT", "allowance must be >= 0");
    const key = allowanceKey(token, owner, spender);
    if (amount === 0n) this.allowances.delete(key);
    else this.allowances.set(key, amount);
  }

  allowance(token: Address, owner: Address, spender: Address): bigint {
    return this.allowances.get(allowanceKey(token, owner, spender)) ?? 0n;
  }

  transferFrom(
    token: Address,
    spender: Address,
    from: Address,
    to: Address,
    amount: bigint,
  ): void {
    const allowed = this.allowance(token, from, spender);
    if (allowed < amount) {
      throw new LoanLoopError(
        "INSUFFICIENT_ALLOWANCE",
        `${spender} may draw ${allowed.toString()} of ${token} from ${from}, needs ${amount.toString()}`,
        { details: { token, owner: from, spender, allowance: allowed, required: amount } },
      );
    }
    this.transfer(token, from, to, amount);
    this.approve(token, from, spender, allowed - amount);
  }

  snapshot(): () => void {
    const balances = copyBalances(this.balances);
    const allowances = new Map(this.allowances);
    return () => {
      this.balances = balances;
      this.allowances = allowances;
    };
  }

  private setBalance(token: Address, holder: Address, amount: bigint): void {
    let holders = this.balances.get(token);
    if (!holders) {
      holders = new Map();
      this.balances.set(token, holders);
    }
    if (amount === 0n) holders.delete(holder);
    else holders.set(holder, amount);
  }
}
