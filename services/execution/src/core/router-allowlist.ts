import { invariant } from "@loanloop/common";
import type { Address } from "@loanloop/common";

import type { Snapshottable } from "../runtime/runtime.js";

/** Venues permitted to draw funds from the orchestrator. Owner-mutated. */
export class RouterAllowlist implements Snapshottable {
  private approved: Set<Address>;

  constructor(
    private readonly owner: Address,
    seed: Iterable<Address> = [],
  ) {
    this.approved = new Set(seed);
  }

  /** Returns whether the stored value changed. */
  setApproval(caller: Address, venue: Address, approved: boolean): boolean {
    invariant(caller === this.owner, "NOT_OWNER", `caller ${caller} is not the owner`);
    if (this.approved.has(venue) === approved) return false;
    if (approved) this.approved.add(venue);
    else this.approved.delete(venue);
    return true;
  }

  isApproved(venue: Address): boolean {
    return this.approved.has(venue);
  }

  list(): Address[] {
    return Array.from(this.approved).sort();
  }

  snapshot(): () => void {
    const approved = new Set(this.approved);
    return () => {
      this.approved = approved;
    };
  }
}
