import { LoanLoopError } from "@loanloop/common";
import type { Address } from "@loanloop/common";

import type { LoanReceiver } from "../lender/types.js";
import type { Venue } from "../venues/types.js";

/** What is deployed at which address. Populated once, at devnet start. */
export class ContractRegistry {
  private readonly venues = new Map<Address, Venue>();
  private readonly receivers = new Map<Address, LoanReceiver>();

  registerVenue(venue: Venue): void {
    this.venues.set(venue.address, venue);
  }

  registerReceiver(receiver: LoanReceiver): void {
    this.receivers.set(receiver.address, receiver);
  }

  findVenue(address: Address): Venue | undefined {
    return this.venues.get(address);
  }

  venue(address: Address): Venue {
    const venue = this.venues.get(address);
    if (!venue) {
      throw new LoanLoopError("VENUE_UNAVAILABLE", `no venue deployed at ${address}`);
    }
    return venue;
  }

  receiver(address: Address): LoanReceiver {
    const receiver = this.receivers.get(address);
    if (!receiver) {
      throw new LoanLoopError("CALLBACK_FAILED", `no loan receiver deployed at ${address}`);
    }
    return receiver;
  }
}
