import { LoanLoopError } from "@loanloop/common";

export type OperationPhase = "IDLE" | "AWAITING_CALLBACK" | "EXECUTING";

/**
 * Busy flag of the orchestrator. A venue calling back into `initiate` or the
 * loan callback mid-operation finds the guard out of phase and is rejected.
 */
export class OperationGuard {
  private current: OperationPhase = "IDLE";

  phase(): OperationPhase {
    return this.current;
  }

  /** Moves `from -> to` or throws REENTRANT_CALL. */
  advance(from: OperationPhase, to: OperationPhase): void {
    if (this.current !== from) {
      throw new LoanLoopError(
        "REENTRANT_CALL",
        `operation in phase ${this.current}, expected ${from}`,
        { details: { phase: this.current } },
      );
    }
    this.current = to;
  }

  /** Runs `fn` from IDLE and returns to IDLE on every exit path. */
  async hold<T>(next: OperationPhase, fn: () => Promise<T>): Promise<T> {
    this.advance("IDLE", next);
    try {
      return await fn();
    } finally {
      this.current = "IDLE";
    }
  }
}
