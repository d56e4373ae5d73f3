export type ErrorCode =
  | "ENV_MISSING"
  | "ENV_INVALID"
  | "UNAUTHORIZED_CALLBACK"
  | "UNTRUSTED_INITIATOR"
  | "NOT_OWNER"
  | "NOT_OPERATOR"
  | "MALFORMED_PLAN"
  | "INVALID_PATH"
  | "INVALID_AMOUNT"
  | "DEADLINE_EXPIRED"
  | "VENUE_NOT_APPROVED"
  | "VENUE_UNAVAILABLE"
  | "INSUFFICIENT_PROFIT"
  | "SWAP_FAILED"
  | "SWAP_SIM_INVALID"
  | "SLIPPAGE_EXCEEDED"
  | "PAIR_UNSUPPORTED"
  | "INSUFFICIENT_VENUE_LIQUIDITY"
  | "INSUFFICIENT_LIQUIDITY"
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_ALLOWANCE"
  | "CALLBACK_FAILED"
  | "ARITHMETIC_UNDERFLOW"
  | "REENTRANT_CALL"
  | "RUNTIME_NO_TX"
  | "REQUEST_INVALID"
  | "ROUTE_NOT_FOUND"
  | "UNAUTHENTICATED"
  | "INTERNAL_ERROR"
  | "DEVNET_INVALID"
  | "REDIS_CONNECT_FAILED"
  | "REDIS_WRITE_FAILED"
  | "PG_CONNECT_FAILED"
  | "PG_SCHEMA_FAILED"
  | "PG_INSERT_FAILED";

export type ErrorCategory =
  | "authorization"
  | "validation"
  | "economic"
  | "external"
  | "security"
  | "infrastructure";

const CATEGORY_BY_CODE: Record<ErrorCode, ErrorCategory> = {
  ENV_MISSING: "infrastructure",
  ENV_INVALID: "infrastructure",
  UNAUTHORIZED_CALLBACK: "authorization",
  UNTRUSTED_INITIATOR: "authorization",
  NOT_OWNER: "authorization",
  NOT_OPERATOR: "authorization",
  UNAUTHENTICATED: "authorization",
  MALFORMED_PLAN: "validation",
  INVALID_PATH: "validation",
  INVALID_AMOUNT: "validation",
  DEADLINE_EXPIRED: "validation",
  VENUE_NOT_APPROVED: "validation",
  REQUEST_INVALID: "validation",
  ROUTE_NOT_FOUND: "validation",
  INSUFFICIENT_PROFIT: "economic",
  VENUE_UNAVAILABLE: "external",
  SWAP_FAILED: "external",
  SWAP_SIM_INVALID: "external",
  SLIPPAGE_EXCEEDED: "external",
  PAIR_UNSUPPORTED: "external",
  INSUFFICIENT_VENUE_LIQUIDITY: "external",
  INSUFFICIENT_LIQUIDITY: "external",
  INSUFFICIENT_BALANCE: "external",
  INSUFFICIENT_ALLOWANCE: "external",
  CALLBACK_FAILED: "external",
  ARITHMETIC_UNDERFLOW: "security",
  REENTRANT_CALL: "security",
  RUNTIME_NO_TX: "infrastructure",
  INTERNAL_ERROR: "infrastructure",
  DEVNET_INVALID: "infrastructure",
  REDIS_CONNECT_FAILED: "infrastructure",
  REDIS_WRITE_FAILED: "infrastructure",
  PG_CONNECT_FAILED: "infrastructure",
  PG_SCHEMA_FAILED: "infrastructure",
  PG_INSERT_FAILED: "infrastructure",
};

export class LoanLoopError extends Error {
  readonly code: ErrorCode;
  readonly cause?: unknown;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    opts?: { cause?: unknown; details?: Record<string, unknown> },
  ) {
    super(message);
    this.name = "LoanLoopError";
    this.code = code;
    this.cause = opts?.cause;
    this.details = opts?.details;
  }
}

export function errorCategory(code: ErrorCode): ErrorCategory {
  return CATEGORY_BY_CODE[code];
}

export function asLoanLoopError(
  err: unknown,
  fallbackCode: ErrorCode,
  fallbackMessage: string,
): LoanLoopError {
  if (err instanceof LoanLoopError) return err;
  return new LoanLoopError(fallbackCode, fallbackMessage, { cause: err });
}

export function invariant(
  condition: unknown,
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
): asserts condition {
  if (!condition) throw new LoanLoopError(code, message, { details });
}

/** Message of an arbitrary thrown value, for carrying a collaborator's reason verbatim. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
