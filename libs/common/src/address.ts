import { getAddress, isAddress } from "ethers";

import { LoanLoopError, invariant } from "./errors.js";
import type { ErrorCode } from "./errors.js";

export type Address = string;

export const NATIVE_TOKEN: Address = "0xeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeee";

export function normalizeAddress(
  value: string,
  nameForError: string,
  code: ErrorCode = "ENV_INVALID",
): Address {
  invariant(value.length > 0, code, `missing ${nameForError}`);
  if (!isAddress(value)) {
    throw new LoanLoopError(code, `invalid ${nameForError}: ${value}`);
  }
  return getAddress(value).toLowerCase();
}
