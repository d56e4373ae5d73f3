import { AbiCoder, isAddress, isHexString } from "ethers";

import type { Address } from "./address.js";
import { LoanLoopError, errorMessage, invariant } from "./errors.js";
import type { ArbitragePlan, SwapStep } from "./plan.js";

export const PLAN_ABI_TYPE =
  "tuple(tuple(address venue,address[] path,uint256 amountIn,uint256 minAmountOut,uint256 deadline)[] swaps,uint256 minProfit,address profitToken)";

export const MAX_PLAN_SWAPS = 16;

const coder = AbiCoder.defaultAbiCoder();

function malformed(message: string, cause?: unknown): LoanLoopError {
  return new LoanLoopError("MALFORMED_PLAN", message, { cause });
}

function asTuple(value: unknown, field: string, size: number): unknown[] {
  if (!Array.isArray(value)) throw malformed(`${field} is not a tuple`);
  if (value.length !== size) {
    throw malformed(`${field} has ${value.length} fields, expected ${size}`);
  }
  return Array.from(value);
}

function asList(value: unknown, field: string): unknown[] {
  if (!Array.isArray(value)) throw malformed(`${field} is not an array`);
  return Array.from(value);
}

function asAddress(value: unknown, field: string): Address {
  if (typeof value !== "string" || !isAddress(value)) {
    throw malformed(`${field} is not an address`);
  }
  return value.toLowerCase();
}

function asUint(value: unknown, field: string): bigint {
  if (typeof value !== "bigint" || value < 0n) {
    throw malformed(`${field} is not a uint256`);
  }
  return value;
}

function asDeadline(value: unknown, field: string): number {
  const raw = asUint(value, field);
  if (raw > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw malformed(`${field} out of range: ${raw.toString()}`);
  }
  return Number(raw);
}

function decodeStep(value: unknown, index: number): SwapStep {
  const field = `swaps[${index}]`;
  const [venue, path, amountIn, minAmountOut, deadline] = asTuple(value, field, 5);
  return Object.freeze({
    venue: asAddress(venue, `${field}.venue`),
    path: Object.freeze(
      asList(path, `${field}.path`).map((token, i) =>
        asAddress(token, `${field}.path[${i}]`),
      ),
    ),
    amount_in: asUint(amountIn, `${field}.amountIn`),
    min_amount_out: asUint(minAmountOut, `${field}.minAmountOut`),
    deadline: asDeadline(deadline, `${field}.deadline`),
  });
}

export function encodePlan(plan: ArbitragePlan): string {
  invariant(
    plan.swaps.length > 0 && plan.swaps.length <= MAX_PLAN_SWAPS,
    "MALFORMED_PLAN",
    `plan must have 1..${MAX_PLAN_SWAPS} swaps`,
  );
  for (const step of plan.swaps) {
    invariant(
      Number.isSafeInteger(step.deadline) && step.deadline >= 0,
      "MALFORMED_PLAN",
      `invalid deadline: ${String(step.deadline)}`,
    );
  }

  try {
    return coder.encode(
      [PLAN_ABI_TYPE],
      [
        [
          plan.swaps.map((step) => [
            step.venue,
            [...step.path],
            step.amount_in,
            step.min_amount_out,
            BigInt(step.deadline),
          ]),
          plan.min_profit,
          plan.profit_token,
        ],
      ],
    );
  } catch (err: unknown) {
    throw malformed(`failed to encode plan: ${errorMessage(err)}`, err);
  }
}

/**
 * Decodes and structurally validates an operation payload. Every failure,
 * including fields the ABI decoder deferred as errors, surfaces as
 * MALFORMED_PLAN.
 */
export function decodePlan(payload: string): ArbitragePlan {
  if (!isHexString(payload) || payload.length <= 2) {
    throw malformed("payload is not a non-empty hex string");
  }

  try {
    const decoded: unknown = coder.decode([PLAN_ABI_TYPE], payload)[0];
    return planFromDecoded(decoded);
  } catch (err: unknown) {
    if (err instanceof LoanLoopError) throw err;
    throw malformed(`failed to decode plan: ${errorMessage(err)}`, err);
  }
}

function planFromDecoded(decoded: unknown): ArbitragePlan {
  const [swaps, minProfit, profitToken] = asTuple(decoded, "plan", 3);
  const steps = asList(swaps, "swaps");
  if (steps.length === 0 || steps.length > MAX_PLAN_SWAPS) {
    throw malformed(`plan must have 1..${MAX_PLAN_SWAPS} swaps, got ${steps.length}`);
  }

  return Object.freeze({
    swaps: Object.freeze(steps.map((step, i) => decodeStep(step, i))),
    min_profit: asUint(minProfit, "minProfit"),
    profit_token: asAddress(profitToken, "profitToken"),
  });
}
