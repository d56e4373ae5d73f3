import crypto from "node:crypto";

import { getAddress, id } from "ethers";

export type TraceId = string;

export function newTraceId(): TraceId {
  return crypto.randomUUID();
}

/**
 * Deterministic address for a devnet participant, taken from the last 20
 * bytes of keccak256(label).
 */
export function labelAddress(label: string): string {
  const hash = id(label);
  return getAddress(`0x${hash.slice(-40)}`).toLowerCase();
}
