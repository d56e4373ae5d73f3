import fs from "node:fs/promises";

import { LoanLoopError, normalizeAddress } from "@loanloop/common";
import type { Address } from "@loanloop/common";
import { isAddress, parseUnits } from "ethers";

import type { DevnetSpec, TokenAmount, VenueSpec } from "./devnet.js";

export type TokenInfo = {
  symbol: string;
  address: Address;
  decimals: number;
};

export type DevnetPrincipals = {
  owner: Address;
  operator: Address;
  beneficiary?: Address;
};

export type DevnetFile = {
  spec: DevnetSpec;
  tokens: Map<string, TokenInfo>;
};

function ensureObject(value: unknown, field: string): Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new LoanLoopError("DEVNET_INVALID", `devnet.${field} is not an object`);
  }
  return value as Record<string, unknown>;
}

function asArray(value: unknown, field: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new LoanLoopError("DEVNET_INVALID", `devnet.${field} is not an array`);
  }
  return value;
}

function asString(value: unknown, field: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new LoanLoopError("DEVNET_INVALID", `devnet.${field} not a string`);
  }
  return value;
}

function asNumber(value: unknown, field: string): number {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new LoanLoopError("DEVNET_INVALID", `devnet.${field} not an integer`);
  }
  return value;
}

function asBigInt(value: unknown, field: string): bigint {
  if (typeof value === "number" && Number.isSafeInteger(value)) return BigInt(value);
  if (typeof value === "string" && /^[0-9]+$/.test(value)) return BigInt(value);
  throw new LoanLoopError("DEVNET_INVALID", `devnet.${field} not an integer string`);
}

function asAddress(value: unknown, field: string): Address {
  return normalizeAddress(asString(value, field), `devnet.${field}`, "DEVNET_INVALID");
}

class TokenTable {
  constructor(readonly bySymbol: Map<string, TokenInfo>) {}

  resolve(value: unknown, field: string): TokenInfo {
    const symbol = asString(value, field);
    const token = this.bySymbol.get(symbol);
    if (!token) {
      throw new LoanLoopError("DEVNET_INVALID", `devnet.${field}: unknown token ${symbol}`);
    }
    return token;
  }

  /** Human amount ("1.5") in the token's smallest unit. */
  amount(token: TokenInfo, value: unknown, field: string): bigint {
    const text = asString(value, field);
    try {
      return parseUnits(text, token.decimals);
    } catch (err: unknown) {
      throw new LoanLoopError("DEVNET_INVALID", `devnet.${field}: invalid amount ${text}`, {
        cause: err,
      });
    }
  }

  amounts(value: unknown, field: string): TokenAmount[] {
    const obj = ensureObject(value, field);
    return Object.entries(obj).map(([symbol, raw]) => {
      const token = this.resolve(symbol, `${field}.${symbol}`);
      return { token: token.address, amount: this.amount(token, raw, `${field}.${symbol}`) };
    });
  }
}

function parseTokens(value: unknown): TokenTable {
  const obj = ensureObject(value, "tokens");
  const bySymbol = new Map<string, TokenInfo>();
  for (const [symbol, raw] of Object.entries(obj)) {
    const entry = ensureObject(raw, `tokens.${symbol}`);
    const decimals = asNumber(entry.decimals, `tokens.${symbol}.decimals`);
    if (decimals < 0 || decimals > 36) {
      throw new LoanLoopError("DEVNET_INVALID", `devnet.tokens.${symbol}.decimals out of range`);
    }
    bySymbol.set(symbol, {
      symbol,
      address: asAddress(entry.address, `tokens.${symbol}.address`),
      decimals,
    });
  }
  return new TokenTable(bySymbol);
}

function parseVenue(raw: unknown, index: number, tokens: TokenTable): VenueSpec {
  const field = `venues[${index}]`;
  const obj = ensureObject(raw, field);
  const kind = asString(obj.kind, `${field}.kind`);
  const address = asAddress(obj.address, `${field}.address`);
  const name = asString(obj.name, `${field}.name`);

  if (kind === "fixed-rate") {
    const rates = asArray(obj.rates, `${field}.rates`).map((r, i) => {
      const rate = ensureObject(r, `${field}.rates[${i}]`);
      return {
        token_in: tokens.resolve(rate.in, `${field}.rates[${i}].in`).address,
        token_out: tokens.resolve(rate.out, `${field}.rates[${i}].out`).address,
        numerator: asBigInt(rate.numerator, `${field}.rates[${i}].numerator`),
        denominator: asBigInt(rate.denominator, `${field}.rates[${i}].denominator`),
      };
    });
    return {
      kind,
      address,
      name,
      rates,
      inventory: tokens.amounts(obj.inventory ?? {}, `${field}.inventory`),
    };
  }

  if (kind === "constant-product") {
    const pools = asArray(obj.pools, `${field}.pools`).map((p, i) => {
      const pool = ensureObject(p, `${field}.pools[${i}]`);
      const pair = asArray(pool.tokens, `${field}.pools[${i}].tokens`);
      const reserves = asArray(pool.reserves, `${field}.pools[${i}].reserves`);
      if (pair.length !== 2 || reserves.length !== 2) {
        throw new LoanLoopError(
          "DEVNET_INVALID",
          `devnet.${field}.pools[${i}] needs two tokens and two reserves`,
        );
      }
      const a = tokens.resolve(pair[0], `${field}.pools[${i}].tokens[0]`);
      const b = tokens.resolve(pair[1], `${field}.pools[${i}].tokens[1]`);
      return {
        token_a: a.address,
        token_b: b.address,
        reserve_a: tokens.amount(a, reserves[0], `${field}.pools[${i}].reserves[0]`),
        reserve_b: tokens.amount(b, reserves[1], `${field}.pools[${i}].reserves[1]`),
      };
    });
    return {
      kind,
      address,
      name,
      fee_bps: obj.fee_bps === undefined ? undefined : asNumber(obj.fee_bps, `${field}.fee_bps`),
      pools,
    };
  }

  throw new LoanLoopError("DEVNET_INVALID", `devnet.${field}.kind unknown: ${kind}`);
}

/**
 * Turns a devnet description (tokens by symbol, human amounts) into a
 * DevnetSpec. Allowlist entries name a venue by `name` or address.
 */
export function parseDevnetFile(raw: unknown, principals: DevnetPrincipals): DevnetFile {
  const root = ensureObject(raw, "root");
  const tokens = parseTokens(root.tokens);

  const lenderObj = ensureObject(root.lender, "lender");
  const venues = asArray(root.venues, "venues").map((v, i) => parseVenue(v, i, tokens));
  const byName = new Map(venues.map((v) => [v.name, v.address]));

  const allowlist = asArray(root.allowlist ?? [], "allowlist").map((entry, i) => {
    const ref = asString(entry, `allowlist[${i}]`);
    const named = byName.get(ref);
    if (named) return named;
    if (isAddress(ref)) return asAddress(ref, `allowlist[${i}]`);
    throw new LoanLoopError("DEVNET_INVALID", `devnet.allowlist[${i}]: unknown venue ${ref}`);
  });

  const spec: DevnetSpec = {
    owner: principals.owner,
    operator: principals.operator,
    beneficiary: principals.beneficiary,
    orchestrator:
      root.orchestrator === undefined ? undefined : asAddress(root.orchestrator, "orchestrator"),
    lender: {
      address: lenderObj.address === undefined ? undefined : asAddress(lenderObj.address, "lender.address"),
      fee_bps: lenderObj.fee_bps === undefined ? undefined : asNumber(lenderObj.fee_bps, "lender.fee_bps"),
      liquidity: tokens.amounts(lenderObj.liquidity, "lender.liquidity"),
    },
    venues,
    allowlist,
  };

  return { spec, tokens: tokens.bySymbol };
}

export async function loadDevnetFile(
  filePath: string,
  principals: DevnetPrincipals,
): Promise<DevnetFile> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (err: unknown) {
    throw new LoanLoopError("DEVNET_INVALID", `failed to read devnet file ${filePath}`, {
      cause: err,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err: unknown) {
    throw new LoanLoopError("DEVNET_INVALID", `devnet file ${filePath} is not JSON`, {
      cause: err,
    });
  }
  return parseDevnetFile(raw, principals);
}
