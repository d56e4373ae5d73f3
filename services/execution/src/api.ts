import { LoanLoopError, asLoanLoopError, errorCategory, normalizeAddress } from "@loanloop/common";
import type { Address, LoanRequest, TraceId } from "@loanloop/common";
import { isHexString } from "ethers";

import { logLine } from "./log.js";
import type { ExecutionService, SweepTarget } from "./service.js";

const SERVICE = "execution/api";

export type Role = "owner" | "operator";

export type Principal = { role: Role; address: Address };

export type ApiRequest = {
  method: string;
  path: string;
  authorization?: string;
  body: unknown;
  trace_id: TraceId;
};

export type ApiResponse = {
  status: number;
  body: Record<string, unknown>;
};

export type ApiKeys = Map<string, Principal>;

export function apiKeys(opts: {
  owner_api_key: string;
  operator_api_key: string;
  owner_addr: Address;
  operator_addr: Address;
}): ApiKeys {
  return new Map<string, Principal>([
    [opts.owner_api_key, { role: "owner", address: opts.owner_addr }],
    [opts.operator_api_key, { role: "operator", address: opts.operator_addr }],
  ]);
}

export function statusForError(err: LoanLoopError): number {
  switch (err.code) {
    case "UNAUTHENTICATED":
      return 401;
    case "ROUTE_NOT_FOUND":
      return 404;
    case "REQUEST_INVALID":
      return 400;
    case "INSUFFICIENT_PROFIT":
      return 409;
    default:
      break;
  }
  switch (errorCategory(err.code)) {
    case "authorization":
      return 403;
    case "validation":
      return 422;
    case "economic":
      return 409;
    case "external":
      return 502;
    case "security":
    case "infrastructure":
      return 500;
  }
}

function ensureBody(value: unknown): Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new LoanLoopError("REQUEST_INVALID", "request body must be a JSON object");
  }
  return value as Record<string, unknown>;
}

function asAddress(value: unknown, field: string): Address {
  if (typeof value !== "string") {
    throw new LoanLoopError("REQUEST_INVALID", `${field} must be an address string`);
  }
  return normalizeAddress(value, field, "REQUEST_INVALID");
}

function asAmount(value: unknown, field: string): bigint {
  if (typeof value !== "string" || !/^[0-9]+$/.test(value)) {
    throw new LoanLoopError("REQUEST_INVALID", `${field} must be a decimal integer string`);
  }
  return BigInt(value);
}

function asBoolean(value: unknown, field: string): boolean {
  if (typeof value !== "boolean") {
    throw new LoanLoopError("REQUEST_INVALID", `${field} must be a boolean`);
  }
  return value;
}

function loanRequest(value: unknown): LoanRequest {
  const body = ensureBody(value);
  const payload = body.payload;
  if (typeof payload !== "string" || !isHexString(payload)) {
    throw new LoanLoopError("REQUEST_INVALID", "payload must be a 0x-prefixed hex string");
  }
  return {
    asset: asAddress(body.asset, "asset"),
    amount: asAmount(body.amount, "amount"),
    payload,
  };
}

function sweepTarget(value: unknown): SweepTarget {
  const body = ensureBody(value);
  if (body.native === true) return { native: true };
  return { token: asAddress(body.token, "token") };
}

function authenticate(keys: ApiKeys, authorization: string | undefined): Principal {
  const match = /^Bearer (.+)$/.exec(authorization ?? "");
  const principal = match ? keys.get(match[1]) : undefined;
  if (!principal) {
    throw new LoanLoopError("UNAUTHENTICATED", "missing or unknown API key");
  }
  return principal;
}

function requireRole(principal: Principal, role: Role): void {
  if (principal.role !== role) {
    throw new LoanLoopError(role === "owner" ? "NOT_OWNER" : "NOT_OPERATOR", `${role} key required`);
  }
}

async function dispatch(
  service: ExecutionService,
  keys: ApiKeys,
  req: ApiRequest,
): Promise<Record<string, unknown>> {
  const route = `${req.method} ${req.path}`;
  if (route === "GET /healthz") return { ok: true };

  const principal = authenticate(keys, req.authorization);

  switch (route) {
    case "GET /stats":
      return { ok: true, stats: service.stats() };
    case "GET /routers":
      return { ok: true, routers: service.routers() };
    case "POST /operations": {
      const outcome = await service.submit(principal.address, loanRequest(req.body), req.trace_id);
      return { ok: true, operation: outcome };
    }
    case "POST /simulate":
      return { ok: true, simulation: await service.simulate(loanRequest(req.body)) };
    case "POST /admin/routers": {
      requireRole(principal, "owner");
      const body = ensureBody(req.body);
      const venue = asAddress(body.venue, "venue");
      const approved = asBoolean(body.approved, "approved");
      const changed = await service.setRouterApproval(principal.address, venue, approved);
      return { ok: true, changed };
    }
    case "POST /admin/sweep": {
      requireRole(principal, "owner");
      const amount = await service.sweep(principal.address, sweepTarget(req.body));
      return { ok: true, amount };
    }
    default:
      throw new LoanLoopError("ROUTE_NOT_FOUND", `no route for ${route}`);
  }
}

/** Transport-free request handling; bigints stay bigints until serialised. */
export async function routeRequest(
  service: ExecutionService,
  keys: ApiKeys,
  req: ApiRequest,
): Promise<ApiResponse> {
  try {
    return { status: 200, body: await dispatch(service, keys, req) };
  } catch (err: unknown) {
    const e = asLoanLoopError(err, "INTERNAL_ERROR", "request failed");
    const status = statusForError(e);
    logLine(SERVICE, status >= 500 ? "error" : "info", req.trace_id, `${req.method} ${req.path} -> ${status}`, {
      code: e.code,
    });
    return {
      status,
      body: { ok: false, code: e.code, message: e.message, details: e.details ?? null },
    };
  }
}
