import { LoanLoopError, jsonStringify } from "@loanloop/common";
import type { Address, ErrorCode, TraceId } from "@loanloop/common";
import { Pool } from "pg";

import type { SwapExecutedEvent } from "../events.js";

export type OperationStatus = "succeeded" | "failed";

export type OperationRecord = {
  trace_id: TraceId;
  status: OperationStatus;
  asset: Address;
  amount: bigint;
  /** Null when the operation failed. */
  profit: bigint | null;
  tx_index: number | null;
  error_code: ErrorCode | null;
  error_message: string | null;
  swaps: SwapExecutedEvent[];
};

/** Append-only record of every submitted operation, successful or not. */
export interface OperationJournal {
  record(entry: OperationRecord): Promise<void>;
}

export const NULL_JOURNAL: OperationJournal = {
  async record(): Promise<void> {},
};

export function createPgPool(postgresUrl: string): Pool {
  return new Pool({ connectionString: postgresUrl });
}

export async function ensurePgSchema(pool: Pool): Promise<void> {
  try {
    await pool.query(`
      create table if not exists operations (
        id bigserial primary key,
        trace_id uuid not null unique,
        status text not null,
        asset text not null,
        amount numeric(78, 0) not null,
        profit numeric(78, 0),
        tx_index integer,
        error_code text,
        error_message text,
        swaps jsonb not null,
        created_at timestamptz not null default now()
      );
    `);
  } catch (err: unknown) {
    throw new LoanLoopError("PG_SCHEMA_FAILED", "failed to ensure postgres schema", {
      cause: err,
    });
  }
}

function toJsonNoBigInt(value: unknown): unknown {
  return JSON.parse(jsonStringify(value));
}

/** Positional parameters for the insert below, numerics as decimal strings. */
export function operationParams(entry: OperationRecord): unknown[] {
  return [
    entry.trace_id,
    entry.status,
    entry.asset,
    entry.amount.toString(),
    entry.profit === null ? null : entry.profit.toString(),
    entry.tx_index,
    entry.error_code,
    entry.error_message,
    toJsonNoBigInt(entry.swaps),
  ];
}

export async function insertOperation(pool: Pool, entry: OperationRecord): Promise<void> {
  try {
    await pool.query(
      `
      insert into operations (
        trace_id,
        status,
        asset,
        amount,
        profit,
        tx_index,
        error_code,
        error_message,
        swaps
      ) values ($1::uuid, $2, $3, $4::numeric, $5::numeric, $6::integer, $7, $8, $9::jsonb)
      on conflict (trace_id) do nothing;
      `,
      operationParams(entry),
    );
  } catch (err: unknown) {
    throw new LoanLoopError("PG_INSERT_FAILED", "failed to insert operation", { cause: err });
  }
}

export class PgOperationJournal implements OperationJournal {
  constructor(private readonly pool: Pool) {}

  record(entry: OperationRecord): Promise<void> {
    return insertOperation(this.pool, entry);
  }
}
