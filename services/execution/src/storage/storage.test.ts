import { describe, expect, it } from "vitest";

import { operationParams } from "./postgres.js";
import { STATS_KEY, statsPayload } from "./redis.js";

const ASSET = "0x00000000000000000000000000000000000000a1";
const VENUE = "0x0000000000000000000000000000000000001001";

describe("operation rows", () => {
  it("writes numerics as decimal strings and swaps as plain JSON", () => {
    expect(
      operationParams({
        trace_id: "00000000-0000-4000-8000-000000000001",
        status: "succeeded",
        asset: ASSET,
        amount: 10n ** 20n,
        profit: 95n * 10n ** 16n,
        tx_index: 3,
        error_code: null,
        error_message: null,
        swaps: [
          {
            type: "SwapExecuted",
            step_index: 0,
            venue: VENUE,
            token_in: ASSET,
            token_out: ASSET,
            amount_in: 5n,
            amount_out: 6n,
          },
        ],
      }),
    ).toEqual([
      "00000000-0000-4000-8000-000000000001",
      "succeeded",
      ASSET,
      "100000000000000000000",
      "950000000000000000",
      3,
      null,
      null,
      [
        {
          type: "SwapExecuted",
          step_index: 0,
          venue: VENUE,
          token_in: ASSET,
          token_out: ASSET,
          amount_in: "5",
          amount_out: "6",
        },
      ],
    ]);
  });

  it("leaves profit null for a failed operation", () => {
    const params = operationParams({
      trace_id: "00000000-0000-4000-8000-000000000002",
      status: "failed",
      asset: ASSET,
      amount: 1n,
      profit: null,
      tx_index: null,
      error_code: "INSUFFICIENT_PROFIT",
      error_message: "short",
      swaps: [],
    });
    expect(params.slice(4, 8)).toEqual([null, null, "INSUFFICIENT_PROFIT", "short"]);
  });
});

describe("stats snapshot", () => {
  it("serialises the ledger under the execution key", () => {
    expect(STATS_KEY).toBe("stats:execution");
    expect(
      statsPayload(
        { operation_count: 2, cumulative_profit: 19n * 10n ** 17n },
        new Date("2026-01-02T03:04:05.000Z"),
      ),
    ).toBe(
      '{"operation_count":2,"cumulative_profit":"1900000000000000000","updated_at":"2026-01-02T03:04:05.000Z"}',
    );
  });
});
