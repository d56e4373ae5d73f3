import { LoanLoopError, jsonStringify } from "@loanloop/common";
import { createClient } from "redis";

import type { LedgerStats } from "../core/ledger.js";

export type RedisClient = ReturnType<typeof createClient>;

export const STATS_KEY = "stats:execution";

export interface StatsPublisher {
  publish(stats: LedgerStats): Promise<void>;
}

export const NULL_STATS: StatsPublisher = {
  async publish(): Promise<void> {},
};

export function statsPayload(stats: LedgerStats, updatedAt: Date): string {
  return jsonStringify({ ...stats, updated_at: updatedAt.toISOString() });
}

export async function writeLedgerStats(redis: RedisClient, stats: LedgerStats): Promise<void> {
  try {
    await redis.set(STATS_KEY, statsPayload(stats, new Date()));
  } catch (err: unknown) {
    throw new LoanLoopError("REDIS_WRITE_FAILED", "failed to write ledger stats", {
      cause: err,
    });
  }
}

export class RedisStatsPublisher implements StatsPublisher {
  constructor(private readonly redis: RedisClient) {}

  publish(stats: LedgerStats): Promise<void> {
    return writeLedgerStats(this.redis, stats);
  }
}
