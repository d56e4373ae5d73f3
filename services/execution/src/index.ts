import { LoanLoopError, asLoanLoopError, newTraceId } from "@loanloop/common";
import { createClient } from "redis";

import { apiKeys } from "./api.js";
import { loadConfig, loadDotenv } from "./config.js";
import { createDevnet } from "./devnet.js";
import { loadDevnetFile } from "./devnet-file.js";
import { logLine, setLogLevel } from "./log.js";
import { createServer, listen } from "./server.js";
import { ExecutionService } from "./service.js";
import { NULL_JOURNAL, PgOperationJournal, createPgPool, ensurePgSchema } from "./storage/postgres.js";
import type { OperationJournal } from "./storage/postgres.js";
import { NULL_STATS, RedisStatsPublisher } from "./storage/redis.js";
import type { RedisClient, StatsPublisher } from "./storage/redis.js";

const SERVICE = "execution";

async function main(): Promise<void> {
  loadDotenv();
  const cfg = loadConfig();
  setLogLevel(cfg.log_level);
  const trace_id = newTraceId();

  logLine(SERVICE, "info", trace_id, "starting", {
    port: cfg.port,
    devnet_spec_path: cfg.devnet_spec_path,
    journal_enabled: cfg.journal_enabled,
    owner_addr: cfg.owner_addr,
    operator_addr: cfg.operator_addr,
    beneficiary_addr: cfg.beneficiary_addr,
  });

  const { spec, tokens } = await loadDevnetFile(cfg.devnet_spec_path, {
    owner: cfg.owner_addr,
    operator: cfg.operator_addr,
    beneficiary: cfg.beneficiary_addr,
  });
  const devnet = createDevnet(spec);

  logLine(SERVICE, "info", trace_id, "devnet ready", {
    orchestrator: devnet.orchestrator.address,
    lender: devnet.lender.address,
    tokens: Object.fromEntries(Array.from(tokens, ([symbol, t]) => [symbol, t.address])),
    routers: devnet.allowlist.list(),
  });

  devnet.runtime.onLog((log) => {
    logLine(SERVICE, "debug", trace_id, log.event.type, { emitter: log.emitter, ...log.event });
  });

  let journal: OperationJournal = NULL_JOURNAL;
  let stats: StatsPublisher = NULL_STATS;
  let redis: RedisClient | undefined;
  let pg: ReturnType<typeof createPgPool> | undefined;

  if (cfg.journal_enabled) {
    const client = createClient({ url: cfg.redis_url });
    redis = client;
    await client.connect().catch((err: unknown) => {
      throw new LoanLoopError("REDIS_CONNECT_FAILED", "failed to connect redis", { cause: err });
    });

    const pool = createPgPool(cfg.postgres_url);
    pg = pool;
    await pool.query("select 1").catch((err: unknown) => {
      throw new LoanLoopError("PG_CONNECT_FAILED", "failed to connect postgres", { cause: err });
    });
    await ensurePgSchema(pool);

    journal = new PgOperationJournal(pool);
    stats = new RedisStatsPublisher(client);
  }

  const service = new ExecutionService({ devnet, journal, stats });
  const server = createServer(
    service,
    apiKeys({
      owner_api_key: cfg.owner_api_key,
      operator_api_key: cfg.operator_api_key,
      owner_addr: cfg.owner_addr,
      operator_addr: cfg.operator_addr,
    }),
  );
  await listen(server, cfg.port);
  logLine(SERVICE, "info", trace_id, "listening", { port: cfg.port });

  const shutdown = async (signal: string): Promise<void> => {
    const t = newTraceId();
    logLine(SERVICE, "info", t, "shutdown", { signal });
    const closed = new Promise<void>((resolve) => server.close(() => resolve()));
    await Promise.allSettled([closed, redis?.quit(), pg?.end()]);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  const e = asLoanLoopError(err, "INTERNAL_ERROR", "execution crashed");
  const trace_id = newTraceId();
  logLine(SERVICE, "error", trace_id, e.message, { code: e.code });
  process.exitCode = 1;
});
