import path from "node:path";
import { fileURLToPath } from "node:url";

import { asLoanLoopError, encodePlan, labelAddress, newTraceId } from "@loanloop/common";
import { formatUnits, parseUnits } from "ethers";

import { createDevnet } from "./devnet.js";
import { loadDevnetFile } from "./devnet-file.js";
import type { TokenInfo } from "./devnet-file.js";
import { logLine } from "./log.js";
import { ExecutionService } from "./service.js";
import { NULL_JOURNAL } from "./storage/postgres.js";
import { NULL_STATS } from "./storage/redis.js";

const SERVICE = "execution/dry-run";

function token(tokens: Map<string, TokenInfo>, symbol: string): TokenInfo {
  const t = tokens.get(symbol);
  if (!t) throw new Error(`devnet has no ${symbol}`);
  return t;
}

async function main(): Promise<void> {
  const trace_id = newTraceId();
  const here = path.dirname(fileURLToPath(import.meta.url));

  const owner = labelAddress("dry-run:owner");
  const operator = labelAddress("dry-run:operator");
  const { spec, tokens } = await loadDevnetFile(path.resolve(here, "../devnet.json"), {
    owner,
    operator,
  });
  const devnet = createDevnet(spec);
  const service = new ExecutionService({ devnet, journal: NULL_JOURNAL, stats: NULL_STATS });

  const tka = token(tokens, "TKA");
  const tkb = token(tokens, "TKB");
  const [v1, v2] = spec.venues;
  const deadline = devnet.runtime.now() + 60;

  const planFor = (minProfit: string) =>
    encodePlan({
      swaps: [
        {
          venue: v1.address,
          path: [tka.address, tkb.address],
          amount_in: parseUnits("100", tka.decimals),
          min_amount_out: 0n,
          deadline,
        },
        {
          venue: v2.address,
          path: [tkb.address, tka.address],
          amount_in: parseUnits("98", tkb.decimals),
          min_amount_out: 0n,
          deadline,
        },
      ],
      min_profit: parseUnits(minProfit, tka.decimals),
      profit_token: tka.address,
    });

  const request = {
    asset: tka.address,
    amount: parseUnits("100", tka.decimals),
    payload: planFor("0.5"),
  };

  const sim = await service.simulate(request);
  logLine(SERVICE, "info", trace_id, "simulation", {
    expected_profit: formatUnits(sim.expected_profit, tka.decimals),
    flash_fee: formatUnits(sim.flash_fee, tka.decimals),
    profitable: sim.profitable,
  });

  const outcome = await service.submit(operator, request, trace_id);
  logLine(SERVICE, "info", trace_id, "settled", {
    profit: formatUnits(outcome.profit, tka.decimals),
    fee: formatUnits(outcome.fee, tka.decimals),
    swaps: outcome.swaps.map((s) => formatUnits(s.amount_out, tka.decimals)),
  });

  await service
    .submit(operator, { ...request, payload: planFor("2") })
    .catch((err: unknown) => {
      const e = asLoanLoopError(err, "INTERNAL_ERROR", "second operation failed");
      logLine(SERVICE, "info", trace_id, "second operation reverted as expected", { code: e.code });
    });

  logLine(SERVICE, "info", trace_id, "ledger", { ...service.stats() });
}

main().catch((err: unknown) => {
  const e = asLoanLoopError(err, "INTERNAL_ERROR", "dry-run failed");
  const trace_id = newTraceId();
  logLine(SERVICE, "error", trace_id, e.message, { code: e.code });
  process.exitCode = 1;
});
