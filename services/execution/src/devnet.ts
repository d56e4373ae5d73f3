import {
  DEFAULT_FLASH_FEE_BPS,
  DEFAULT_VENUE_FEE_BPS,
  invariant,
  labelAddress,
} from "@loanloop/common";
import type { Address } from "@loanloop/common";

import { AdminSurface } from "./core/admin.js";
import { Ledger } from "./core/ledger.js";
import { LoanOrchestrator } from "./core/orchestrator.js";
import { RouterAllowlist } from "./core/router-allowlist.js";
import { SwapPipeline } from "./core/swap-pipeline.js";
import { FlashLender } from "./lender/flash-lender.js";
import { ContractRegistry } from "./runtime/registry.js";
import { Runtime } from "./runtime/runtime.js";
import type { Clock } from "./runtime/runtime.js";
import { TokenBank } from "./runtime/token-bank.js";
import { ConstantProductVenue } from "./venues/constant-product.js";
import { FixedRateVenue } from "./venues/fixed-rate.js";
import type { RouterVenue } from "./venues/router-venue.js";

export type TokenAmount = { token: Address; amount: bigint };

export type FixedRateVenueSpec = {
  kind: "fixed-rate";
  address: Address;
  name: string;
  rates: Array<{ token_in: Address; token_out: Address; numerator: bigint; denominator: bigint }>;
  inventory: TokenAmount[];
};

export type ConstantProductVenueSpec = {
  kind: "constant-product";
  address: Address;
  name: string;
  fee_bps?: number;
  pools: Array<{ token_a: Address; token_b: Address; reserve_a: bigint; reserve_b: bigint }>;
};

export type VenueSpec = FixedRateVenueSpec | ConstantProductVenueSpec;

export type DevnetSpec = {
  owner: Address;
  operator: Address;
  beneficiary?: Address;
  orchestrator?: Address;
  lender: {
    address?: Address;
    fee_bps?: number;
    liquidity: TokenAmount[];
  };
  venues: VenueSpec[];
  /** Venues approved at start. */
  allowlist: Address[];
  /** Extra balances minted at start, e.g. stranded funds. */
  balances?: Array<TokenAmount & { holder: Address }>;
};

export type Devnet = {
  runtime: Runtime;
  bank: TokenBank;
  registry: ContractRegistry;
  lender: FlashLender;
  allowlist: RouterAllowlist;
  ledger: Ledger;
  pipeline: SwapPipeline;
  orchestrator: LoanOrchestrator;
  admin: AdminSurface;
  venues: Map<Address, RouterVenue>;
  owner: Address;
  operator: Address;
  beneficiary: Address;
};

function deployVenue(spec: VenueSpec, runtime: Runtime, bank: TokenBank): RouterVenue {
  if (spec.kind === "fixed-rate") {
    const venue = new FixedRateVenue(spec.address, spec.name, runtime, bank);
    for (const rate of spec.rates) {
      venue.setRate(rate.token_in, rate.token_out, {
        numerator: rate.numerator,
        denominator: rate.denominator,
      });
    }
    for (const { token, amount } of spec.inventory) bank.mint(token, spec.address, amount);
    return venue;
  }

  const venue = runtime.register(
    new ConstantProductVenue(
      spec.address,
      spec.name,
      runtime,
      bank,
      spec.fee_bps ?? DEFAULT_VENUE_FEE_BPS,
    ),
  );
  for (const pool of spec.pools) {
    venue.addPool(pool.token_a, pool.token_b, pool.reserve_a, pool.reserve_b);
  }
  return venue;
}

export function createDevnet(spec: DevnetSpec, opts?: { clock?: Clock }): Devnet {
  const runtime = new Runtime({ clock: opts?.clock });
  const bank = runtime.register(new TokenBank());
  const registry = new ContractRegistry();

  const orchestratorAddress = spec.orchestrator ?? labelAddress("loanloop:orchestrator");
  const beneficiary = spec.beneficiary ?? spec.owner;

  const lender = new FlashLender(runtime, bank, registry, {
    address: spec.lender.address ?? labelAddress("loanloop:lender"),
    fee_bps: spec.lender.fee_bps ?? DEFAULT_FLASH_FEE_BPS,
    assets: spec.lender.liquidity.map((l) => l.token),
  });
  for (const { token, amount } of spec.lender.liquidity) bank.mint(token, lender.address, amount);

  const venues = new Map<Address, RouterVenue>();
  for (const venueSpec of spec.venues) {
    invariant(
      !venues.has(venueSpec.address),
      "DEVNET_INVALID",
      `duplicate venue address ${venueSpec.address}`,
    );
    const venue = deployVenue(venueSpec, runtime, bank);
    venues.set(venue.address, venue);
    registry.registerVenue(venue);
  }

  const allowlist = runtime.register(new RouterAllowlist(spec.owner, spec.allowlist));
  const ledger = runtime.register(new Ledger());
  const pipeline = new SwapPipeline({
    self: orchestratorAddress,
    runtime,
    bank,
    registry,
    allowlist,
  });
  const orchestrator = new LoanOrchestrator({
    address: orchestratorAddress,
    operator: spec.operator,
    beneficiary,
    lender,
    runtime,
    bank,
    registry,
    allowlist,
    ledger,
    pipeline,
  });
  registry.registerReceiver(orchestrator);

  const admin = new AdminSurface({
    owner: spec.owner,
    self: orchestratorAddress,
    runtime,
    bank,
    allowlist,
  });

  for (const { token, holder, amount } of spec.balances ?? []) bank.mint(token, holder, amount);

  return {
    runtime,
    bank,
    registry,
    lender,
    allowlist,
    ledger,
    pipeline,
    orchestrator,
    admin,
    venues,
    owner: spec.owner,
    operator: spec.operator,
    beneficiary,
  };
}
