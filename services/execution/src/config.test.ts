import { describe, expect, it } from "vitest";

import { throwsWith } from "./__fixtures__/scenario.js";
import { loadConfig } from "./config.js";

const OWNER = "0x00000000000000000000000000000000000000A1";
const OPERATOR = "0x00000000000000000000000000000000000000b2";

function env(overrides: Record<string, string | undefined> = {}) {
  return {
    OWNER_ADDR: OWNER,
    OPERATOR_ADDR: OPERATOR,
    OWNER_API_KEY: "test-owner-key",
    OPERATOR_API_KEY: "test-operator-key",
    ...overrides,
  };
}

describe("loadConfig", () => {
  it("fills defaults and normalises addresses", () => {
    const cfg = loadConfig(env());
    expect(cfg).toMatchObject({
      service: "execution",
      port: 8080,
      redis_url: "redis://localhost:6379",
      journal_enabled: true,
      owner_addr: "0x00000000000000000000000000000000000000a1",
      operator_addr: OPERATOR,
      beneficiary_addr: "0x00000000000000000000000000000000000000a1",
      log_level: "info",
    });
    expect(cfg.devnet_spec_path.endsWith("devnet.json")).toBe(true);
  });

  it("reads overrides", () => {
    const cfg = loadConfig(
      env({ PORT: "9000", JOURNAL_ENABLED: "false", LOG_LEVEL: "debug", BENEFICIARY_ADDR: OPERATOR }),
    );
    expect(cfg).toMatchObject({
      port: 9000,
      journal_enabled: false,
      log_level: "debug",
      beneficiary_addr: OPERATOR,
    });
  });

  it("requires the principals and their keys", () => {
    throwsWith(() => loadConfig(env({ OWNER_ADDR: undefined })), "ENV_MISSING");
    throwsWith(() => loadConfig(env({ OPERATOR_API_KEY: " " })), "ENV_MISSING");
  });

  it("rejects invalid values", () => {
    throwsWith(() => loadConfig(env({ OPERATOR_ADDR: "0x1234" })), "ENV_INVALID");
    throwsWith(() => loadConfig(env({ PORT: "70000" })), "ENV_INVALID");
    throwsWith(() => loadConfig(env({ LOG_LEVEL: "loud" })), "ENV_INVALID");
    throwsWith(() => loadConfig(env({ JOURNAL_ENABLED: "maybe" })), "ENV_INVALID");
    throwsWith(() => loadConfig(env({ OPERATOR_API_KEY: "test-owner-key" })), "ENV_INVALID");
  });
});
