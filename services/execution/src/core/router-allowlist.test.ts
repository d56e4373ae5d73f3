import { describe, expect, it } from "vitest";

import { OPERATOR, OWNER, V1, V2, throwsWith } from "../__fixtures__/scenario.js";
import { RouterAllowlist } from "./router-allowlist.js";

describe("RouterAllowlist", () => {
  it("reports whether a call changed anything", () => {
    const list = new RouterAllowlist(OWNER);
    expect(list.setApproval(OWNER, V1, true)).toBe(true);
    expect(list.setApproval(OWNER, V1, true)).toBe(false);
    expect(list.isApproved(V1)).toBe(true);
    expect(list.setApproval(OWNER, V1, false)).toBe(true);
    expect(list.isApproved(V1)).toBe(false);
  });

  it("restores a snapshot", () => {
    const list = new RouterAllowlist(OWNER, [V1]);
    const restore = list.snapshot();
    list.setApproval(OWNER, V2, true);
    restore();
    expect(list.list()).toEqual([V1]);
  });

  it("rejects a non-owner", () => {
    const list = new RouterAllowlist(OWNER);
    throwsWith(() => list.setApproval(OPERATOR, V1, true), "NOT_OWNER");
  });
});
