/**
 * Tests for bridge limit provisioning.
 */

import { describe, it, expect } from "vitest";
import { XToken } from "@xfactory/contracts";
import {
  assertMatchingLengths,
  provisionBridgeLimits,
  toBridgeLimitEntries,
} from "../src/bridge-limits.js";
import { ALICE, BRIDGE_1, BRIDGE_2, FACTORY, captureError } from "./fixtures.js";

describe("toBridgeLimitEntries", () => {
  it("pairs the arrays in order", () => {
    expect(toBridgeLimitEntries([100n, 200n], [BRIDGE_1, BRIDGE_2])).toEqual([
      { bridge: BRIDGE_1, mintLimit: 100n },
      { bridge: BRIDGE_2, mintLimit: 200n },
    ]);
  });

  it("rejects arrays of different lengths", () => {
    expect(captureError(() => toBridgeLimitEntries([100n], [BRIDGE_1, BRIDGE_2]))).toMatchObject({
      name: "FactoryError",
      code: "INVALID_LENGTH",
      message: "minterLimits has 1 entries but bridges has 2",
    });
  });
});

describe("assertMatchingLengths", () => {
  it("accepts two empty arrays", () => {
    expect(() => assertMatchingLengths([], [])).not.toThrow();
  });
});

describe("provisionBridgeLimits", () => {
  it("writes one mint limit per bridge with a zero burn limit", () => {
    const token = new XToken("Test", "TST", FACTORY);

    provisionBridgeLimits(token, FACTORY, [100n, 200n], [BRIDGE_1, BRIDGE_2]);

    expect(token.limitsOf(BRIDGE_1)).toEqual({ mintingMaxLimit: 100n, burningMaxLimit: 0n });
    expect(token.limitsOf(BRIDGE_2)).toEqual({ mintingMaxLimit: 200n, burningMaxLimit: 0n });
  });

  it("keeps the last limit of a repeated bridge", () => {
    const token = new XToken("Test", "TST", FACTORY);

    const applied = provisionBridgeLimits(token, FACTORY, [100n, 200n], [BRIDGE_1, BRIDGE_1]);

    expect(applied).toHaveLength(2);
    expect(token.mintingMaxLimitOf(BRIDGE_1)).toBe(200n);
    expect(token.bridges()).toEqual([BRIDGE_1]);
  });

  it("writes nothing when the lengths differ", () => {
    const token = new XToken("Test", "TST", FACTORY);

    expect(
      captureError(() => provisionBridgeLimits(token, FACTORY, [100n, 200n], [BRIDGE_1])),
    ).toMatchObject({ code: "INVALID_LENGTH" });
    expect(token.bridges()).toEqual([]);
  });

  it("does nothing for empty arrays", () => {
    const token = new XToken("Test", "TST", FACTORY);

    expect(provisionBridgeLimits(token, FACTORY, [], [])).toEqual([]);
    expect(token.bridges()).toEqual([]);
  });

  it("needs the operator to own the token", () => {
    const token = new XToken("Test", "TST", FACTORY);

    expect(
      captureError(() => provisionBridgeLimits(token, ALICE, [100n], [BRIDGE_1])),
    ).toMatchObject({ name: "ContractError", code: "UNAUTHORIZED" });
  });
});
