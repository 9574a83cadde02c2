/**
 * @xfactory/factory — Bridge limit provisioning.
 *
 * Applies parallel (minterLimits, bridges) arrays to a token the factory
 * still owns. Each pair is an independent overwrite of that bridge's
 * record with the burn slot fixed at zero, so a repeated bridge keeps
 * only its last limit.
 */

import type { XToken } from "@xfactory/contracts";
import type { Address, BridgeLimitEntry } from "@xfactory/types";
import { FactoryError } from "./types.js";

/** Burn limit written for every provisioned bridge. */
export const PROVISIONED_BURN_LIMIT = 0n;

/**
 * Throws FactoryError("INVALID_LENGTH") unless both arrays have the same length.
 */
export function assertMatchingLengths(
  minterLimits: readonly bigint[],
  bridges: readonly Address[],
): void {
  if (minterLimits.length !== bridges.length) {
    throw new FactoryError(
      "INVALID_LENGTH",
      `minterLimits has ${minterLimits.length} entries but bridges has ${bridges.length}`,
    );
  }
}

/**
 * Pair the arrays up, in order.
 */
export function toBridgeLimitEntries(
  minterLimits: readonly bigint[],
  bridges: readonly Address[],
): readonly BridgeLimitEntry[] {
  assertMatchingLengths(minterLimits, bridges);
  return bridges.map((bridge, i) => {
    const mintLimit = minterLimits[i];
    if (mintLimit === undefined) {
      throw new FactoryError("INVALID_LENGTH", `No minter limit for bridge #${i}`);
    }
    return { bridge, mintLimit };
  });
}

/**
 * Write every (bridge, mintLimit) pair onto `token`, calling as `operator`.
 *
 * Nothing is written when the lengths differ. A failing write part-way
 * leaves earlier writes in place; the enclosing transaction discards them.
 *
 * @returns the entries in the order they were applied
 */
export function provisionBridgeLimits(
  token: XToken,
  operator: Address,
  minterLimits: readonly bigint[],
  bridges: readonly Address[],
): readonly BridgeLimitEntry[] {
  const entries = toBridgeLimitEntries(minterLimits, bridges);
  for (const entry of entries) {
    token.setLimits(operator, entry.bridge, entry.mintLimit, PROVISIONED_BURN_LIMIT);
  }
  return entries;
}
