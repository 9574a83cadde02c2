/**
 * Shared test fixtures for @xfactory/contracts.
 */

import type { Address } from "@xfactory/types";

export const FACTORY: Address = "0x1111111111111111111111111111111111111111";
export const ALICE: Address = "0x2222222222222222222222222222222222222222";
export const BRIDGE_1: Address = "0x1000000000000000000000000000000000000001";
export const BRIDGE_2: Address = "0x2000000000000000000000000000000000000002";
/** An address whose checksum mixes case */
export const MIXED_CASE: Address = "0x5FbDB2315678afecb367f032d93F642f64180aa3";
export const BASE_ASSET: Address = "0x3333333333333333333333333333333333333333";
export const ZERO: Address = "0x0000000000000000000000000000000000000000";

/** Run `fn` and return what it threw. Fails the test if it returns. */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected function to throw");
}
