/**
 * Shared test fixtures for @xfactory/factory.
 */

import pino from "pino";
import type { Logger } from "pino";
import { Chain, CHAINS } from "@xfactory/chain";
import type { Address, ChainRef, Hex } from "@xfactory/types";
import { TokenFactory } from "../src/token-factory.js";
import type { FactoryConfig } from "../src/types.js";

export const FACTORY: Address = "0x1111111111111111111111111111111111111111";
export const ALICE: Address = "0x2222222222222222222222222222222222222222";
export const BOB: Address = "0x4444444444444444444444444444444444444444";
export const BASE_ASSET: Address = "0x3333333333333333333333333333333333333333";
export const BRIDGE_1: Address = "0x1000000000000000000000000000000000000001";
export const BRIDGE_2: Address = "0x2000000000000000000000000000000000000002";
export const MIXED_CASE: Address = "0x5FbDB2315678afecb367f032d93F642f64180aa3";
export const ZERO: Address = "0x0000000000000000000000000000000000000000";

export const TOKEN_CODE: Hex = "0x6080604052";
export const LOCKBOX_CODE: Hex = "0x60e0604052";

export const CONFIG: FactoryConfig = {
  address: FACTORY,
  tokenBytecode: TOKEN_CODE,
  lockboxBytecode: LOCKBOX_CODE,
};

export function makeFactory(
  ref: ChainRef = CHAINS.ETHEREUM_MAINNET,
  logger?: Logger,
): TokenFactory {
  return new TokenFactory(new Chain(ref), CONFIG, { logger });
}

/** A pino logger that keeps every line it writes, parsed. */
export function captureLogger(): { logger: Logger; lines: Record<string, unknown>[] } {
  const lines: Record<string, unknown>[] = [];
  const stream = {
    write(line: string): void {
      lines.push(JSON.parse(line));
    },
  };
  return { logger: pino({ level: "debug" }, stream), lines };
}

/** Run `fn` and return what it threw. Fails the test if it returns. */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected function to throw");
}
