/**
 * Shared test fixtures for @xfactory/deployer.
 */

import { Chain, ChainRegistry, CHAINS } from "@xfactory/chain";
import type { FactoryConfig } from "@xfactory/factory";
import type { Address } from "@xfactory/types";
import { MultiChainDeployer } from "../src/multi-chain-deployer.js";
import type { TokenWithLockboxRequest } from "../src/types.js";

export const FACTORY: Address = "0x1111111111111111111111111111111111111111";
export const OTHER_FACTORY: Address = "0x9999999999999999999999999999999999999999";
export const ALICE: Address = "0x2222222222222222222222222222222222222222";
export const BOB: Address = "0x4444444444444444444444444444444444444444";
export const BASE_ASSET: Address = "0x3333333333333333333333333333333333333333";
export const BRIDGE_1: Address = "0x1000000000000000000000000000000000000001";
export const BRIDGE_2: Address = "0x2000000000000000000000000000000000000002";
export const ZERO: Address = "0x0000000000000000000000000000000000000000";

export const CONFIG: FactoryConfig = {
  address: FACTORY,
  tokenBytecode: "0x6080604052",
  lockboxBytecode: "0x60e0604052",
};

export const COMPOSITE: TokenWithLockboxRequest = {
  kind: "token-with-lockbox",
  name: "Test",
  symbol: "TST",
  minterLimits: [100n, 200n],
  bridges: [BRIDGE_1, BRIDGE_2],
  baseAsset: ZERO,
  isNative: true,
};

/** Registry holding fresh Ethereum Mainnet and Base Mainnet chains. */
export function makeRegistry(): ChainRegistry {
  const registry = new ChainRegistry();
  registry.register(new Chain(CHAINS.ETHEREUM_MAINNET));
  registry.register(new Chain(CHAINS.BASE_MAINNET));
  return registry;
}

export function makeDeployer(config: FactoryConfig = CONFIG): MultiChainDeployer {
  return new MultiChainDeployer(makeRegistry(), config);
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
