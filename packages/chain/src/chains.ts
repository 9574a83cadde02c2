/**
 * Deployment targets.
 *
 * The EVM chains DEPLOY_CHAINS may name, keyed for lookup by their
 * CAIP-2 id. A factory rollout is only meaningful on chains where the
 * factory sits at the same address, so this list is kept to the networks
 * the deployer is configured for.
 */

import type { ChainRef, ChainId } from "@xfactory/types";

export const CHAINS = {
  ETHEREUM_MAINNET: { chainId: "eip155:1", name: "Ethereum Mainnet", family: "evm" },
  BASE_MAINNET: { chainId: "eip155:8453", name: "Base Mainnet", family: "evm" },
  ARBITRUM_ONE: { chainId: "eip155:42161", name: "Arbitrum One", family: "evm" },
  OPTIMISM: { chainId: "eip155:10", name: "OP Mainnet", family: "evm" },
  POLYGON: { chainId: "eip155:137", name: "Polygon PoS", family: "evm" },
} as const satisfies Record<string, ChainRef>;

const byChainId = new Map<ChainId, ChainRef>(
  Object.values(CHAINS).map((ref) => [ref.chainId, ref]),
);

/** The deployment target with this id, or undefined. */
export function getChainRef(chainId: ChainId): ChainRef | undefined {
  return byChainId.get(chainId);
}

/** True for CAIP-2 ids in the eip155 namespace. */
export function isEvmChain(chainId: ChainId): boolean {
  return /^eip155:\d+$/.test(chainId);
}
