/**
 * Chain Types
 *
 * Chain-agnostic references for the environments a factory is deployed to.
 *
 * Rules:
 * - Chain IDs follow CAIP-2 convention (e.g., "eip155:1")
 * - The same factory address on every chain is an external precondition
 */

/**
 * Chain identifier (e.g., "eip155:1" for Ethereum mainnet).
 */
export type ChainId = string;

/**
 * Reference to a specific chain.
 */
export interface ChainRef {
  /** Chain identifier */
  readonly chainId: ChainId;

  /** Human-readable chain name */
  readonly name: string;

  /** Chain family (only "evm" is deployable today) */
  readonly family: string;
}
