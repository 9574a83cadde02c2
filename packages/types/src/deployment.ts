/**
 * Deployment Types
 *
 * Values exchanged by the provisioning protocol: per-bridge mint limits,
 * lockbox modes and the events the factory emits.
 */

import type { Address } from "./primitives.js";

/**
 * One (bridge, mint-limit) pair applied to a freshly created token.
 *
 * There is no burn-limit field: the provisioning layer always writes zero
 * into the burn slot.
 */
export interface BridgeLimitEntry {
  /** Bridge principal allowed to mint */
  readonly bridge: Address;

  /** Maximum outstanding amount the bridge may mint */
  readonly mintLimit: bigint;
}

/**
 * How a lockbox holds its base asset.
 *
 * - "native": custody of the chain's gas asset (base asset is the zero address)
 * - "erc20": custody of an ERC-20 token at `baseAsset`
 */
export type LockboxMode = "native" | "erc20";

/**
 * Names of the events the factory emits.
 */
export type FactoryEventName = "TokenDeployed" | "LockboxDeployed";

/**
 * An event emitted by the factory after a successful creation.
 * Discriminated by `name`.
 */
export type FactoryEvent =
  | {
      readonly name: "TokenDeployed";
      readonly args: { readonly token: Address };
    }
  | {
      readonly name: "LockboxDeployed";
      readonly args: { readonly lockbox: Address };
    };
