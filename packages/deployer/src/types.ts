/**
 * @xfactory/deployer — Rollout types.
 */

import type { ChainFailure, ChainOutcome, MultiChainResult } from "@xfactory/chain";
import type {
  SaltInput,
  TokenDeployment,
  TokenWithLockboxDeployment,
} from "@xfactory/factory";
import type { Address, ChainId } from "@xfactory/types";

// ─── Requests ────────────────────────────────────────────────────────────

/** deployToken(owner, salt) on every chain. */
export interface TokenRequest {
  readonly kind: "token";
  readonly name: string;
  readonly symbol: string;
  readonly owner: Address;
  readonly salt: SaltInput;
}

/** deployToken(minterLimits, bridges) on every chain. */
export interface TokenWithLimitsRequest {
  readonly kind: "token-with-limits";
  readonly name: string;
  readonly symbol: string;
  readonly minterLimits: readonly bigint[];
  readonly bridges: readonly Address[];
}

/** deployTokenWithLockbox on every chain. */
export interface TokenWithLockboxRequest {
  readonly kind: "token-with-lockbox";
  readonly name: string;
  readonly symbol: string;
  readonly minterLimits: readonly bigint[];
  readonly bridges: readonly Address[];
  readonly baseAsset: Address;
  readonly isNative: boolean;
}

export type RolloutRequest = TokenRequest | TokenWithLimitsRequest | TokenWithLockboxRequest;

export type RolloutKind = RolloutRequest["kind"];

// ─── Results ─────────────────────────────────────────────────────────────

/** What one chain produced. `lockbox` is set only for token-with-lockbox. */
export type ChainDeployment = TokenDeployment | TokenWithLockboxDeployment;

export type RolloutResult = MultiChainResult<ChainOutcome<ChainDeployment>>;

/**
 * Addresses a request will produce. Identical on every target chain.
 */
export interface DeploymentPlan {
  readonly factory: Address;
  readonly chains: readonly ChainId[];
  readonly token: Address;
  readonly lockbox?: Address;
}

export interface ChainAddresses {
  readonly chainId: ChainId;
  readonly token: Address;
  readonly lockbox?: Address;
}

export interface AddressAgreement {
  /** True when at least one chain succeeded and all successes match */
  readonly agreed: boolean;
  readonly byChain: readonly ChainAddresses[];
}

// ─── Manifest ────────────────────────────────────────────────────────────

/**
 * Canonical record of a rollout. Limits are decimal strings so the
 * manifest is plain JSON.
 */
export interface DeploymentManifest {
  readonly version: 1;
  readonly factory: Address;
  readonly sender: Address;
  readonly request: Readonly<Record<string, unknown>>;
  readonly token: Address;
  readonly lockbox?: Address;

  /** Chains that committed, sorted by chain id */
  readonly chains: readonly ChainId[];

  /** Chains that failed, sorted by chain id */
  readonly failures: readonly ChainFailure[];
}

// ─── Error Types ─────────────────────────────────────────────────────────

export type DeployerErrorCode =
  /** Chains that succeeded produced different addresses */
  | "ADDRESS_DIVERGENCE"
  /** No chain committed the rollout */
  | "NOTHING_DEPLOYED"
  | "UNKNOWN_CHAIN";

export class DeployerError extends Error {
  public readonly code: DeployerErrorCode;

  constructor(code: DeployerErrorCode, message: string) {
    super(message);
    this.name = "DeployerError";
    this.code = code;
  }
}
