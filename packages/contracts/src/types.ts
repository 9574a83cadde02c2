/**
 * @xfactory/contracts — Collaborator types.
 *
 * Rules:
 * - Limits are bigint within uint256
 * - Administrative calls take the calling principal explicitly
 * - Fail-closed: unauthorized or invalid calls throw, never silently succeed
 */

import type { Hex } from "@xfactory/types";

// ─── Limits ──────────────────────────────────────────────────────────────

/** Largest value a uint256 slot can hold. */
export const UINT256_MAX = (1n << 256n) - 1n;

/**
 * The single limit record kept per bridge.
 * Each `setLimits` call replaces it entirely.
 */
export interface BridgeLimits {
  readonly mintingMaxLimit: bigint;
  readonly burningMaxLimit: bigint;
}

// ─── Artifacts ───────────────────────────────────────────────────────────

/**
 * Creation code of a collaborator, the code fingerprint CREATE2 hashes.
 */
export interface ContractArtifact {
  readonly contractName: string;
  readonly bytecode: Hex;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for collaborator calls. */
export type ContractErrorCode =
  | "UNAUTHORIZED"
  | "INVALID_OWNER"
  | "INVALID_ADDRESS"
  | "INVALID_LIMIT"
  | "INVALID_ARTIFACT";

/**
 * Structured error from a collaborator contract.
 * Always thrown.
 */
export class ContractError extends Error {
  public readonly code: ContractErrorCode;

  constructor(code: ContractErrorCode, message: string) {
    super(message);
    this.name = "ContractError";
    this.code = code;
  }
}
