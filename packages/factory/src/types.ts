/**
 * @xfactory/factory — Types for the provisioning protocol.
 *
 * Rules:
 * - Precondition failures are thrown before any transaction starts
 * - Results are plain readonly records
 */

import type { Logger } from "pino";
import type { ChainLog } from "@xfactory/chain";
import type { Address, ChainId, FactoryEvent, Hex } from "@xfactory/types";

// ─── Configuration ───────────────────────────────────────────────────────

/**
 * Identity of a factory deployment.
 *
 * `address` must be the same on every chain for derived addresses to
 * agree; that is an integrator precondition and is not checked here.
 */
export interface FactoryConfig {
  /** Address the factory lives at (the CREATE2 deployer) */
  readonly address: Address;

  /** Creation code of the token collaborator */
  readonly tokenBytecode: Hex;

  /** Creation code of the lockbox collaborator */
  readonly lockboxBytecode: Hex;
}

export interface TokenFactoryOptions {
  /** Defaults to a silent pino logger */
  readonly logger?: Logger | undefined;
}

/**
 * Caller-chosen discriminator: up to 12 bytes of hex, or a bigint below 2^96.
 */
export type SaltInput = Hex | bigint;

// ─── Workflow ────────────────────────────────────────────────────────────

/**
 * Stages a workflow passes through, in order. Optional stages are
 * skipped by workflows that do not need them.
 */
export type WorkflowStage =
  | "validated"
  | "token-created"
  | "limits-applied"
  | "lockbox-created"
  | "linked"
  | "ownership-transferred"
  | "done";

/** Which public entry point ran. */
export type WorkflowName =
  | "deployToken"
  | "deployTokenWithLimits"
  | "deployLockbox"
  | "deployTokenWithLockbox";

export interface DeploymentBase {
  readonly chainId: ChainId;
  readonly txIndex: number;
  readonly stages: readonly WorkflowStage[];

  /** Every log the transaction committed, in order */
  readonly logs: readonly ChainLog[];

  /** The factory's own events from `logs`, typed */
  readonly events: readonly FactoryEvent[];
}

export interface TokenDeployment extends DeploymentBase {
  readonly token: Address;
}

export interface LockboxDeployment extends DeploymentBase {
  readonly lockbox: Address;
}

export interface TokenWithLockboxDeployment extends DeploymentBase {
  readonly token: Address;
  readonly lockbox: Address;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for factory preconditions. */
export type FactoryErrorCode =
  /** Base asset and native flag disagree (zero asset must mean native) */
  | "BAD_TOKEN_ADDRESS"
  /** minterLimits and bridges differ in length */
  | "INVALID_LENGTH"
  | "INVALID_ARGUMENT";

/**
 * Structured precondition error from the factory.
 * Collisions and collaborator failures keep their own error types.
 */
export class FactoryError extends Error {
  public readonly code: FactoryErrorCode;

  constructor(code: FactoryErrorCode, message: string) {
    super(message);
    this.name = "FactoryError";
    this.code = code;
  }
}
