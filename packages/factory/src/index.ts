/**
 * @xfactory/factory — Deterministic token and lockbox factory.
 *
 * Creates bridgeable tokens, provisions per-bridge mint limits, and pairs
 * tokens with lockboxes, at addresses that are identical on every chain
 * hosting the same factory.
 *
 * Design rules:
 * - Addresses depend only on (factory, creation code, inputs)
 * - Every workflow is one atomic transaction
 * - The factory never keeps rights over a token it created
 * - Preconditions fail before any state changes
 */

export { TokenFactory } from "./token-factory.js";

// Address derivation
export {
  ZERO_SALT,
  SALT_DISCRIMINATOR_BYTES,
  normalizeSalt,
  requireAddress,
  create2Address,
  tokenSalt,
  tokenInitCode,
  lockboxSalt,
  lockboxInitCode,
  predictTokenAddress,
  predictLockboxAddress,
} from "./address-derivation.js";
export type { TokenAddressParams, LockboxAddressParams } from "./address-derivation.js";

// Provisioning
export {
  PROVISIONED_BURN_LIMIT,
  assertMatchingLengths,
  toBridgeLimitEntries,
  provisionBridgeLimits,
} from "./bridge-limits.js";
export { assertLockboxMode, linkLockbox } from "./lockbox-linker.js";
export { readFactoryEvents } from "./events.js";

// Types
export type {
  FactoryConfig,
  TokenFactoryOptions,
  SaltInput,
  WorkflowStage,
  WorkflowName,
  DeploymentBase,
  TokenDeployment,
  LockboxDeployment,
  TokenWithLockboxDeployment,
  FactoryErrorCode,
} from "./types.js";

export { FactoryError } from "./types.js";
