/**
 * @xfactory/contracts — Collaborators consumed by the factory.
 *
 * - XToken: owner, per-bridge limit records, single lockbox slot
 * - Lockbox: immutable (token, base asset, native flag) triple
 * - Artifacts: creation code hashed into CREATE2 addresses
 *
 * Design rules:
 * - Administrative calls are owner-only
 * - Setters overwrite; there is no history
 * - Fail-closed: invalid calls throw
 */

export { Ownable } from "./ownable.js";
export { XToken, isXToken } from "./xtoken.js";
export { Lockbox, isLockbox } from "./lockbox.js";

export {
  ArtifactSchema,
  parseArtifact,
  loadArtifact,
  defaultArtifacts,
  XTOKEN_ARTIFACT_URL,
  LOCKBOX_ARTIFACT_URL,
} from "./artifacts.js";

export type {
  BridgeLimits,
  ContractArtifact,
  ContractErrorCode,
} from "./types.js";

export { ContractError, UINT256_MAX } from "./types.js";
