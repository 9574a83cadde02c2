/**
 * @xfactory/deployer — Multi-chain rollout of factory requests.
 *
 * Binds one TokenFactory per registered chain, predicts addresses before
 * anything is sent, runs a request everywhere, and records the result as
 * a canonical, hashable manifest.
 *
 * Design rules:
 * - Same factory address on every chain
 * - Per-chain failures are collected, not thrown
 * - Manifests are canonical JSON (RFC 8785)
 */

export { MultiChainDeployer, checkAddressAgreement } from "./multi-chain-deployer.js";
export type { MultiChainDeployerOptions } from "./multi-chain-deployer.js";

export { buildManifest, manifestDigest, serializeRequest } from "./manifest.js";

export { ConfigSchema, loadConfig, parseChainList, resolveFactoryConfig } from "./config.js";
export type { DeployerConfig } from "./config.js";
export { createLogger } from "./logger.js";

export type {
  TokenRequest,
  TokenWithLimitsRequest,
  TokenWithLockboxRequest,
  RolloutRequest,
  RolloutKind,
  ChainDeployment,
  RolloutResult,
  DeploymentPlan,
  ChainAddresses,
  AddressAgreement,
  DeploymentManifest,
  DeployerErrorCode,
} from "./types.js";

export { DeployerError } from "./types.js";
