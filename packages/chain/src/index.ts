/**
 * @xfactory/chain — In-process EVM execution environment.
 *
 * Provides the transaction boundary and creation primitive the factory
 * protocol relies on, one independent instance per chain.
 *
 * Design rules:
 * - Every transaction is atomic; failures leave no trace
 * - CREATE2 addresses depend only on (deployer, salt, init code)
 * - Occupied addresses can never be created again
 * - Errors are surfaced, never swallowed
 */

// Execution environment
export { Chain } from "./chain.js";

// CREATE2 primitive
export {
  computeCreate2Address,
  assertCreate2Salt,
  normalizeAddress,
  CREATE2_SALT_BYTES,
} from "./create2.js";

// Multi-chain registry
export { ChainRegistry } from "./registry.js";
export type { ChainOutcome, ChainFailure, MultiChainResult } from "./registry.js";

// Chain definitions
export { CHAINS, getChainRef, isEvmChain } from "./chains.js";

// Types
export type {
  Contract,
  ContractGuard,
  Create2Request,
  Created,
  ChainLog,
  LogFilter,
  LogHandler,
  Subscription,
  ChainOptions,
  TransactionContext,
  Receipt,
  ChainErrorCode,
} from "./types.js";

export { ChainError } from "./types.js";
