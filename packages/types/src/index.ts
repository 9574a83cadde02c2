/**
 * @xfactory/types — Shared domain types for the xfactory stack.
 *
 * These types are used across all xfactory packages:
 * - Hex primitives (addresses, salts, creation code)
 * - Chain references
 * - Bridge limits, lockbox modes and factory events
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Primitive types
export type { Address, Hex } from "./primitives.js";

// Chain types
export type { ChainId, ChainRef } from "./chain.js";

// Deployment types
export type {
  BridgeLimitEntry,
  LockboxMode,
  FactoryEventName,
  FactoryEvent,
} from "./deployment.js";

// Runtime type guards
export { isAddressLike, isFactoryEventName, isFactoryEvent } from "./guards.js";
