/**
 * @xfactory/chain — Core types.
 *
 * Defines the contract, transaction and log shapes of the in-process
 * execution environment.
 *
 * Design principles:
 * - A transaction is all-or-nothing: a thrown error discards every effect
 * - Admission into the address space is exclusive-by-address
 * - Logs are append-only and ordered by (txIndex, logIndex)
 */

import type { Logger } from "pino";
import type { Address, ChainId, Hex } from "@xfactory/types";

// =============================================================================
// Contracts
// =============================================================================

/**
 * Code living at an address.
 *
 * `clone()` must return an independent copy: transactions run against
 * clones and only replace the committed state on success.
 */
export interface Contract {
  /** Contract kind (e.g., "XToken", "Lockbox") */
  readonly kind: string;

  clone(): Contract;
}

/**
 * Narrows a stored contract to a concrete class.
 */
export type ContractGuard<T extends Contract> = (contract: Contract) => contract is T;

/**
 * Parameters of a CREATE2 creation.
 */
export interface Create2Request<T extends Contract> {
  /** Creating account (the factory) */
  readonly deployer: Address;

  /** 32-byte salt */
  readonly salt: Hex;

  /** Creation code followed by ABI-encoded constructor arguments */
  readonly initCode: Hex;

  /** Runs the constructor; receives the address the contract will live at */
  readonly instantiate: (address: Address) => T;
}

/**
 * A contract created inside a transaction.
 */
export interface Created<T extends Contract> {
  readonly address: Address;
  readonly contract: T;
}

// =============================================================================
// Logs
// =============================================================================

/**
 * An event emitted during a committed transaction.
 */
export interface ChainLog {
  readonly chainId: ChainId;

  /** Index of the committing transaction (0-based) */
  readonly txIndex: number;

  /** Position within the chain-wide log (0-based) */
  readonly logIndex: number;

  /** Account that emitted the event */
  readonly emitter: Address;

  /** Event name (e.g., "TokenDeployed") */
  readonly name: string;

  readonly args: Readonly<Record<string, unknown>>;
}

/**
 * Filter for reading logs. All given fields must match.
 */
export interface LogFilter {
  readonly emitter?: Address | undefined;
  readonly name?: string | undefined;
  readonly txIndex?: number | undefined;
}

/**
 * Callback for log subscriptions.
 */
export type LogHandler = (log: ChainLog) => void;

export interface ChainOptions {
  /** Receives subscriber failures. Defaults to a silent pino logger */
  readonly logger?: Logger | undefined;
}

/**
 * A subscription that can be unsubscribed.
 */
export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Transactions
// =============================================================================

/**
 * Handle given to a transaction body.
 * Every effect made through it is discarded if the body throws.
 */
export interface TransactionContext {
  readonly chainId: ChainId;

  /** Principal that submitted the transaction */
  readonly sender: Address;

  /**
   * Create a contract at its CREATE2 address.
   * Throws ChainError("ADDRESS_COLLISION") if the address is occupied.
   */
  create2<T extends Contract>(request: Create2Request<T>): Created<T>;

  /**
   * Resolve the contract at an address within this transaction's view.
   */
  at<T extends Contract>(address: Address, guard: ContractGuard<T>): T;

  hasCode(address: Address): boolean;

  /** Record an event; it becomes visible only if the transaction commits. */
  emit(emitter: Address, name: string, args: Readonly<Record<string, unknown>>): void;
}

/**
 * Result of a committed transaction.
 */
export interface Receipt<T> {
  readonly chainId: ChainId;
  readonly txIndex: number;
  readonly sender: Address;
  readonly result: T;

  /** Logs emitted by this transaction, in emission order */
  readonly logs: readonly ChainLog[];

  /** Addresses created by this transaction, in creation order */
  readonly created: readonly Address[];
}

// =============================================================================
// Errors
// =============================================================================

/** Error codes for execution-environment operations. */
export type ChainErrorCode =
  | "ADDRESS_COLLISION"
  | "CONTRACT_NOT_FOUND"
  | "CONTRACT_KIND_MISMATCH"
  | "INVALID_SALT"
  | "INVALID_INIT_CODE"
  | "INVALID_ADDRESS"
  | "DUPLICATE_CHAIN"
  | "UNKNOWN_CHAIN"
  | "REENTRANT_EXECUTION";

/**
 * Structured error from the execution environment.
 * Always thrown.
 */
export class ChainError extends Error {
  public readonly code: ChainErrorCode;
  public readonly chainId: ChainId | undefined;

  constructor(code: ChainErrorCode, message: string, chainId?: ChainId) {
    super(message);
    this.name = "ChainError";
    this.code = code;
    this.chainId = chainId;
  }
}
