/**
 * Chain Registry
 *
 * Manages multiple Chains for multi-chain rollouts.
 * Provides a single entry point for running the same workflow everywhere.
 *
 * Design rules:
 * - Chains are registered, not auto-discovered
 * - Each chain id has at most one Chain
 * - Chains are visited in registration order
 * - Individual chain failures don't block others
 */

import type { Address, ChainId } from "@xfactory/types";
import type { Chain } from "./chain.js";
import type { Receipt, TransactionContext } from "./types.js";
import { ChainError } from "./types.js";

/**
 * A value produced on one chain.
 */
export interface ChainOutcome<T> {
  readonly chainId: ChainId;
  readonly value: T;
}

/**
 * A failure on one chain. `code` is set when the error carried one.
 */
export interface ChainFailure {
  readonly chainId: ChainId;
  readonly error: string;
  readonly code?: string | undefined;
}

/**
 * Result of a multi-chain operation that may partially fail.
 */
export interface MultiChainResult<T> {
  readonly successes: readonly T[];
  readonly errors: readonly ChainFailure[];
}

export class ChainRegistry {
  private readonly chains: Map<ChainId, Chain> = new Map();

  /**
   * Register a chain.
   * Throws if a chain with this id is already registered.
   */
  register(chain: Chain): void {
    if (this.chains.has(chain.chainId)) {
      throw new ChainError(
        "DUPLICATE_CHAIN",
        `ChainRegistry: chain '${chain.chainId}' is already registered`,
        chain.chainId,
      );
    }
    this.chains.set(chain.chainId, chain);
  }

  /**
   * Unregister a chain.
   * Returns true if a chain was removed, false if none was registered.
   */
  unregister(chainId: ChainId): boolean {
    return this.chains.delete(chainId);
  }

  /**
   * Get a registered chain.
   * Throws if no chain is registered under this id.
   */
  get(chainId: ChainId): Chain {
    const chain = this.chains.get(chainId);
    if (!chain) {
      throw new ChainError(
        "UNKNOWN_CHAIN",
        `ChainRegistry: no chain registered for '${chainId}'`,
        chainId,
      );
    }
    return chain;
  }

  has(chainId: ChainId): boolean {
    return this.chains.has(chainId);
  }

  listChains(): readonly ChainId[] {
    return [...this.chains.keys()];
  }

  /**
   * Run `fn` against each target chain independently.
   * A throw on one chain is recorded and the next chain still runs.
   */
  runAll<T>(
    fn: (chain: Chain) => T,
    chainIds?: readonly ChainId[],
  ): MultiChainResult<ChainOutcome<T>> {
    const targets = chainIds ?? this.listChains();
    const successes: ChainOutcome<T>[] = [];
    const errors: ChainFailure[] = [];

    for (const chainId of targets) {
      const chain = this.chains.get(chainId);
      if (!chain) {
        errors.push({
          chainId,
          error: `No chain registered for '${chainId}'`,
          code: "UNKNOWN_CHAIN",
        });
        continue;
      }
      try {
        successes.push({ chainId, value: fn(chain) });
      } catch (err: unknown) {
        errors.push(toFailure(chainId, err));
      }
    }

    return { successes, errors };
  }

  /**
   * Submit the same transaction body to each target chain.
   */
  executeAll<T>(
    sender: Address,
    body: (tx: TransactionContext) => T,
    chainIds?: readonly ChainId[],
  ): MultiChainResult<Receipt<T>> {
    const result = this.runAll((chain) => chain.execute(sender, body), chainIds);
    return {
      successes: result.successes.map((outcome) => outcome.value),
      errors: result.errors,
    };
  }
}

function toFailure(chainId: ChainId, err: unknown): ChainFailure {
  if (err instanceof Error) {
    const code = "code" in err && typeof err.code === "string" ? err.code : undefined;
    return { chainId, error: err.message, code };
  }
  return { chainId, error: String(err) };
}
