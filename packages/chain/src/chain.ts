/**
 * @xfactory/chain — In-process execution environment.
 *
 * Stands in for one EVM chain: an address space of contracts, an ordered
 * event log, and a transaction boundary that makes every multi-step
 * workflow atomic.
 *
 * Properties:
 * - Transactions run against cloned state; commit swaps it in, a throw drops it
 * - CREATE2 admission is exclusive-by-address (first commit wins)
 * - Logs become visible only on commit
 * - Synchronous subscription dispatch after commit; a failing subscriber
 *   is logged and never turns a committed transaction into an error
 * - No gas, no nonces, no blocks
 */

import pino from "pino";
import type { Logger } from "pino";
import type { Address, ChainId, ChainRef } from "@xfactory/types";
import { isEvmChain } from "./chains.js";
import { assertCreate2Salt, computeCreate2Address, normalizeAddress } from "./create2.js";
import type {
  ChainLog,
  ChainOptions,
  Contract,
  ContractGuard,
  Create2Request,
  Created,
  LogFilter,
  LogHandler,
  Receipt,
  Subscription,
  TransactionContext,
} from "./types.js";
import { ChainError } from "./types.js";

interface PendingLog {
  readonly emitter: Address;
  readonly name: string;
  readonly args: Readonly<Record<string, unknown>>;
}

/**
 * A single, independent execution environment.
 *
 * Two Chain instances never share state; deploying the same inputs on
 * both yields the same addresses because CREATE2 ignores local state.
 */
export class Chain {
  readonly ref: ChainRef;

  /** Committed contracts by checksummed address */
  private _state = new Map<Address, Contract>();

  /** Committed logs, in commit order */
  private readonly _logs: ChainLog[] = [];

  private readonly _subscribers = new Set<LogHandler>();

  /** Number of committed transactions */
  private _txCount = 0;

  private _executing = false;

  private readonly _logger: Logger;

  constructor(ref: ChainRef, options: ChainOptions = {}) {
    if (ref.family !== "evm" || !isEvmChain(ref.chainId)) {
      throw new ChainError(
        "UNKNOWN_CHAIN",
        `Chain: expected an EVM chain, got family '${ref.family}'`,
        ref.chainId,
      );
    }
    this.ref = ref;
    this._logger = (options.logger ?? pino({ level: "silent" })).child({
      component: "chain",
      chainId: ref.chainId,
    });
  }

  get chainId(): ChainId {
    return this.ref.chainId;
  }

  get transactionCount(): number {
    return this._txCount;
  }

  // ─── Execute ────────────────────────────────────────────────────────

  /**
   * Run `body` as one atomic transaction submitted by `sender`.
   *
   * If `body` throws, nothing it did is kept and the error is rethrown
   * unchanged. Nested execution from inside a body is rejected.
   */
  execute<T>(sender: Address, body: (tx: TransactionContext) => T): Receipt<T> {
    const chainId = this.chainId;
    const from = normalizeAddress(sender, "sender", chainId);

    if (this._executing) {
      throw new ChainError(
        "REENTRANT_EXECUTION",
        "Cannot start a transaction while another is executing",
        chainId,
      );
    }

    const working = new Map<Address, Contract>();
    for (const [address, contract] of this._state) {
      working.set(address, contract.clone());
    }
    const pending: PendingLog[] = [];
    const created: Address[] = [];

    const tx: TransactionContext = {
      chainId,
      sender: from,
      create2: <C extends Contract>(request: Create2Request<C>): Created<C> => {
        assertCreate2Salt(request.salt, chainId);
        const address = computeCreate2Address(request.deployer, request.salt, request.initCode);
        if (working.has(address)) {
          throw new ChainError(
            "ADDRESS_COLLISION",
            `Deployment collision: code already exists at ${address}`,
            chainId,
          );
        }
        const contract = request.instantiate(address);
        working.set(address, contract);
        created.push(address);
        return { address, contract };
      },
      at: <C extends Contract>(address: Address, guard: ContractGuard<C>): C =>
        resolveContract(working, normalizeAddress(address, "contract", chainId), guard, chainId),
      hasCode: (address) => working.has(normalizeAddress(address, "contract", chainId)),
      emit: (emitter, name, args) => {
        pending.push({ emitter: normalizeAddress(emitter, "emitter", chainId), name, args });
      },
    };

    const result = this._runBody(body, tx);

    // Commit
    const txIndex = this._txCount++;
    this._state = working;
    const firstLogIndex = this._logs.length;
    const logs: ChainLog[] = pending.map((log, i) => ({
      chainId,
      txIndex,
      logIndex: firstLogIndex + i,
      emitter: log.emitter,
      name: log.name,
      args: log.args,
    }));
    this._logs.push(...logs);
    this._dispatch(logs);

    return { chainId, txIndex, sender: from, result, logs, created };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  hasCode(address: Address): boolean {
    return this._state.has(normalizeAddress(address, "contract", this.chainId));
  }

  /**
   * Snapshot of the committed contract at `address`, or undefined.
   *
   * The returned object is a copy: mutating it never reaches the chain.
   * Throws ChainError("CONTRACT_KIND_MISMATCH") if code of another kind lives there.
   */
  contractAt<T extends Contract>(address: Address, guard: ContractGuard<T>): T | undefined {
    const key = normalizeAddress(address, "contract", this.chainId);
    if (!this._state.has(key)) {
      return undefined;
    }
    const snapshot = resolveContract(this._state, key, guard, this.chainId).clone();
    if (!guard(snapshot)) {
      throw new ChainError(
        "CONTRACT_KIND_MISMATCH",
        `Clone of ${key} changed kind to '${snapshot.kind}'`,
        this.chainId,
      );
    }
    return snapshot;
  }

  /** All occupied addresses, in no particular order. */
  addresses(): readonly Address[] {
    return [...this._state.keys()];
  }

  logs(filter?: LogFilter): readonly ChainLog[] {
    if (filter === undefined) {
      return [...this._logs];
    }
    const emitter =
      filter.emitter !== undefined
        ? normalizeAddress(filter.emitter, "emitter", this.chainId)
        : undefined;
    return this._logs.filter(
      (log) =>
        (emitter === undefined || log.emitter === emitter) &&
        (filter.name === undefined || log.name === filter.name) &&
        (filter.txIndex === undefined || log.txIndex === filter.txIndex),
    );
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  /**
   * Receive every log committed from now on. Handlers run synchronously
   * after commit; one that throws does not affect the transaction or the
   * other handlers.
   */
  subscribe(handler: LogHandler): Subscription {
    this._subscribers.add(handler);
    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _runBody<T>(body: (tx: TransactionContext) => T, tx: TransactionContext): T {
    this._executing = true;
    try {
      return body(tx);
    } finally {
      this._executing = false;
    }
  }

  /** Runs after commit, so a handler error is logged and not rethrown. */
  private _dispatch(logs: readonly ChainLog[]): void {
    for (const handler of this._subscribers) {
      for (const log of logs) {
        try {
          handler(log);
        } catch (err: unknown) {
          this._logger.error(
            { err, txIndex: log.txIndex, logIndex: log.logIndex, event: log.name },
            "Log subscriber failed",
          );
        }
      }
    }
  }
}

function resolveContract<T extends Contract>(
  state: ReadonlyMap<Address, Contract>,
  address: Address,
  guard: ContractGuard<T>,
  chainId: ChainId,
): T {
  const contract = state.get(address);
  if (contract === undefined) {
    throw new ChainError("CONTRACT_NOT_FOUND", `No contract at ${address}`, chainId);
  }
  if (!guard(contract)) {
    throw new ChainError(
      "CONTRACT_KIND_MISMATCH",
      `Contract at ${address} is a '${contract.kind}'`,
      chainId,
    );
  }
  return contract;
}
