/**
 * @xfactory/factory — TokenFactory.
 *
 * Creates bridgeable tokens and their lockboxes at addresses that depend
 * only on the factory address, the creation code and the inputs. Every
 * public workflow is one transaction on the bound chain: if any step
 * throws, nothing the workflow did is kept and the error propagates
 * unchanged.
 *
 * Workflows:
 *   deployToken(owner, salt)          create → hand to owner → TokenDeployed
 *   deployToken(limits, bridges)      create → limits → hand to caller → TokenDeployed
 *   deployLockbox                     check mode → create → LockboxDeployed
 *   deployTokenWithLockbox            check mode & lengths → create token → limits
 *                                     → TokenDeployed → create lockbox
 *                                     → LockboxDeployed → link → hand to caller
 *
 * While a workflow runs, the factory owns the new token. Ownership always
 * moves last, after which the factory has no rights over it.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { Chain, Created, Receipt, TransactionContext } from "@xfactory/chain";
import { Lockbox, XToken } from "@xfactory/contracts";
import type { Address, ChainId, FactoryEvent, Hex } from "@xfactory/types";
import {
  ZERO_SALT,
  lockboxInitCode,
  lockboxSalt,
  normalizeSalt,
  predictLockboxAddress,
  predictTokenAddress,
  requireAddress,
  tokenInitCode,
  tokenSalt,
} from "./address-derivation.js";
import { assertMatchingLengths, provisionBridgeLimits } from "./bridge-limits.js";
import { assertLockboxMode, linkLockbox } from "./lockbox-linker.js";
import { readFactoryEvents } from "./events.js";
import { StageTrace } from "./stage-trace.js";
import { FactoryError } from "./types.js";
import type {
  DeploymentBase,
  FactoryConfig,
  LockboxDeployment,
  SaltInput,
  TokenDeployment,
  TokenFactoryOptions,
  TokenWithLockboxDeployment,
  WorkflowName,
} from "./types.js";

export class TokenFactory {
  readonly chain: Chain;
  readonly address: Address;
  readonly tokenBytecode: Hex;
  readonly lockboxBytecode: Hex;

  private readonly _logger: Logger;

  constructor(chain: Chain, config: FactoryConfig, options: TokenFactoryOptions = {}) {
    this.chain = chain;
    this.address = requireAddress(config.address, "factory");
    this.tokenBytecode = config.tokenBytecode;
    this.lockboxBytecode = config.lockboxBytecode;
    this._logger = (options.logger ?? pino({ level: "silent" })).child({
      component: "token-factory",
      chainId: chain.chainId,
      factory: this.address,
    });
  }

  get chainId(): ChainId {
    return this.chain.chainId;
  }

  // ─── Dry run ────────────────────────────────────────────────────────

  /** Where deployToken(owner, salt) would put the token. */
  computeTokenAddress(
    name: string,
    symbol: string,
    owner: Address,
    salt: SaltInput = ZERO_SALT,
  ): Address {
    return predictTokenAddress({
      factory: this.address,
      tokenBytecode: this.tokenBytecode,
      name,
      symbol,
      owner,
      salt,
    });
  }

  /** Where deployLockbox would put the lockbox. Does not check the mode. */
  computeLockboxAddress(token: Address, baseAsset: Address, isNative: boolean): Address {
    return predictLockboxAddress({
      factory: this.address,
      lockboxBytecode: this.lockboxBytecode,
      token,
      baseAsset,
      isNative,
    });
  }

  // ─── Workflows ──────────────────────────────────────────────────────

  /**
   * Create a token owned by `owner`, salted with (owner, salt).
   */
  deployToken(
    sender: Address,
    name: string,
    symbol: string,
    owner: Address,
    salt: SaltInput,
  ): TokenDeployment;

  /**
   * Create a token owned by `sender`, with a mint limit per bridge and the
   * default discriminator.
   *
   * Calling this twice from the same sender with the same name and symbol
   * collides on the second call.
   */
  deployToken(
    sender: Address,
    name: string,
    symbol: string,
    minterLimits: readonly bigint[],
    bridges: readonly Address[],
  ): TokenDeployment;

  deployToken(
    sender: Address,
    name: string,
    symbol: string,
    ownerOrLimits: Address | readonly bigint[],
    saltOrBridges: SaltInput | readonly Address[],
  ): TokenDeployment {
    if (typeof ownerOrLimits === "string") {
      if (typeof saltOrBridges !== "string" && typeof saltOrBridges !== "bigint") {
        throw new FactoryError("INVALID_ARGUMENT", "deployToken(owner, salt) needs a salt");
      }
      return this._deployTokenFor(sender, name, symbol, ownerOrLimits, saltOrBridges);
    }
    if (typeof saltOrBridges === "string" || typeof saltOrBridges === "bigint") {
      throw new FactoryError(
        "INVALID_ARGUMENT",
        "deployToken(minterLimits, bridges) needs a bridge list",
      );
    }
    return this._deployTokenWithLimits(sender, name, symbol, ownerOrLimits, saltOrBridges);
  }

  /**
   * Create a lockbox for (token, baseAsset, isNative). The token is not
   * required to exist.
   */
  deployLockbox(
    sender: Address,
    token: Address,
    baseAsset: Address,
    isNative: boolean,
  ): LockboxDeployment {
    return this._run("deployLockbox", sender, (caller, trace) => {
      assertLockboxMode(baseAsset, isNative);
      const tokenAddress = requireAddress(token, "token");
      trace.enter("validated");

      const receipt = this.chain.execute(caller, (tx) => {
        const lockbox = this._createLockbox(tx, tokenAddress, baseAsset, isNative);
        trace.enter("lockbox-created");
        return lockbox;
      });

      return { ...this._complete(receipt, trace), lockbox: receipt.result };
    });
  }

  /**
   * Create a token with bridge limits and a linked lockbox in one
   * transaction, then hand the token to `sender`.
   */
  deployTokenWithLockbox(
    sender: Address,
    name: string,
    symbol: string,
    minterLimits: readonly bigint[],
    bridges: readonly Address[],
    baseAsset: Address,
    isNative: boolean,
  ): TokenWithLockboxDeployment {
    return this._run("deployTokenWithLockbox", sender, (caller, trace) => {
      assertLockboxMode(baseAsset, isNative);
      assertMatchingLengths(minterLimits, bridges);
      trace.enter("validated");

      const receipt = this.chain.execute(caller, (tx) => {
        const token = this._createToken(tx, name, symbol, tx.sender, ZERO_SALT);
        trace.enter("token-created");

        provisionBridgeLimits(token.contract, this.address, minterLimits, bridges);
        trace.enter("limits-applied");
        this._emit(tx, { name: "TokenDeployed", args: { token: token.address } });

        const lockbox = this._createLockbox(tx, token.address, baseAsset, isNative);
        trace.enter("lockbox-created");

        linkLockbox(token.contract, this.address, lockbox);
        trace.enter("linked");

        token.contract.transferOwnership(this.address, tx.sender);
        trace.enter("ownership-transferred");

        return { token: token.address, lockbox };
      });

      return {
        ...this._complete(receipt, trace),
        token: receipt.result.token,
        lockbox: receipt.result.lockbox,
      };
    });
  }

  // ─── Token overloads ────────────────────────────────────────────────

  private _deployTokenFor(
    sender: Address,
    name: string,
    symbol: string,
    owner: Address,
    salt: SaltInput,
  ): TokenDeployment {
    return this._run("deployToken", sender, (caller, trace) => {
      const tokenOwner = requireAddress(owner, "owner");
      const discriminator = normalizeSalt(salt);
      trace.enter("validated");

      const receipt = this.chain.execute(caller, (tx) => {
        const token = this._createToken(tx, name, symbol, tokenOwner, discriminator);
        trace.enter("token-created");

        token.contract.transferOwnership(this.address, tokenOwner);
        trace.enter("ownership-transferred");
        this._emit(tx, { name: "TokenDeployed", args: { token: token.address } });

        return token.address;
      });

      return { ...this._complete(receipt, trace), token: receipt.result };
    });
  }

  private _deployTokenWithLimits(
    sender: Address,
    name: string,
    symbol: string,
    minterLimits: readonly bigint[],
    bridges: readonly Address[],
  ): TokenDeployment {
    return this._run("deployTokenWithLimits", sender, (caller, trace) => {
      assertMatchingLengths(minterLimits, bridges);
      trace.enter("validated");

      const receipt = this.chain.execute(caller, (tx) => {
        const token = this._createToken(tx, name, symbol, tx.sender, ZERO_SALT);
        trace.enter("token-created");

        provisionBridgeLimits(token.contract, this.address, minterLimits, bridges);
        trace.enter("limits-applied");

        token.contract.transferOwnership(this.address, tx.sender);
        trace.enter("ownership-transferred");
        this._emit(tx, { name: "TokenDeployed", args: { token: token.address } });

        return token.address;
      });

      return { ...this._complete(receipt, trace), token: receipt.result };
    });
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _run<T extends DeploymentBase>(
    workflow: WorkflowName,
    sender: Address,
    fn: (caller: Address, trace: StageTrace) => T,
  ): T {
    const logger = this._logger.child({ workflow });
    const trace = new StageTrace(logger);
    try {
      const result = fn(requireAddress(sender, "sender"), trace);
      logger.info(
        { sender, txIndex: result.txIndex, created: result.events.map((event) => event.args) },
        `${workflow} committed`,
      );
      return result;
    } catch (err) {
      logger.warn({ sender, stages: trace.stages, err }, `${workflow} aborted`);
      throw err;
    }
  }

  /** Created with the factory as its owner. */
  private _createToken(
    tx: TransactionContext,
    name: string,
    symbol: string,
    saltOwner: Address,
    discriminator: Hex,
  ): Created<XToken> {
    return tx.create2({
      deployer: this.address,
      salt: tokenSalt(saltOwner, discriminator),
      initCode: tokenInitCode(this.tokenBytecode, name, symbol, this.address),
      instantiate: () => new XToken(name, symbol, this.address),
    });
  }

  /** Creates the lockbox and emits LockboxDeployed. */
  private _createLockbox(
    tx: TransactionContext,
    token: Address,
    baseAsset: Address,
    isNative: boolean,
  ): Address {
    const { address } = tx.create2({
      deployer: this.address,
      salt: lockboxSalt(token, baseAsset, isNative),
      initCode: lockboxInitCode(this.lockboxBytecode, token, baseAsset, isNative),
      instantiate: () => new Lockbox(token, baseAsset, isNative),
    });
    this._emit(tx, { name: "LockboxDeployed", args: { lockbox: address } });
    return address;
  }

  private _emit(tx: TransactionContext, event: FactoryEvent): void {
    tx.emit(this.address, event.name, event.args);
  }

  private _complete<R>(receipt: Receipt<R>, trace: StageTrace): DeploymentBase {
    trace.enter("done");
    return {
      chainId: receipt.chainId,
      txIndex: receipt.txIndex,
      stages: trace.stages,
      logs: receipt.logs,
      events: readFactoryEvents(receipt.logs, this.address),
    };
  }
}
