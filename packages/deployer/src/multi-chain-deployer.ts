/**
 * @xfactory/deployer — Multi-chain rollout.
 *
 * Runs one factory request on every registered chain. Each chain hosts
 * its own TokenFactory at the same address, so a successful request
 * lands at the same token (and lockbox) address everywhere.
 *
 * Design rules:
 * - A failure on one chain is recorded; the other chains still run
 * - Failed chains are never retried (a collision stays a collision)
 * - Planning reads no chain state
 */

import pino from "pino";
import type { Logger } from "pino";
import type { Chain, ChainRegistry } from "@xfactory/chain";
import {
  TokenFactory,
  ZERO_SALT,
  predictLockboxAddress,
  predictTokenAddress,
  requireAddress,
} from "@xfactory/factory";
import type { FactoryConfig } from "@xfactory/factory";
import type { Address, ChainId } from "@xfactory/types";
import type {
  AddressAgreement,
  ChainAddresses,
  ChainDeployment,
  DeploymentPlan,
  RolloutRequest,
  RolloutResult,
} from "./types.js";

export interface MultiChainDeployerOptions {
  /** Defaults to a silent pino logger */
  readonly logger?: Logger | undefined;
}

export class MultiChainDeployer {
  readonly registry: ChainRegistry;
  readonly config: FactoryConfig;

  private readonly _rootLogger: Logger;
  private readonly _logger: Logger;
  private readonly _factories = new Map<ChainId, TokenFactory>();

  constructor(registry: ChainRegistry, config: FactoryConfig, options: MultiChainDeployerOptions = {}) {
    this.registry = registry;
    this.config = { ...config, address: requireAddress(config.address, "factory") };
    this._rootLogger = options.logger ?? pino({ level: "silent" });
    this._logger = this._rootLogger.child({ component: "deployer" });
  }

  /**
   * The factory bound to `chainId`. Throws ChainError("UNKNOWN_CHAIN")
   * when the chain is not registered.
   */
  factory(chainId: ChainId): TokenFactory {
    return this._factoryFor(this.registry.get(chainId));
  }

  /**
   * Addresses `request` would produce when sent by `sender`.
   */
  plan(sender: Address, request: RolloutRequest, chainIds?: readonly ChainId[]): DeploymentPlan {
    const chains = chainIds ?? this.registry.listChains();
    const owner = request.kind === "token" ? request.owner : requireAddress(sender, "sender");
    const token = predictTokenAddress({
      factory: this.config.address,
      tokenBytecode: this.config.tokenBytecode,
      name: request.name,
      symbol: request.symbol,
      owner,
      salt: request.kind === "token" ? request.salt : ZERO_SALT,
    });

    if (request.kind !== "token-with-lockbox") {
      return { factory: this.config.address, chains, token };
    }
    const lockbox = predictLockboxAddress({
      factory: this.config.address,
      lockboxBytecode: this.config.lockboxBytecode,
      token,
      baseAsset: request.baseAsset,
      isNative: request.isNative,
    });
    return { factory: this.config.address, chains, token, lockbox };
  }

  /**
   * Run `request` on each target chain (default: all registered).
   */
  rollout(sender: Address, request: RolloutRequest, chainIds?: readonly ChainId[]): RolloutResult {
    const result = this.registry.runAll(
      (chain) => dispatch(this._factoryFor(chain), sender, request),
      chainIds,
    );

    for (const failure of result.errors) {
      this._logger.warn(
        { kind: request.kind, chainId: failure.chainId, code: failure.code, error: failure.error },
        "Rollout failed on chain",
      );
    }
    this._logger.info(
      {
        kind: request.kind,
        succeeded: result.successes.map((outcome) => outcome.chainId),
        failed: result.errors.map((failure) => failure.chainId),
      },
      "Rollout finished",
    );

    return result;
  }

  private _factoryFor(chain: Chain): TokenFactory {
    const cached = this._factories.get(chain.chainId);
    if (cached !== undefined && cached.chain === chain) {
      return cached;
    }
    const factory = new TokenFactory(chain, this.config, { logger: this._rootLogger });
    this._factories.set(chain.chainId, factory);
    return factory;
  }
}

function dispatch(factory: TokenFactory, sender: Address, request: RolloutRequest): ChainDeployment {
  switch (request.kind) {
    case "token":
      return factory.deployToken(sender, request.name, request.symbol, request.owner, request.salt);
    case "token-with-limits":
      return factory.deployToken(
        sender,
        request.name,
        request.symbol,
        request.minterLimits,
        request.bridges,
      );
    case "token-with-lockbox":
      return factory.deployTokenWithLockbox(
        sender,
        request.name,
        request.symbol,
        request.minterLimits,
        request.bridges,
        request.baseAsset,
        request.isNative,
      );
  }
}

/**
 * Compare the addresses each successful chain produced.
 */
export function checkAddressAgreement(result: RolloutResult): AddressAgreement {
  const byChain: ChainAddresses[] = result.successes.map(({ chainId, value }) =>
    "lockbox" in value
      ? { chainId, token: value.token, lockbox: value.lockbox }
      : { chainId, token: value.token },
  );

  const [first, ...rest] = byChain;
  if (first === undefined) {
    return { agreed: false, byChain };
  }
  const agreed = rest.every(
    (entry) => entry.token === first.token && entry.lockbox === first.lockbox,
  );
  return { agreed, byChain };
}
