/**
 * XToken — bridgeable token collaborator.
 *
 * Holds what the factory provisions: an owner, one limit record per
 * bridge, and a single lockbox slot. Minting, burning and the rate-limit
 * refill model live outside this package.
 *
 * Every setter is owner-only and overwrites; nothing is accumulated.
 */

import { zeroAddress } from "viem";
import type { Address } from "@xfactory/types";
import type { Contract } from "@xfactory/chain";
import { requireAddress } from "./address.js";
import { Ownable } from "./ownable.js";
import { ContractError, UINT256_MAX } from "./types.js";
import type { BridgeLimits } from "./types.js";

export class XToken extends Ownable implements Contract {
  readonly kind = "XToken";
  readonly name: string;
  readonly symbol: string;

  /** Principal that constructed the token; the initial owner */
  readonly factory: Address;

  private _lockbox: Address = zeroAddress;
  private readonly _limits = new Map<Address, BridgeLimits>();

  constructor(name: string, symbol: string, controller: Address) {
    super(controller);
    this.name = name;
    this.symbol = symbol;
    this.factory = this.owner;
  }

  // ─── Administration ─────────────────────────────────────────────────

  /**
   * Replace the limit record of `bridge`.
   */
  setLimits(caller: Address, bridge: Address, mintingLimit: bigint, burningLimit: bigint): void {
    this.onlyOwner(caller);
    const key = requireAddress(bridge, "bridge");
    assertUint256(mintingLimit, "minting");
    assertUint256(burningLimit, "burning");
    this._limits.set(key, { mintingMaxLimit: mintingLimit, burningMaxLimit: burningLimit });
  }

  /**
   * Point the token at its active lockbox, replacing any previous one.
   */
  setLockbox(caller: Address, lockbox: Address): void {
    this.onlyOwner(caller);
    this._lockbox = requireAddress(lockbox, "lockbox");
  }

  // ─── Views ──────────────────────────────────────────────────────────

  /** Active lockbox, or the zero address when none is linked. */
  get lockbox(): Address {
    return this._lockbox;
  }

  mintingMaxLimitOf(bridge: Address): bigint {
    return this._limits.get(requireAddress(bridge, "bridge"))?.mintingMaxLimit ?? 0n;
  }

  burningMaxLimitOf(bridge: Address): bigint {
    return this._limits.get(requireAddress(bridge, "bridge"))?.burningMaxLimit ?? 0n;
  }

  limitsOf(bridge: Address): BridgeLimits | undefined {
    return this._limits.get(requireAddress(bridge, "bridge"));
  }

  /** Bridges with a limit record, in first-write order. */
  bridges(): readonly Address[] {
    return [...this._limits.keys()];
  }

  clone(): XToken {
    const copy = new XToken(this.name, this.symbol, this.factory);
    copy.copyOwnerFrom(this);
    copy._lockbox = this._lockbox;
    for (const [bridge, limits] of this._limits) {
      copy._limits.set(bridge, limits);
    }
    return copy;
  }
}

export function isXToken(contract: Contract): contract is XToken {
  return contract instanceof XToken;
}

function assertUint256(value: bigint, label: string): void {
  if (value < 0n || value > UINT256_MAX) {
    throw new ContractError("INVALID_LIMIT", `The ${label} limit must fit in uint256, got ${value}`);
  }
}
