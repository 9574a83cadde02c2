/**
 * Lockbox — custody collaborator.
 *
 * Pairs one token with one base asset (or the native gas asset).
 * All fields are fixed at construction; deposit/withdraw accounting is
 * not modeled here.
 */

import type { Address, LockboxMode } from "@xfactory/types";
import type { Contract } from "@xfactory/chain";
import { requireAddress } from "./address.js";

export class Lockbox implements Contract {
  readonly kind = "Lockbox";
  readonly token: Address;

  /** ERC-20 held in custody; the zero address in native mode */
  readonly baseAsset: Address;
  readonly isNative: boolean;

  constructor(token: Address, baseAsset: Address, isNative: boolean) {
    this.token = requireAddress(token, "token");
    this.baseAsset = requireAddress(baseAsset, "base asset");
    this.isNative = isNative;
  }

  get mode(): LockboxMode {
    return this.isNative ? "native" : "erc20";
  }

  /** Immutable, so the instance is its own copy. */
  clone(): Lockbox {
    return this;
  }
}

export function isLockbox(contract: Contract): contract is Lockbox {
  return contract instanceof Lockbox;
}
