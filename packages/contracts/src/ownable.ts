/**
 * Single-owner access control.
 *
 * The owner is the only principal allowed to make administrative calls.
 * Ownership moves only through `transferOwnership`, called by the
 * current owner.
 */

import { zeroAddress } from "viem";
import type { Address } from "@xfactory/types";
import { requireAddress } from "./address.js";
import { ContractError } from "./types.js";

export abstract class Ownable {
  private _owner: Address;

  protected constructor(initialOwner: Address) {
    this._owner = Ownable._checkOwner(initialOwner);
  }

  get owner(): Address {
    return this._owner;
  }

  /**
   * Hand administrative rights to `newOwner`.
   * Throws UNAUTHORIZED unless `caller` is the current owner.
   */
  transferOwnership(caller: Address, newOwner: Address): void {
    this.onlyOwner(caller);
    this._owner = Ownable._checkOwner(newOwner);
  }

  protected onlyOwner(caller: Address): void {
    if (requireAddress(caller, "caller") !== this._owner) {
      throw new ContractError(
        "UNAUTHORIZED",
        `Caller ${caller} is not the owner (${this._owner})`,
      );
    }
  }

  /** Copy the owner of `source` onto this instance (used by clone()). */
  protected copyOwnerFrom(source: Ownable): void {
    this._owner = source._owner;
  }

  private static _checkOwner(owner: Address): Address {
    const checked = requireAddress(owner, "owner", "INVALID_OWNER");
    if (checked === zeroAddress) {
      throw new ContractError("INVALID_OWNER", "Owner cannot be the zero address");
    }
    return checked;
  }
}
