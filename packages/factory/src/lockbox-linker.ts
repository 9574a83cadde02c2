/**
 * @xfactory/factory — Lockbox mode check and linkage.
 */

import { isAddressEqual, zeroAddress } from "viem";
import type { XToken } from "@xfactory/contracts";
import type { Address, LockboxMode } from "@xfactory/types";
import { requireAddress } from "./address-derivation.js";
import { FactoryError } from "./types.js";

/**
 * A native lockbox must use the zero address as base asset; an ERC-20
 * lockbox must not. Anything else throws FactoryError("BAD_TOKEN_ADDRESS").
 */
export function assertLockboxMode(baseAsset: Address, isNative: boolean): LockboxMode {
  const asset = requireAddress(baseAsset, "base asset");
  const isZero = isAddressEqual(asset, zeroAddress);
  if (isZero && !isNative) {
    throw new FactoryError(
      "BAD_TOKEN_ADDRESS",
      "Base asset is the zero address but the lockbox is not native",
    );
  }
  if (!isZero && isNative) {
    throw new FactoryError(
      "BAD_TOKEN_ADDRESS",
      `Native lockbox cannot take an ERC-20 base asset (${asset})`,
    );
  }
  return isNative ? "native" : "erc20";
}

/**
 * Make `lockbox` the token's active lockbox, replacing any earlier link.
 *
 * `operator` must own the token. The lockbox's own token reference is not
 * compared with `token`; callers link only the lockbox they just created.
 */
export function linkLockbox(token: XToken, operator: Address, lockbox: Address): void {
  token.setLockbox(operator, lockbox);
}
