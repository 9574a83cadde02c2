/**
 * @xfactory/factory — Address derivation.
 *
 * Pure functions that predict where the factory will create a token or a
 * lockbox. Nothing here reads chain state, so a prediction made offline
 * matches the creation on every chain that hosts the same factory address.
 *
 *   token salt   = owner (20 bytes) ++ discriminator (12 bytes)
 *   lockbox salt = keccak256(abi.encodePacked(token, baseAsset, isNative))
 *   address      = CREATE2(factory, salt, creationCode ++ abi.encode(ctorArgs))
 *
 * The lockbox salt has no owner component: a lockbox carries no
 * administrative state, so one address per triple is enough.
 */

import {
  concat,
  encodeAbiParameters,
  encodePacked,
  getAddress,
  hexToBigInt,
  isAddress,
  isHex,
  keccak256,
  numberToHex,
  parseAbiParameters,
} from "viem";
import { computeCreate2Address } from "@xfactory/chain";
import type { Address, Hex } from "@xfactory/types";
import { FactoryError } from "./types.js";
import type { SaltInput } from "./types.js";

/** Byte length of the caller-supplied discriminator. */
export const SALT_DISCRIMINATOR_BYTES = 12;

/** Discriminator used when the caller does not choose one. */
export const ZERO_SALT: Hex = `0x${"00".repeat(SALT_DISCRIMINATOR_BYTES)}`;

const MAX_DISCRIMINATOR = (1n << BigInt(SALT_DISCRIMINATOR_BYTES * 8)) - 1n;

const TOKEN_CONSTRUCTOR = parseAbiParameters("string name, string symbol, address factory");
const LOCKBOX_CONSTRUCTOR = parseAbiParameters("address token, address baseAsset, bool isNative");

// =============================================================================
// Argument checks
// =============================================================================

/**
 * Checksum an address argument, or throw FactoryError("INVALID_ARGUMENT").
 */
export function requireAddress(value: string, label: string): Address {
  if (!isAddress(value, { strict: false })) {
    throw new FactoryError("INVALID_ARGUMENT", `Invalid ${label} address: "${value}"`);
  }
  return getAddress(value);
}

/**
 * Canonical 12-byte, lowercase form of a discriminator.
 *
 * Shorter hex is left-padded ("0x01" is the discriminator 1).
 */
export function normalizeSalt(salt: SaltInput): Hex {
  if (typeof salt === "bigint") {
    if (salt < 0n || salt > MAX_DISCRIMINATOR) {
      throw new FactoryError(
        "INVALID_ARGUMENT",
        `Salt must be between 0 and 2^${SALT_DISCRIMINATOR_BYTES * 8} - 1, got ${salt}`,
      );
    }
    return numberToHex(salt, { size: SALT_DISCRIMINATOR_BYTES });
  }
  if (
    !isHex(salt, { strict: true }) ||
    salt.length === 2 ||
    salt.length > 2 + SALT_DISCRIMINATOR_BYTES * 2
  ) {
    throw new FactoryError(
      "INVALID_ARGUMENT",
      `Salt must be 1 to ${SALT_DISCRIMINATOR_BYTES} bytes of hex, got "${salt}"`,
    );
  }
  return numberToHex(hexToBigInt(salt), { size: SALT_DISCRIMINATOR_BYTES });
}

function requireBytecode(bytecode: Hex, label: string): Hex {
  if (!isHex(bytecode, { strict: true }) || bytecode.length === 2) {
    throw new FactoryError("INVALID_ARGUMENT", `${label} creation code must be non-empty hex`);
  }
  return bytecode;
}

/**
 * CREATE2 address of `initCode` created by `factory` with a 32-byte salt.
 */
export function create2Address(factory: Address, salt: Hex, initCode: Hex): Address {
  return computeCreate2Address(requireAddress(factory, "factory"), salt, initCode);
}

// =============================================================================
// Token
// =============================================================================

/**
 * 32-byte CREATE2 salt of a token: the owner in the high 20 bytes, the
 * discriminator in the low 12.
 */
export function tokenSalt(owner: Address, salt: SaltInput = ZERO_SALT): Hex {
  return encodePacked(
    ["address", "bytes12"],
    [requireAddress(owner, "owner"), normalizeSalt(salt)],
  );
}

/**
 * Token creation code followed by its ABI-encoded constructor arguments.
 */
export function tokenInitCode(bytecode: Hex, name: string, symbol: string, factory: Address): Hex {
  return concat([
    requireBytecode(bytecode, "Token"),
    encodeAbiParameters(TOKEN_CONSTRUCTOR, [name, symbol, requireAddress(factory, "factory")]),
  ]);
}

export interface TokenAddressParams {
  readonly factory: Address;
  readonly tokenBytecode: Hex;
  readonly name: string;
  readonly symbol: string;
  readonly owner: Address;
  readonly salt?: SaltInput | undefined;
}

/**
 * Address a token will be created at. Reads no chain state.
 */
export function predictTokenAddress(params: TokenAddressParams): Address {
  const factory = requireAddress(params.factory, "factory");
  return create2Address(
    factory,
    tokenSalt(params.owner, params.salt ?? ZERO_SALT),
    tokenInitCode(params.tokenBytecode, params.name, params.symbol, factory),
  );
}

// =============================================================================
// Lockbox
// =============================================================================

export function lockboxSalt(token: Address, baseAsset: Address, isNative: boolean): Hex {
  return keccak256(
    encodePacked(
      ["address", "address", "bool"],
      [requireAddress(token, "token"), requireAddress(baseAsset, "base asset"), isNative],
    ),
  );
}

export function lockboxInitCode(
  bytecode: Hex,
  token: Address,
  baseAsset: Address,
  isNative: boolean,
): Hex {
  return concat([
    requireBytecode(bytecode, "Lockbox"),
    encodeAbiParameters(LOCKBOX_CONSTRUCTOR, [
      requireAddress(token, "token"),
      requireAddress(baseAsset, "base asset"),
      isNative,
    ]),
  ]);
}

export interface LockboxAddressParams {
  readonly factory: Address;
  readonly lockboxBytecode: Hex;
  readonly token: Address;
  readonly baseAsset: Address;
  readonly isNative: boolean;
}

/**
 * Address a lockbox will be created at. Reads no chain state.
 */
export function predictLockboxAddress(params: LockboxAddressParams): Address {
  return create2Address(
    params.factory,
    lockboxSalt(params.token, params.baseAsset, params.isNative),
    lockboxInitCode(params.lockboxBytecode, params.token, params.baseAsset, params.isNative),
  );
}
