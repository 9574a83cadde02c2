/**
 * CREATE2 address computation.
 *
 *   address = keccak256(0xff ++ deployer ++ salt ++ keccak256(initCode))[12:]
 *
 * The result depends only on its three inputs, never on nonces or block
 * state, so the same inputs yield the same address on every chain.
 */

import { getAddress, getContractAddress, isAddress, isHex } from "viem";
import type { Address, Hex } from "@xfactory/types";
import { ChainError } from "./types.js";

/** Byte length of a CREATE2 salt. */
export const CREATE2_SALT_BYTES = 32;

/**
 * Checksum an address, or throw ChainError("INVALID_ADDRESS").
 */
export function normalizeAddress(value: string, label: string, chainId?: string): Address {
  if (!isAddress(value, { strict: false })) {
    throw new ChainError("INVALID_ADDRESS", `Invalid ${label} address: "${value}"`, chainId);
  }
  return getAddress(value);
}

export function assertCreate2Salt(salt: Hex, chainId?: string): void {
  if (!isHex(salt, { strict: true }) || salt.length !== 2 + CREATE2_SALT_BYTES * 2) {
    throw new ChainError(
      "INVALID_SALT",
      `CREATE2 salt must be exactly ${CREATE2_SALT_BYTES} bytes, got "${salt}"`,
      chainId,
    );
  }
}

/**
 * Compute the address a CREATE2 creation will land at.
 */
export function computeCreate2Address(deployer: Address, salt: Hex, initCode: Hex): Address {
  assertCreate2Salt(salt);
  if (!isHex(initCode, { strict: true })) {
    throw new ChainError("INVALID_INIT_CODE", "Init code must be hex");
  }
  return getContractAddress({
    opcode: "CREATE2",
    from: normalizeAddress(deployer, "deployer"),
    salt,
    bytecode: initCode,
  });
}
