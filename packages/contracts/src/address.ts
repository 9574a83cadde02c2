import { getAddress, isAddress } from "viem";
import type { Address } from "@xfactory/types";
import { ContractError } from "./types.js";
import type { ContractErrorCode } from "./types.js";

/**
 * Checksum `value`, or throw ContractError with `code`.
 */
export function requireAddress(
  value: string,
  label: string,
  code: ContractErrorCode = "INVALID_ADDRESS",
): Address {
  if (!isAddress(value, { strict: false })) {
    throw new ContractError(code, `Invalid ${label} address: "${value}"`);
  }
  return getAddress(value);
}
