/**
 * Runtime Type Guards
 *
 * Narrowing functions for values read back from a chain's event log,
 * where `name` and `args` are untyped.
 */

import type { Address } from "./primitives.js";
import type { FactoryEvent, FactoryEventName } from "./deployment.js";

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const FACTORY_EVENT_NAMES = new Set<string>(["TokenDeployed", "LockboxDeployed"]);

/** Shape check only; checksum validation is left to the hex library. */
export function isAddressLike(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

export function isFactoryEventName(value: unknown): value is FactoryEventName {
  return typeof value === "string" && FACTORY_EVENT_NAMES.has(value);
}

/**
 * True when `value` has a factory event name and the address argument
 * that event carries.
 */
export function isFactoryEvent(value: unknown): value is FactoryEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  if (!isFactoryEventName(v.name)) return false;
  if (v.args === null || typeof v.args !== "object") return false;
  const args = v.args as Record<string, unknown>;
  return v.name === "TokenDeployed"
    ? isAddressLike(args.token)
    : isAddressLike(args.lockbox);
}
