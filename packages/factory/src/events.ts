/**
 * Reads typed factory events back out of a receipt's log.
 */

import { isAddressEqual } from "viem";
import type { ChainLog } from "@xfactory/chain";
import { isFactoryEvent } from "@xfactory/types";
import type { Address, FactoryEvent } from "@xfactory/types";

/**
 * Factory events in log order. With `factory` set, logs emitted by any
 * other account are skipped.
 */
export function readFactoryEvents(
  logs: readonly ChainLog[],
  factory?: Address,
): readonly FactoryEvent[] {
  const events: FactoryEvent[] = [];
  for (const log of logs) {
    if (factory !== undefined && !isAddressEqual(log.emitter, factory)) continue;
    const candidate: unknown = { name: log.name, args: log.args };
    if (isFactoryEvent(candidate)) events.push(candidate);
  }
  return events;
}
