/**
 * Shared test fixtures for @xfactory/chain.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { Address, Hex } from "@xfactory/types";
import type { Contract } from "../src/types.js";

export const DEPLOYER: Address = "0x1111111111111111111111111111111111111111";
export const ALICE: Address = "0x2222222222222222222222222222222222222222";

export const SALT_ZERO: Hex = `0x${"00".repeat(32)}`;
export const SALT_ONE: Hex = `0x${"00".repeat(31)}01`;
export const INIT_CODE: Hex = "0x6080604052";

/** Minimal mutable contract used to exercise commit/rollback. */
export class Counter implements Contract {
  readonly kind = "Counter";
  value: number;

  constructor(value = 0) {
    this.value = value;
  }

  clone(): Counter {
    return new Counter(this.value);
  }
}

/** A second kind, for guard mismatch checks. */
export class Marker implements Contract {
  readonly kind = "Marker";

  clone(): Marker {
    return new Marker();
  }
}

export function isCounter(contract: Contract): contract is Counter {
  return contract instanceof Counter;
}

export function isMarker(contract: Contract): contract is Marker {
  return contract instanceof Marker;
}

/** Run `fn` and return what it threw. Fails the test if it returns. */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected function to throw");
}

/** A pino logger that keeps every line it writes, parsed. */
export function captureLogger(): { logger: Logger; lines: Record<string, unknown>[] } {
  const lines: Record<string, unknown>[] = [];
  const stream = {
    write(line: string): void {
      lines.push(JSON.parse(line));
    },
  };
  return { logger: pino({ level: "debug" }, stream), lines };
}
