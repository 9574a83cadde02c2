/**
 * Creation-code artifacts.
 *
 * Artifacts are JSON files of the form
 *   { "contractName": "XToken", "bytecode": "0x6080..." }
 * and are validated with Zod when loaded. The bytecode is what CREATE2
 * hashes, so changing it moves every derived address.
 *
 * The artifacts shipped in `artifacts/` are fixed creation-code
 * fingerprints, not compiler output. They exist to pin derived addresses
 * for the simulated chain; nothing executes them. Load real compiled
 * creation code with `loadArtifact` to derive production addresses.
 */

import { readFileSync } from "node:fs";
import { isHex } from "viem";
import { z } from "zod";
import type { Hex } from "@xfactory/types";
import { ContractError } from "./types.js";
import type { ContractArtifact } from "./types.js";

// =============================================================================
// Schema
// =============================================================================

const BytecodeSchema = z.custom<Hex>(
  (value) =>
    typeof value === "string" &&
    isHex(value, { strict: true }) &&
    value.length > 2 &&
    value.length % 2 === 0,
  { message: "bytecode must be non-empty, even-length 0x-prefixed hex" },
);

export const ArtifactSchema = z.object({
  contractName: z.string().min(1),
  bytecode: BytecodeSchema,
});

// =============================================================================
// Default artifact locations
// =============================================================================

export const XTOKEN_ARTIFACT_URL = new URL("../artifacts/XToken.json", import.meta.url);
export const LOCKBOX_ARTIFACT_URL = new URL("../artifacts/Lockbox.json", import.meta.url);

// =============================================================================
// Loader
// =============================================================================

/**
 * Validate an already-parsed artifact.
 *
 * @throws {ContractError} INVALID_ARTIFACT when the shape is wrong
 */
export function parseArtifact(raw: unknown): ContractArtifact {
  const result = ArtifactSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ContractError("INVALID_ARTIFACT", `Invalid artifact: ${detail}`);
  }
  return result.data;
}

/**
 * Read and validate an artifact file.
 */
export function loadArtifact(path: string | URL): ContractArtifact {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ContractError("INVALID_ARTIFACT", `Cannot read artifact ${String(path)}: ${reason}`);
  }
  return parseArtifact(raw);
}

/**
 * The artifacts shipped with this package.
 */
export function defaultArtifacts(): { readonly token: ContractArtifact; readonly lockbox: ContractArtifact } {
  return {
    token: loadArtifact(XTOKEN_ARTIFACT_URL),
    lockbox: loadArtifact(LOCKBOX_ARTIFACT_URL),
  };
}
