/**
 * @xfactory/deployer — Configuration.
 *
 * Loads and validates rollout configuration from environment variables
 * using Zod.
 */

import { getAddress, isAddress } from "viem";
import { z } from "zod";
import { getChainRef } from "@xfactory/chain";
import {
  LOCKBOX_ARTIFACT_URL,
  XTOKEN_ARTIFACT_URL,
  loadArtifact,
} from "@xfactory/contracts";
import type { FactoryConfig } from "@xfactory/factory";
import type { Address, ChainRef } from "@xfactory/types";
import { DeployerError } from "./types.js";

// =============================================================================
// Chain list parsing
// =============================================================================

/**
 * Parse DEPLOY_CHAINS into chain refs.
 *
 * Format: "eip155:1,eip155:8453". Blank entries are skipped, duplicates
 * keep their first position.
 *
 * @throws {DeployerError} UNKNOWN_CHAIN for an id not in CHAINS
 */
export function parseChainList(raw: string): readonly ChainRef[] {
  const refs: ChainRef[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const chainId = entry.trim();
    if (chainId === "" || seen.has(chainId)) {
      continue;
    }
    const ref = getChainRef(chainId);
    if (ref === undefined) {
      throw new DeployerError("UNKNOWN_CHAIN", `Unknown chain "${chainId}" in DEPLOY_CHAINS`);
    }
    seen.add(chainId);
    refs.push(ref);
  }

  return refs;
}

// =============================================================================
// Schema
// =============================================================================

const AddressSchema = z
  .string()
  .refine((value) => isAddress(value, { strict: false }), {
    message: "must be a 20-byte 0x-prefixed address",
  })
  .transform((value): Address => getAddress(value));

const ChainListSchema = z
  .string()
  .default("eip155:1,eip155:8453")
  .transform((raw, ctx) => {
    try {
      return parseChainList(raw);
    } catch (err: unknown) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: err instanceof Error ? err.message : String(err),
      });
      return z.NEVER;
    }
  })
  .refine((refs) => refs.length > 0, { message: "at least one chain is required" });

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Factory identity; must be the same on every target chain
  FACTORY_ADDRESS: AddressSchema,
  DEPLOY_CHAINS: ChainListSchema,

  // Creation code overrides (paths to artifact JSON files)
  TOKEN_ARTIFACT: z.string().min(1).optional(),
  LOCKBOX_ARTIFACT: z.string().min(1).optional(),
});

export type DeployerConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): DeployerConfig {
  return ConfigSchema.parse(env);
}

/**
 * Factory identity from config, reading the creation code from the
 * configured artifacts or the ones shipped with @xfactory/contracts.
 */
export function resolveFactoryConfig(config: DeployerConfig): FactoryConfig {
  return {
    address: config.FACTORY_ADDRESS,
    tokenBytecode: loadArtifact(config.TOKEN_ARTIFACT ?? XTOKEN_ARTIFACT_URL).bytecode,
    lockboxBytecode: loadArtifact(config.LOCKBOX_ARTIFACT ?? LOCKBOX_ARTIFACT_URL).bytecode,
  };
}
