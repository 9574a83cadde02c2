/**
 * @xfactory/deployer — Deployment manifest.
 *
 * A manifest is the canonical JSON record of one rollout: the request,
 * the agreed addresses, and which chains committed or failed. Its digest
 * is SHA-256 over the RFC 8785 (JCS) canonical form, so two operators
 * describing the same rollout get the same digest.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { Address } from "@xfactory/types";
import { checkAddressAgreement } from "./multi-chain-deployer.js";
import { DeployerError } from "./types.js";
import type { DeploymentManifest, RolloutRequest, RolloutResult } from "./types.js";

/**
 * Plain-JSON form of a request: bigints become decimal strings.
 */
export function serializeRequest(request: RolloutRequest): Readonly<Record<string, unknown>> {
  switch (request.kind) {
    case "token":
      return {
        kind: request.kind,
        name: request.name,
        symbol: request.symbol,
        owner: request.owner,
        salt: typeof request.salt === "bigint" ? request.salt.toString() : request.salt,
      };
    case "token-with-limits":
      return {
        kind: request.kind,
        name: request.name,
        symbol: request.symbol,
        minterLimits: request.minterLimits.map((limit) => limit.toString()),
        bridges: [...request.bridges],
      };
    case "token-with-lockbox":
      return {
        kind: request.kind,
        name: request.name,
        symbol: request.symbol,
        minterLimits: request.minterLimits.map((limit) => limit.toString()),
        bridges: [...request.bridges],
        baseAsset: request.baseAsset,
        isNative: request.isNative,
      };
  }
}

/**
 * Build the manifest of a rollout.
 *
 * @throws {DeployerError} NOTHING_DEPLOYED when no chain committed,
 *   ADDRESS_DIVERGENCE when committed chains disagree
 */
export function buildManifest(
  factory: Address,
  sender: Address,
  request: RolloutRequest,
  result: RolloutResult,
): DeploymentManifest {
  const agreement = checkAddressAgreement(result);
  const [first] = agreement.byChain;
  if (first === undefined) {
    throw new DeployerError("NOTHING_DEPLOYED", "No chain committed the rollout");
  }
  if (!agreement.agreed) {
    const detail = agreement.byChain.map((entry) => `${entry.chainId}=${entry.token}`).join(", ");
    throw new DeployerError("ADDRESS_DIVERGENCE", `Chains disagree on addresses: ${detail}`);
  }

  const chains = agreement.byChain.map((entry) => entry.chainId).sort(byCodeUnit);
  const failures = [...result.errors].sort((a, b) => byCodeUnit(a.chainId, b.chainId));
  const base = {
    version: 1 as const,
    factory,
    sender,
    request: serializeRequest(request),
    token: first.token,
    chains,
    failures: failures.map((failure) =>
      failure.code !== undefined
        ? { chainId: failure.chainId, error: failure.error, code: failure.code }
        : { chainId: failure.chainId, error: failure.error },
    ),
  };
  return first.lockbox !== undefined ? { ...base, lockbox: first.lockbox } : base;
}

/** Locale-independent, so the digest is the same on every host. */
function byCodeUnit(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * SHA-256 (hex) of the manifest's canonical JSON.
 */
export function manifestDigest(manifest: DeploymentManifest): string {
  return createHash("sha256").update(canonicalize(manifest)).digest("hex");
}
