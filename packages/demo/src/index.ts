#!/usr/bin/env node
/**
 * @xfactory/demo — Interactive CLI walkthrough.
 *
 * Rolls one token with bridge limits and a native lockbox out to every
 * configured chain:
 * config -> plan -> rollout -> inspect -> agreement -> manifest -> retry
 *
 * Uses the real packages against in-process chains.
 */

import chalk from "chalk";
import { Chain, ChainRegistry } from "@xfactory/chain";
import { isLockbox, isXToken } from "@xfactory/contracts";
import {
  MultiChainDeployer,
  buildManifest,
  checkAddressAgreement,
  createLogger,
  loadConfig,
  manifestDigest,
  resolveFactoryConfig,
} from "@xfactory/deployer";
import type { TokenWithLockboxRequest } from "@xfactory/deployer";
import type { Address } from "@xfactory/types";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = 400;

const DEMO_FACTORY: Address = "0x1111111111111111111111111111111111111111";
const SENDER: Address = "0x2222222222222222222222222222222222222222";
const BRIDGE_A: Address = "0x1000000000000000000000000000000000000001";
const BRIDGE_B: Address = "0x2000000000000000000000000000000000000002";
const NATIVE: Address = "0x0000000000000000000000000000000000000000";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                     XFACTORY DEMO                        ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("        Same token, same address, every chain             ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(Math.max(0, 50 - title.length)));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

function ok(msg: string): void {
  console.log(chalk.green("    ✓ ") + chalk.white(msg));
}

function info(label: string, value: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(value));
}

function hashLine(label: string, hash: string): void {
  const short = hash.length > 16 ? `${hash.slice(0, 16)}...${hash.slice(-8)}` : hash;
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.yellow(short));
}

function warn(msg: string): void {
  console.log(chalk.yellow("    ! ") + chalk.yellow(msg));
}

const TOTAL_STEPS = 7;

// =============================================================================
// Demo
// =============================================================================

async function run(): Promise<void> {
  banner();

  // ─── Step 1: Config ─────────────────────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Config");

  const config = loadConfig({ FACTORY_ADDRESS: DEMO_FACTORY, LOG_LEVEL: "silent", ...process.env });
  const logger = createLogger(config);
  const factoryConfig = resolveFactoryConfig(config);

  info("factory", factoryConfig.address);
  info("chains", config.DEPLOY_CHAINS.map((ref) => ref.name).join(", "));
  hashLine("token code", factoryConfig.tokenBytecode);
  hashLine("lockbox code", factoryConfig.lockboxBytecode);

  const registry = new ChainRegistry();
  for (const ref of config.DEPLOY_CHAINS) {
    registry.register(new Chain(ref));
  }
  const deployer = new MultiChainDeployer(registry, factoryConfig, { logger });
  ok(`${registry.listChains().length} chains booted, factory bound on each`);

  await sleep(DELAY_MS);

  // ─── Step 2: Plan ───────────────────────────────────────────────────

  stepHeader(2, TOTAL_STEPS, "Plan");

  const request: TokenWithLockboxRequest = {
    kind: "token-with-lockbox",
    name: "Bridged Ether",
    symbol: "xETH",
    minterLimits: [1_000_000n, 250_000n],
    bridges: [BRIDGE_A, BRIDGE_B],
    baseAsset: NATIVE,
    isNative: true,
  };
  const plan = deployer.plan(SENDER, request);

  info("sender", SENDER);
  info("token", plan.token);
  info("lockbox", plan.lockbox ?? "-");
  ok("Addresses predicted without touching any chain");

  await sleep(DELAY_MS);

  // ─── Step 3: Rollout ────────────────────────────────────────────────

  stepHeader(3, TOTAL_STEPS, "Rollout");

  const result = deployer.rollout(SENDER, request);
  for (const { chainId, value } of result.successes) {
    ok(`${chainId}  tx #${value.txIndex}  ${value.events.map((event) => event.name).join(" -> ")}`);
  }
  for (const failure of result.errors) {
    warn(`${failure.chainId}  ${failure.code ?? "ERROR"}: ${failure.error}`);
  }

  await sleep(DELAY_MS);

  // ─── Step 4: Inspect ────────────────────────────────────────────────

  stepHeader(4, TOTAL_STEPS, "Inspect");

  for (const { chainId, value } of result.successes) {
    const chain = deployer.factory(chainId).chain;
    const token = chain.contractAt(value.token, isXToken);
    const lockbox = "lockbox" in value ? chain.contractAt(value.lockbox, isLockbox) : undefined;
    if (token === undefined) {
      warn(`${chainId}: no token at ${value.token}`);
      continue;
    }
    info("chain", chainId);
    info("owner", token.owner);
    for (const bridge of token.bridges()) {
      info("mint limit", `${bridge}  ${token.mintingMaxLimitOf(bridge)}`);
    }
    info("lockbox", `${token.lockbox} (${lockbox?.mode ?? "none"})`);
  }
  ok("Ownership handed over, limits set, lockbox linked");

  await sleep(DELAY_MS);

  // ─── Step 5: Agreement ──────────────────────────────────────────────

  stepHeader(5, TOTAL_STEPS, "Cross-chain agreement");

  const agreement = checkAddressAgreement(result);
  if (agreement.agreed) {
    ok(chalk.green.bold("AGREED") + ` on ${agreement.byChain.length} chains`);
  } else {
    warn("Chains produced different addresses");
  }

  await sleep(DELAY_MS);

  // ─── Step 6: Manifest ───────────────────────────────────────────────

  stepHeader(6, TOTAL_STEPS, "Manifest");

  const manifest = buildManifest(factoryConfig.address, SENDER, request, result);
  info("chains", manifest.chains.join(", "));
  hashLine("digest", manifestDigest(manifest));
  ok("Canonical JSON (RFC 8785), SHA-256");

  await sleep(DELAY_MS);

  // ─── Step 7: Retry ──────────────────────────────────────────────────

  stepHeader(7, TOTAL_STEPS, "Retry the same request");

  const retry = deployer.rollout(SENDER, request);
  for (const failure of retry.errors) {
    warn(`${failure.chainId}  ${failure.code ?? "ERROR"}`);
  }
  if (retry.successes.length === 0) {
    ok("Rejected everywhere: each address can be created once");
  }

  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
