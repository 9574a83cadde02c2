/**
 * Tests for TokenFactory workflows.
 *
 * Covers:
 * - deployToken with an explicit owner and salt
 * - deployToken with bridge limits
 * - deployLockbox and the base-asset / native-flag check
 * - deployTokenWithLockbox end to end
 * - Atomicity on mid-workflow failures
 * - Identical addresses across chains
 * - Log subscribers that throw
 * - Structured logging
 */

import { describe, it, expect, beforeEach } from "vitest";
import fc from "fast-check";
import { Chain, CHAINS } from "@xfactory/chain";
import { isLockbox, isXToken } from "@xfactory/contracts";
import { TokenFactory } from "../src/token-factory.js";
import {
  ALICE,
  BASE_ASSET,
  BOB,
  BRIDGE_1,
  BRIDGE_2,
  CONFIG,
  FACTORY,
  ZERO,
  captureError,
  captureLogger,
  makeFactory,
} from "./fixtures.js";

describe("TokenFactory", () => {
  let factory: TokenFactory;

  beforeEach(() => {
    factory = makeFactory();
  });

  // ─── deployToken(owner, salt) ────────────────────────────────────────

  describe("deployToken with owner and salt", () => {
    it("creates the token at its predicted address and hands it to the owner", () => {
      const predicted = factory.computeTokenAddress("Test", "TST", BOB, "0x01");

      const result = factory.deployToken(ALICE, "Test", "TST", BOB, "0x01");

      expect(result.token).toBe(predicted);
      const token = factory.chain.contractAt(result.token, isXToken);
      expect(token?.owner).toBe(BOB);
      expect(token?.factory).toBe(FACTORY);
      expect(token?.name).toBe("Test");
      expect(token?.symbol).toBe("TST");
    });

    it("emits one TokenDeployed event from the factory", () => {
      const result = factory.deployToken(ALICE, "Test", "TST", BOB, "0x01");

      expect(result.logs).toEqual([
        {
          chainId: "eip155:1",
          txIndex: 0,
          logIndex: 0,
          emitter: FACTORY,
          name: "TokenDeployed",
          args: { token: result.token },
        },
      ]);
      expect(result.chainId).toBe("eip155:1");
      expect(result.txIndex).toBe(0);
    });

    it("reports its stages", () => {
      const result = factory.deployToken(ALICE, "Test", "TST", BOB, "0x01");

      expect(result.stages).toEqual(["validated", "token-created", "ownership-transferred", "done"]);
    });

    it("collides on a repeated call and leaves the chain unchanged", () => {
      factory.deployToken(ALICE, "Test", "TST", BOB, "0x01");

      expect(captureError(() => factory.deployToken(ALICE, "Test", "TST", BOB, "0x01"))).toMatchObject({
        name: "ChainError",
        code: "ADDRESS_COLLISION",
      });
      expect(factory.chain.transactionCount).toBe(1);
      expect(factory.chain.logs()).toHaveLength(1);
    });

    it("collides regardless of sender, since the salt ignores it", () => {
      factory.deployToken(ALICE, "Test", "TST", BOB, 1n);

      expect(captureError(() => factory.deployToken(BOB, "Test", "TST", BOB, "0x01"))).toMatchObject({
        code: "ADDRESS_COLLISION",
      });
    });

    it("places different salts at different addresses", () => {
      const first = factory.deployToken(ALICE, "Test", "TST", BOB, "0x01");
      const second = factory.deployToken(ALICE, "Test", "TST", BOB, "0x02");

      expect(first.token).not.toBe(second.token);
      expect(factory.chain.hasCode(first.token)).toBe(true);
      expect(factory.chain.hasCode(second.token)).toBe(true);
      expect(second.txIndex).toBe(1);
    });

    it("rolls back when the owner is the zero address", () => {
      const predicted = factory.computeTokenAddress("Test", "TST", ZERO, "0x01");

      expect(captureError(() => factory.deployToken(ALICE, "Test", "TST", ZERO, "0x01"))).toMatchObject({
        name: "ContractError",
        code: "INVALID_OWNER",
      });
      expect(factory.chain.hasCode(predicted)).toBe(false);
      expect(factory.chain.logs()).toEqual([]);
    });

    it("rejects a malformed sender before any transaction", () => {
      expect(captureError(() => factory.deployToken("0x1234", "Test", "TST", BOB, "0x01"))).toMatchObject({
        name: "FactoryError",
        code: "INVALID_ARGUMENT",
      });
      expect(factory.chain.transactionCount).toBe(0);
    });

    it("lands where predicted for any discriminator", () => {
      fc.assert(
        fc.property(fc.bigInt({ min: 0n, max: 2n ** 96n - 1n }), fc.string(), (salt, name) => {
          const fresh = makeFactory();
          const predicted = fresh.computeTokenAddress(name, "TST", BOB, salt);
          return fresh.deployToken(ALICE, name, "TST", BOB, salt).token === predicted;
        }),
        { numRuns: 25 },
      );
    });
  });

  // ─── deployToken(minterLimits, bridges) ──────────────────────────────

  describe("deployToken with bridge limits", () => {
    it("hands the token to the sender with the requested limits", () => {
      const result = factory.deployToken(ALICE, "Test", "TST", [100n, 200n], [BRIDGE_1, BRIDGE_2]);

      expect(result.token).toBe(factory.computeTokenAddress("Test", "TST", ALICE));
      const token = factory.chain.contractAt(result.token, isXToken);
      expect(token?.owner).toBe(ALICE);
      expect(token?.limitsOf(BRIDGE_1)).toEqual({ mintingMaxLimit: 100n, burningMaxLimit: 0n });
      expect(token?.limitsOf(BRIDGE_2)).toEqual({ mintingMaxLimit: 200n, burningMaxLimit: 0n });
      expect(token?.lockbox).toBe(ZERO);
    });

    it("reports its stages", () => {
      const result = factory.deployToken(ALICE, "Test", "TST", [], []);

      expect(result.stages).toEqual([
        "validated",
        "token-created",
        "limits-applied",
        "ownership-transferred",
        "done",
      ]);
      expect(result.logs.map((log) => log.name)).toEqual(["TokenDeployed"]);
    });

    it("keeps the last limit of a repeated bridge", () => {
      const result = factory.deployToken(ALICE, "Test", "TST", [100n, 200n], [BRIDGE_1, BRIDGE_1]);

      expect(factory.chain.contractAt(result.token, isXToken)?.mintingMaxLimitOf(BRIDGE_1)).toBe(200n);
    });

    it("creates nothing when the arrays differ in length", () => {
      expect(
        captureError(() => factory.deployToken(ALICE, "Test", "TST", [100n, 200n], [BRIDGE_1])),
      ).toMatchObject({ code: "INVALID_LENGTH" });
      expect(factory.chain.addresses()).toEqual([]);
      expect(factory.chain.transactionCount).toBe(0);
    });

    it("collides when the same sender repeats the call", () => {
      factory.deployToken(ALICE, "Test", "TST", [100n], [BRIDGE_1]);

      expect(
        captureError(() => factory.deployToken(ALICE, "Test", "TST", [300n], [BRIDGE_2])),
      ).toMatchObject({ code: "ADDRESS_COLLISION" });
    });

    it("lets another sender use the same name and symbol", () => {
      const first = factory.deployToken(ALICE, "Test", "TST", [], []);
      const second = factory.deployToken(BOB, "Test", "TST", [], []);

      expect(first.token).not.toBe(second.token);
    });

    it("rolls back every limit when one is out of range", () => {
      const predicted = factory.computeTokenAddress("Test", "TST", ALICE);

      expect(
        captureError(() => factory.deployToken(ALICE, "Test", "TST", [100n, -1n], [BRIDGE_1, BRIDGE_2])),
      ).toMatchObject({ code: "INVALID_LIMIT" });
      expect(factory.chain.hasCode(predicted)).toBe(false);
    });
  });

  // ─── deployLockbox ───────────────────────────────────────────────────

  describe("deployLockbox", () => {
    it("creates an ERC-20 lockbox at its predicted address", () => {
      const predicted = factory.computeLockboxAddress(BOB, BASE_ASSET, false);

      const result = factory.deployLockbox(ALICE, BOB, BASE_ASSET, false);

      expect(result.lockbox).toBe(predicted);
      const lockbox = factory.chain.contractAt(result.lockbox, isLockbox);
      expect(lockbox?.token).toBe(BOB);
      expect(lockbox?.baseAsset).toBe(BASE_ASSET);
      expect(lockbox?.mode).toBe("erc20");
      expect(result.stages).toEqual(["validated", "lockbox-created", "done"]);
      expect(result.logs).toEqual([
        {
          chainId: "eip155:1",
          txIndex: 0,
          logIndex: 0,
          emitter: FACTORY,
          name: "LockboxDeployed",
          args: { lockbox: result.lockbox },
        },
      ]);
    });

    it("creates a native lockbox", () => {
      const result = factory.deployLockbox(ALICE, BOB, ZERO, true);

      expect(factory.chain.contractAt(result.lockbox, isLockbox)?.mode).toBe("native");
    });

    it.each([
      ["zero asset without the native flag", ZERO, false],
      ["non-zero asset with the native flag", BASE_ASSET, true],
    ] as const)("rejects a %s", (_label, baseAsset, isNative) => {
      expect(captureError(() => factory.deployLockbox(ALICE, BOB, baseAsset, isNative))).toMatchObject({
        code: "BAD_TOKEN_ADDRESS",
      });
      expect(factory.chain.addresses()).toEqual([]);
      expect(factory.chain.logs()).toEqual([]);
    });

    it("collides on the same triple, whoever sends it", () => {
      factory.deployLockbox(ALICE, BOB, BASE_ASSET, false);

      expect(captureError(() => factory.deployLockbox(BOB, BOB, BASE_ASSET, false))).toMatchObject({
        code: "ADDRESS_COLLISION",
      });
    });
  });

  // ─── deployTokenWithLockbox ──────────────────────────────────────────

  describe("deployTokenWithLockbox", () => {
    it("creates, provisions and links in one transaction", () => {
      const result = factory.deployTokenWithLockbox(
        ALICE,
        "Test",
        "TST",
        [100n, 200n],
        [BRIDGE_1, BRIDGE_2],
        ZERO,
        true,
      );

      expect(result.token).toBe(factory.computeTokenAddress("Test", "TST", ALICE));
      expect(result.lockbox).toBe(factory.computeLockboxAddress(result.token, ZERO, true));

      const token = factory.chain.contractAt(result.token, isXToken);
      expect(token?.owner).toBe(ALICE);
      expect(token?.lockbox).toBe(result.lockbox);
      expect(token?.limitsOf(BRIDGE_1)).toEqual({ mintingMaxLimit: 100n, burningMaxLimit: 0n });
      expect(token?.limitsOf(BRIDGE_2)).toEqual({ mintingMaxLimit: 200n, burningMaxLimit: 0n });

      const lockbox = factory.chain.contractAt(result.lockbox, isLockbox);
      expect(lockbox?.token).toBe(result.token);
      expect(lockbox?.isNative).toBe(true);

      expect(factory.chain.transactionCount).toBe(1);
    });

    it("emits TokenDeployed then LockboxDeployed", () => {
      const result = factory.deployTokenWithLockbox(ALICE, "Test", "TST", [], [], BASE_ASSET, false);

      expect(result.logs.map((log) => [log.logIndex, log.name, log.args])).toEqual([
        [0, "TokenDeployed", { token: result.token }],
        [1, "LockboxDeployed", { lockbox: result.lockbox }],
      ]);
      expect(result.events).toEqual([
        { name: "TokenDeployed", args: { token: result.token } },
        { name: "LockboxDeployed", args: { lockbox: result.lockbox } },
      ]);
    });

    it("reports every stage", () => {
      const result = factory.deployTokenWithLockbox(ALICE, "Test", "TST", [], [], ZERO, true);

      expect(result.stages).toEqual([
        "validated",
        "token-created",
        "limits-applied",
        "lockbox-created",
        "linked",
        "ownership-transferred",
        "done",
      ]);
    });

    it("checks the lockbox mode before anything else", () => {
      expect(
        captureError(() =>
          factory.deployTokenWithLockbox(ALICE, "Test", "TST", [100n], [], BASE_ASSET, true),
        ),
      ).toMatchObject({ code: "BAD_TOKEN_ADDRESS" });
      expect(factory.chain.transactionCount).toBe(0);
    });

    it("creates nothing when the arrays differ in length", () => {
      expect(
        captureError(() =>
          factory.deployTokenWithLockbox(ALICE, "Test", "TST", [100n], [], ZERO, true),
        ),
      ).toMatchObject({ code: "INVALID_LENGTH" });
      expect(factory.chain.addresses()).toEqual([]);
    });

    it("drops the new token when the lockbox address is taken", () => {
      const token = factory.computeTokenAddress("Test", "TST", ALICE);
      factory.deployLockbox(BOB, token, ZERO, true);

      expect(
        captureError(() => factory.deployTokenWithLockbox(ALICE, "Test", "TST", [100n], [BRIDGE_1], ZERO, true)),
      ).toMatchObject({ code: "ADDRESS_COLLISION" });
      expect(factory.chain.hasCode(token)).toBe(false);
      expect(factory.chain.logs().map((log) => log.name)).toEqual(["LockboxDeployed"]);
      expect(factory.chain.transactionCount).toBe(1);
    });

    it("collides with a token the sender already created through deployToken", () => {
      factory.deployToken(ALICE, "Test", "TST", [], []);

      expect(
        captureError(() => factory.deployTokenWithLockbox(ALICE, "Test", "TST", [], [], ZERO, true)),
      ).toMatchObject({ code: "ADDRESS_COLLISION" });
    });
  });

  // ─── Cross-chain ─────────────────────────────────────────────────────

  describe("across chains", () => {
    it("produces the same addresses on independent chains", () => {
      const base = makeFactory(CHAINS.BASE_MAINNET);

      const onMainnet = factory.deployTokenWithLockbox(ALICE, "Test", "TST", [100n], [BRIDGE_1], BASE_ASSET, false);
      const onBase = base.deployTokenWithLockbox(ALICE, "Test", "TST", [500n], [BRIDGE_2], BASE_ASSET, false);

      expect(onBase.token).toBe(onMainnet.token);
      expect(onBase.lockbox).toBe(onMainnet.lockbox);
      expect(onMainnet.chainId).toBe("eip155:1");
      expect(onBase.chainId).toBe("eip155:8453");
      expect(base.chain.contractAt(onBase.token, isXToken)?.mintingMaxLimitOf(BRIDGE_1)).toBe(0n);
    });
  });

  // ─── Log subscribers ─────────────────────────────────────────────────

  describe("with a throwing log subscriber", () => {
    let chain: Chain;

    beforeEach(() => {
      chain = new Chain(CHAINS.ETHEREUM_MAINNET);
      chain.subscribe(() => {
        throw new Error("indexer offline");
      });
    });

    it("returns the committed deployment", () => {
      const subscribed = new TokenFactory(chain, CONFIG);

      const result = subscribed.deployToken(ALICE, "Test", "TST", ALICE, "0x01");

      expect(result.token).toBe(subscribed.computeTokenAddress("Test", "TST", ALICE, "0x01"));
      expect(result.stages.at(-1)).toBe("done");
      expect(result.events).toEqual([{ name: "TokenDeployed", args: { token: result.token } }]);
      expect(chain.contractAt(result.token, isXToken)?.owner).toBe(ALICE);
      expect(chain.transactionCount).toBe(1);
    });

    it("logs the commit, not an abort", () => {
      const { logger, lines } = captureLogger();
      const subscribed = new TokenFactory(chain, CONFIG, { logger });

      subscribed.deployTokenWithLockbox(ALICE, "Test", "TST", [], [], ZERO, true);

      expect(lines.some((line) => line["msg"] === "deployTokenWithLockbox aborted")).toBe(false);
      expect(lines.at(-1)).toMatchObject({ level: 30, msg: "deployTokenWithLockbox committed" });
    });

    it("collides on a repeat, since the first call committed", () => {
      const subscribed = new TokenFactory(chain, CONFIG);
      subscribed.deployToken(ALICE, "Test", "TST", ALICE, "0x01");

      expect(captureError(() => subscribed.deployToken(ALICE, "Test", "TST", ALICE, "0x01"))).toMatchObject({
        name: "ChainError",
        code: "ADDRESS_COLLISION",
      });
    });
  });

  // ─── Logging ─────────────────────────────────────────────────────────

  describe("logging", () => {
    it("logs each stage at debug and the commit at info", () => {
      const { logger, lines } = captureLogger();
      const logged = makeFactory(CHAINS.ETHEREUM_MAINNET, logger);

      const result = logged.deployToken(ALICE, "Test", "TST", BOB, "0x01");

      expect(lines.filter((line) => line["msg"] === "Stage reached").map((line) => line["stage"])).toEqual(
        result.stages,
      );
      expect(lines.at(-1)).toMatchObject({
        level: 30,
        msg: "deployToken committed",
        component: "token-factory",
        workflow: "deployToken",
        chainId: "eip155:1",
        factory: FACTORY,
        sender: ALICE,
        txIndex: 0,
        created: [{ token: result.token }],
      });
    });

    it("logs an aborted workflow at warn with the stages reached", () => {
      const { logger, lines } = captureLogger();
      const logged = makeFactory(CHAINS.ETHEREUM_MAINNET, logger);
      logged.deployToken(ALICE, "Test", "TST", BOB, "0x01");

      captureError(() => logged.deployToken(ALICE, "Test", "TST", BOB, "0x01"));

      expect(lines.at(-1)).toMatchObject({
        level: 40,
        msg: "deployToken aborted",
        workflow: "deployToken",
        stages: ["validated"],
        err: { type: "ChainError", code: "ADDRESS_COLLISION" },
      });
    });
  });
});
