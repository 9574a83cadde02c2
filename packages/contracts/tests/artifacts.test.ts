/**
 * Tests for artifact loading and validation.
 */

import { describe, it, expect } from "vitest";
import { mkdtempSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  defaultArtifacts,
  loadArtifact,
  parseArtifact,
  XTOKEN_ARTIFACT_URL,
} from "../src/artifacts.js";
import { ContractError } from "../src/types.js";
import { captureError } from "./fixtures.js";

describe("parseArtifact", () => {
  it("accepts a well-formed artifact", () => {
    expect(parseArtifact({ contractName: "XToken", bytecode: "0x6080" })).toEqual({
      contractName: "XToken",
      bytecode: "0x6080",
    });
  });

  it("rejects empty bytecode", () => {
    const err = captureError(() => parseArtifact({ contractName: "XToken", bytecode: "0x" }));
    expect(err).toBeInstanceOf(ContractError);
    expect(err).toMatchObject({ code: "INVALID_ARTIFACT" });
  });

  it("rejects odd-length bytecode", () => {
    expect(
      captureError(() => parseArtifact({ contractName: "XToken", bytecode: "0x608" })),
    ).toMatchObject({ code: "INVALID_ARTIFACT" });
  });

  it("names the failing field", () => {
    const err = captureError(() => parseArtifact({ bytecode: "0x6080" }));
    expect(err).toBeInstanceOf(ContractError);
    expect(err instanceof Error ? err.message : "").toContain("contractName");
  });
});

describe("loadArtifact", () => {
  it("loads the shipped XToken artifact", () => {
    const artifact = loadArtifact(XTOKEN_ARTIFACT_URL);
    expect(artifact.contractName).toBe("XToken");
    expect(artifact.bytecode.startsWith("0x6080")).toBe(true);
  });

  it("loads an artifact from a path", () => {
    const dir = mkdtempSync(join(tmpdir(), "xfactory-artifact-"));
    const path = join(dir, "Custom.json");
    writeFileSync(path, JSON.stringify({ contractName: "Custom", bytecode: "0xfe" }));
    expect(loadArtifact(path)).toEqual({ contractName: "Custom", bytecode: "0xfe" });
  });

  it("wraps unreadable files in INVALID_ARTIFACT", () => {
    const err = captureError(() => loadArtifact("/nonexistent/Missing.json"));
    expect(err).toMatchObject({ code: "INVALID_ARTIFACT" });
  });

  it("wraps malformed JSON in INVALID_ARTIFACT", () => {
    const dir = mkdtempSync(join(tmpdir(), "xfactory-artifact-"));
    const path = join(dir, "Broken.json");
    writeFileSync(path, "{ not json");
    expect(captureError(() => loadArtifact(path))).toMatchObject({ code: "INVALID_ARTIFACT" });
  });
});

describe("defaultArtifacts", () => {
  it("returns distinct token and lockbox creation code", () => {
    const { token, lockbox } = defaultArtifacts();
    expect(token.contractName).toBe("XToken");
    expect(lockbox.contractName).toBe("Lockbox");
    expect(token.bytecode).not.toBe(lockbox.bytecode);
  });
});
