/**
 * Tests for settings.ts — compiler option parsing.
 */
import { describe, it, expect } from "vitest";
import {
  applySettings,
  formatRemapping,
  parseModelCheckerContracts,
  parseModelCheckerTargets,
  parseRemapping,
} from "./settings";
import { DEFAULT_OPTIONS } from "./types";

function collect(): { log: (m: string) => void; lines: string[] } {
  const lines: string[] = [];
  return { log: (m) => lines.push(m), lines };
}

describe("parseRemapping", () => {
  it("parses prefix=target", () => {
    expect(parseRemapping("@oz/=lib/openzeppelin/")).toEqual({ context: "", prefix: "@oz/", target: "lib/openzeppelin/" });
  });

  it("parses a context", () => {
    expect(parseRemapping("src:lib=vendor/lib")).toEqual({ context: "src", prefix: "lib", target: "vendor/lib" });
  });

  it("rejects entries without '=' or prefix", () => {
    expect(parseRemapping("no-equals")).toBeUndefined();
    expect(parseRemapping("=target")).toBeUndefined();
    expect(parseRemapping("ctx:=target")).toBeUndefined();
  });

  it("formats back to the solc syntax", () => {
    expect(formatRemapping({ context: "", prefix: "a", target: "b" })).toBe("a=b");
    expect(formatRemapping({ context: "c", prefix: "a", target: "b" })).toBe("c:a=b");
  });
});

describe("parseModelCheckerContracts", () => {
  it("treats default and empty as every contract", () => {
    expect(parseModelCheckerContracts("default")).toEqual({});
    expect(parseModelCheckerContracts("")).toEqual({});
  });

  it("groups contracts by source, splitting on the last colon", () => {
    expect(parseModelCheckerContracts("a.sol:A,a.sol:B,c:/x.sol:X")).toEqual({
      "a.sol": ["A", "B"],
      "c:/x.sol": ["X"],
    });
  });

  it("rejects entries without both parts", () => {
    expect(parseModelCheckerContracts("a.sol")).toBeUndefined();
    expect(parseModelCheckerContracts("a.sol:")).toBeUndefined();
    expect(parseModelCheckerContracts(":A")).toBeUndefined();
  });
});

describe("parseModelCheckerTargets", () => {
  it("maps default to the empty list", () => {
    expect(parseModelCheckerTargets("default")).toEqual([]);
  });

  it("parses a comma list", () => {
    expect(parseModelCheckerTargets("overflow,assert")).toEqual(["overflow", "assert"]);
  });

  it("rejects unknown and repeated targets", () => {
    expect(parseModelCheckerTargets("overflow,bogus")).toBeUndefined();
    expect(parseModelCheckerTargets("assert,assert")).toBeUndefined();
  });
});

describe("applySettings", () => {
  it("applies every valid key", () => {
    const { log, lines } = collect();
    const next = applySettings(
      DEFAULT_OPTIONS,
      {
        evm: "paris",
        revertStrings: "strip",
        remapping: ["a=b", "c:d=e"],
        "model-checker-contracts": "a.sol:A",
        "model-checker-engine": "chc",
        "model-checker-targets": "underflow",
        "model-checker-timeout": 1000,
      },
      log,
    );

    expect(lines).toEqual([]);
    expect(next).toEqual({
      evmVersion: "paris",
      revertStrings: "strip",
      remappings: [
        { context: "", prefix: "a", target: "b" },
        { context: "c", prefix: "d", target: "e" },
      ],
      modelChecker: { contracts: { "a.sol": ["A"] }, engine: "chc", targets: ["underflow"], timeout: 1000 },
    });
  });

  it("keeps the previous value of an invalid key and logs it", () => {
    const { log, lines } = collect();
    const prev = applySettings(DEFAULT_OPTIONS, { evm: "london", revertStrings: "debug" }, log);
    const next = applySettings(prev, { evm: "frontier", revertStrings: "loud", "model-checker-timeout": -1 }, log);

    expect(next.evmVersion).toBe("london");
    expect(next.revertStrings).toBe("debug");
    expect(next.modelChecker.timeout).toBeUndefined();
    expect(lines).toEqual([
      "Invalid EVM version: frontier",
      "Invalid option for revertStrings: loud",
      "Invalid option for model-checker-timeout: -1",
    ]);
  });

  it("rebuilds the remapping list, skipping unparseable entries", () => {
    const { log, lines } = collect();
    const prev = applySettings(DEFAULT_OPTIONS, { remapping: ["old=x"] }, log);
    const next = applySettings(prev, { remapping: ["new=y", "broken"] }, log);

    expect(next.remappings).toEqual([{ context: "", prefix: "new", target: "y" }]);
    expect(lines).toEqual(["Failed to parse remapping: 'broken'"]);
  });

  it("leaves keys that are absent untouched", () => {
    const { log } = collect();
    const prev = applySettings(DEFAULT_OPTIONS, { remapping: ["a=b"], evm: "cancun" }, log);
    expect(applySettings(prev, {}, log)).toEqual(prev);
  });

  it("does not mutate the previous options", () => {
    const { log } = collect();
    applySettings(DEFAULT_OPTIONS, { remapping: ["a=b"], "model-checker-engine": "bmc" }, log);
    expect(DEFAULT_OPTIONS.remappings).toEqual([]);
    expect(DEFAULT_OPTIONS.modelChecker.engine).toBe("none");
  });

  it("ignores settings that are not an object", () => {
    const { log } = collect();
    expect(applySettings(DEFAULT_OPTIONS, null, log)).toBe(DEFAULT_OPTIONS);
  });
});
