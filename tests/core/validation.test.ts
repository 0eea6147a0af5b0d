import { describe, expect, it } from "vitest";
import { ALL_CHAINS } from "../../src/chains.js";
import { assertEthAddress, isEthAddress, isZeroEthAddress, parseChain, parseChainList } from "../../src/core/validation.js";
import { WALLET } from "../helpers.js";

describe("addresses", () => {
  it("accepts 0x plus 40 hex characters only", () => {
    expect(isEthAddress(WALLET)).toBe(true);
    expect(isEthAddress(WALLET.slice(0, 41))).toBe(false);
    expect(isEthAddress(WALLET.replace("0x", "1x"))).toBe(false);
    expect(isEthAddress("0x" + "g".repeat(40))).toBe(false);
  });

  it("detects the zero address", () => {
    expect(isZeroEthAddress("0x" + "0".repeat(40))).toBe(true);
    expect(isZeroEthAddress(WALLET)).toBe(false);
  });

  it("throws INVALID_INPUT with the field name", () => {
    expect(() => assertEthAddress("0x123", "contract address")).toThrow("invalid contract address format: 0x123");
    expect(assertEthAddress(`  ${WALLET} `)).toBe(WALLET);
  });
});

describe("parseChain", () => {
  it("defaults to ethereum and ignores case", () => {
    expect(parseChain(undefined)).toBe("ethereum");
    expect(parseChain("")).toBe("ethereum");
    expect(parseChain("BSC")).toBe("bsc");
  });

  it("rejects unknown chains", () => {
    expect(() => parseChain("solana")).toThrow("unsupported chain: solana");
  });
});

describe("parseChainList", () => {
  it("returns every chain when nothing is given", () => {
    expect(parseChainList(undefined)).toEqual([...ALL_CHAINS]);
    expect(parseChainList("  ")).toEqual([...ALL_CHAINS]);
  });

  it("normalizes case and drops duplicates in first-seen order", () => {
    expect(parseChainList("Polygon, ethereum,POLYGON")).toEqual(["polygon", "ethereum"]);
    expect(parseChainList(["base", "Base"])).toEqual(["base"]);
  });

  it("names every unsupported entry", () => {
    expect(() => parseChainList("foo,ethereum,bar")).toThrow("unsupported chains: foo, bar");
  });

  it("rejects a list with no usable entries", () => {
    expect(() => parseChainList(" , ,")).toThrow("no valid chains provided");
  });
});
