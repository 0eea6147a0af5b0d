import { describe, expect, it } from "vitest";
import { AbiCoder } from "ethers";
import { APPROVAL_TOPIC, SYMBOL_CALLDATA, addressFromTopic, decodeAbiString, topicOfAddress } from "../../src/eth/erc20.js";
import { WALLET } from "../helpers.js";

describe("erc20 helpers", () => {
  it("exposes the Approval topic and symbol() selector", () => {
    expect(APPROVAL_TOPIC).toBe("0x8c5be1e5ebec7d5bd14f71427d1e84f3dd0314c0f7b2291e5b200ac8c7c3b925");
    expect(SYMBOL_CALLDATA).toBe("0x95d89b41");
  });

  it("pads an address into a topic and reads it back", () => {
    const topic = topicOfAddress(WALLET.toUpperCase().replace("0X", "0x"));
    expect(topic).toBe("0x000000000000000000000000" + WALLET.slice(2));
    expect(addressFromTopic(topic)).toBe(WALLET);
  });
});

describe("decodeAbiString", () => {
  const encode = (s: string) => AbiCoder.defaultAbiCoder().encode(["string"], [s]);

  it("decodes a dynamic string return value", () => {
    expect(decodeAbiString(encode("USDC"))).toBe("USDC");
  });

  it("returns empty for zero length, oversize or truncated data", () => {
    expect(decodeAbiString(encode(""))).toBe("");
    expect(decodeAbiString(encode("x".repeat(101)))).toBe("");
    expect(decodeAbiString("0x1234")).toBe("");
    expect(decodeAbiString(encode("WETH").slice(0, 130))).toBe("");
  });

  it("accepts exactly 100 bytes", () => {
    expect(decodeAbiString(encode("y".repeat(100)))).toBe("y".repeat(100));
  });
});
