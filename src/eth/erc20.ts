import { Interface, toUtf8String } from "ethers";

export const ERC20_ABI = [
  "function allowance(address owner, address spender) view returns (uint256)",
  "function symbol() view returns (string)",
  "function decimals() view returns (uint8)",
  "event Approval(address indexed owner, address indexed spender, uint256 value)"
] as const;

export const ERC20_IFACE = new Interface(ERC20_ABI);

const approvalEvent = ERC20_IFACE.getEvent("Approval");
if (!approvalEvent) {
  throw new Error("ERC20 interface is missing Approval event ABI");
}
export const APPROVAL_TOPIC = approvalEvent.topicHash;

export const SYMBOL_CALLDATA = ERC20_IFACE.encodeFunctionData("symbol");

export function topicOfAddress(addr: string): string {
  // 32-byte topic: left-padded address
  const a = addr.toLowerCase().replace(/^0x/, "");
  return "0x" + a.padStart(64, "0");
}

export function addressFromTopic(topic: string): string {
  const hex = topic.replace(/^0x/, "");
  return "0x" + hex.slice(-40).toLowerCase();
}

const MAX_ABI_STRING_BYTES = 100;

/**
 * Decodes the return data of a `string`-returning call: 32-byte offset, 32-byte length,
 * then the bytes. Returns "" for anything short, empty, or longer than 100 bytes.
 */
export function decodeAbiString(hexData: string): string {
  const data = hexData.replace(/^0x/, "");
  if (data.length < 128) return "";

  const length = Number.parseInt(data.slice(64, 128), 16);
  if (!Number.isFinite(length) || length === 0 || length > MAX_ABI_STRING_BYTES) return "";
  if (data.length < 128 + length * 2) return "";

  try {
    return toUtf8String("0x" + data.slice(128, 128 + length * 2));
  } catch {
    return "";
  }
}
