import { AbiCoder, isHexString } from "ethers";

const coder = AbiCoder.defaultAbiCoder();

/** The fee leg carries the order id as an ABI-encoded uint256. */
export function encodeOrderPayload(orderId: number): string {
  return coder.encode(["uint256"], [orderId]);
}

export function decodeOrderPayload(payload: string): number | null {
  if (!isHexString(payload, 32)) return null;
  const value: unknown = coder.decode(["uint256"], payload)[0];
  if (typeof value !== "bigint" || value > BigInt(Number.MAX_SAFE_INTEGER)) return null;
  return Number(value);
}
