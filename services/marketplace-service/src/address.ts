import { getAddress, isAddress, ZeroAddress } from "ethers";
import type { Address } from "@itemex/shared";

export { ZeroAddress };

/** Returns the checksummed form, or null for anything that is not a 20-byte hex address. */
export function normalizeAddress(value: unknown): Address | null {
  if (typeof value !== "string" || !isAddress(value)) return null;
  return getAddress(value);
}

export function sameAddress(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export function isZeroAddress(value: Address): boolean {
  return sameAddress(value, ZeroAddress);
}
