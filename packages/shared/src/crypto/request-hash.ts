import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils";
import { canonicalize } from "json-canonicalize";

/**
 * Canonical JSON per RFC 8785 (JCS), so that two requests carrying the same
 * fields in a different key order hash identically.
 */
export function canonicalJson(value: unknown): string {
  return canonicalize(value);
}

export function sha256Hex(input: string): string {
  return bytesToHex(sha256(utf8ToBytes(input)));
}

export function requestHash(body: unknown): string {
  return sha256Hex(canonicalJson(body));
}
