import { nip19 } from "nostr-tools";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import { Bech32Error } from "./errors.js";
import { isValidHex } from "./utils.js";

export type Bech32Kind = "nsec" | "npub" | "note";

/**
 * Encode a 32-byte hex key or id in its human-readable form.
 * Already-encoded input of the same kind is returned as is.
 */
export function toBech32(kind: Bech32Kind, hex: string): string {
  if (hex.startsWith(kind)) return hex;
  if (/^(nsec|npub|note)1/.test(hex)) {
    throw new Bech32Error(`Bech32 given key is not a ${kind}`);
  }
  if (!isValidHex(hex, 64)) {
    throw new Bech32Error("Invalid hex string");
  }

  const normalized = hex.toLowerCase();
  switch (kind) {
    case "nsec":
      return nip19.nsecEncode(hexToBytes(normalized));
    case "npub":
      return nip19.npubEncode(normalized);
    case "note":
      return nip19.noteEncode(normalized);
  }
}

/**
 * Decode an nsec, npub or note string to its kind and hex payload
 */
export function fromBech32(encoded: string): { kind: Bech32Kind; hex: string } {
  let decoded: nip19.DecodedResult;
  try {
    decoded = nip19.decode(encoded);
  } catch (error) {
    throw new Bech32Error(`Invalid bech32 string: ${encoded}`, error);
  }

  switch (decoded.type) {
    case "nsec":
      return { kind: "nsec", hex: bytesToHex(decoded.data) };
    case "npub":
      return { kind: "npub", hex: decoded.data };
    case "note":
      return { kind: "note", hex: decoded.data };
    default:
      throw new Bech32Error(`Unsupported bech32 prefix: ${decoded.type}`);
  }
}

/**
 * Accept either hex or an npub/note/nsec string and return hex
 */
export function autoToHex(key: string): string {
  if (/^(nsec|npub|note)1/.test(key)) {
    return fromBech32(key).hex;
  }
  if (!isValidHex(key, 64)) {
    throw new Bech32Error("Invalid hex string");
  }
  return key.toLowerCase();
}
