import { schnorr, secp256k1 } from "@noble/curves/secp256k1";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import { InvalidSecretKeyError } from "./errors.js";
import { fromBech32, toBech32 } from "./bech32.js";
import { isValidHex } from "./utils.js";

/**
 * Derive the x-only hex public key for a secret key
 */
export function getPublicKey(secretKey: Uint8Array): string {
  return bytesToHex(schnorr.getPublicKey(secretKey));
}

/**
 * Parse a secret key given as hex or nsec into its 32 raw bytes
 */
export function parseSecretKey(input: string): Uint8Array {
  let hex = input.trim();
  if (hex.startsWith("nsec")) {
    try {
      const decoded = fromBech32(hex);
      if (decoded.kind !== "nsec") {
        throw new InvalidSecretKeyError(`Expected an nsec key, got ${decoded.kind}`);
      }
      hex = decoded.hex;
    } catch (error) {
      if (error instanceof InvalidSecretKeyError) throw error;
      throw new InvalidSecretKeyError("Invalid nsec format", error);
    }
  }

  if (!isValidHex(hex, 64)) {
    throw new InvalidSecretKeyError("Secret key must be 64 hex characters");
  }

  const bytes = hexToBytes(hex.toLowerCase());
  if (!secp256k1.utils.isValidPrivateKey(bytes)) {
    throw new InvalidSecretKeyError("Secret key is out of range for secp256k1");
  }
  return bytes;
}

/**
 * An asymmetric keypair. The public forms are derived from the secret key at
 * construction and never change.
 */
export class Identity {
  readonly publicKey: string;
  readonly npub: string;
  private readonly key: Uint8Array;

  private constructor(secretKey: Uint8Array) {
    this.key = Uint8Array.from(secretKey);
    this.publicKey = getPublicKey(this.key);
    this.npub = toBech32("npub", this.publicKey);
    Object.freeze(this);
  }

  /**
   * Create an identity from a hex or nsec secret key
   */
  static fromSecretKey(secretKey: string | Uint8Array): Identity {
    if (typeof secretKey !== "string") {
      if (secretKey.length !== 32 || !secp256k1.utils.isValidPrivateKey(secretKey)) {
        throw new InvalidSecretKeyError();
      }
      return new Identity(secretKey);
    }
    return new Identity(parseSecretKey(secretKey));
  }

  /**
   * Create an identity from a fresh random key
   */
  static generate(): Identity {
    return new Identity(schnorr.utils.randomPrivateKey());
  }

  /** Copy of the raw secret key */
  get secretKey(): Uint8Array {
    return Uint8Array.from(this.key);
  }

  get secretKeyHex(): string {
    return bytesToHex(this.key);
  }

  get nsec(): string {
    return toBech32("nsec", this.secretKeyHex);
  }

  /**
   * Schnorr-sign a 32-byte event id, returning 128 hex chars
   */
  sign(eventId: string): string {
    return bytesToHex(schnorr.sign(eventId, this.key));
  }
}
