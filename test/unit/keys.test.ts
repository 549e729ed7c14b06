import { describe, it, expect } from "vitest";
import { Identity, getPublicKey, parseSecretKey } from "../../src/keys.js";
import { InvalidSecretKeyError } from "../../src/errors.js";
import { hexToBytes } from "@noble/hashes/utils";

const SK1 = "00".repeat(31) + "01";
const SK3 = "00".repeat(31) + "03";
const P1 = "79be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798";
const P3 = "f9308a019258c31049344f85f89d5229b531c845836f99b08601f113bce036f9";
const CURVE_ORDER = "fffffffffffffffffffffffffffffffebaaedce6af48a03bbfd25e8cd0364141";

describe("getPublicKey", () => {
  it("derives x-only public keys", () => {
    expect(getPublicKey(hexToBytes(SK1))).toBe(P1);
    expect(getPublicKey(hexToBytes(SK3))).toBe(P3);
  });
});

describe("parseSecretKey", () => {
  it("accepts hex in either case", () => {
    expect(parseSecretKey(SK3.toUpperCase())).toEqual(hexToBytes(SK3));
  });

  it("rejects zero and out-of-range scalars", () => {
    expect(() => parseSecretKey("00".repeat(32))).toThrow(InvalidSecretKeyError);
    expect(() => parseSecretKey(CURVE_ORDER)).toThrow(InvalidSecretKeyError);
  });

  it("rejects wrong lengths and non-hex", () => {
    expect(() => parseSecretKey("abcd")).toThrow(InvalidSecretKeyError);
    expect(() => parseSecretKey("g".repeat(64))).toThrow(InvalidSecretKeyError);
  });

  it("rejects a malformed nsec", () => {
    expect(() => parseSecretKey("nsec1notakey")).toThrow(InvalidSecretKeyError);
  });
});

describe("Identity", () => {
  it("derives the public forms from the secret key", () => {
    const identity = Identity.fromSecretKey(SK3);
    expect(identity.publicKey).toBe(P3);
    expect(identity.npub.startsWith("npub1")).toBe(true);
    expect(identity.secretKeyHex).toBe(SK3);
  });

  it("round-trips through nsec", () => {
    const identity = Identity.fromSecretKey(SK3);
    const restored = Identity.fromSecretKey(identity.nsec);
    expect(restored.publicKey).toBe(P3);
  });

  it("accepts raw bytes", () => {
    expect(Identity.fromSecretKey(hexToBytes(SK1)).publicKey).toBe(P1);
    expect(() => Identity.fromSecretKey(new Uint8Array(31))).toThrow(InvalidSecretKeyError);
  });

  it("hands out copies of the secret key", () => {
    const identity = Identity.fromSecretKey(SK1);
    const copy = identity.secretKey;
    copy[31] = 9;
    expect(identity.secretKeyHex).toBe(SK1);
  });

  it("is frozen", () => {
    expect(Object.isFrozen(Identity.fromSecretKey(SK1))).toBe(true);
  });

  it("generates distinct identities", () => {
    const a = Identity.generate();
    const b = Identity.generate();
    expect(a.publicKey).toMatch(/^[0-9a-f]{64}$/);
    expect(a.publicKey).not.toBe(b.publicKey);
  });

  it("signs event ids", () => {
    const sig = Identity.fromSecretKey(SK1).sign("ab".repeat(32));
    expect(sig).toMatch(/^[0-9a-f]{128}$/);
  });
});
