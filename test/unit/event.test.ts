import { describe, it, expect } from "vitest";
import {
  EventBuilder,
  finalizeEvent,
  getEventHash,
  isVerifiedEvent,
  parseEvent,
  serializeEvent,
  verifyEvent,
} from "../../src/event.js";
import { Identity } from "../../src/keys.js";
import { ErrorCode, InvalidInputError, VerificationError } from "../../src/errors.js";
import type { Event } from "../../src/types.js";

const P = "79be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798";
const identity = Identity.fromSecretKey("00".repeat(31) + "01");

const base = { pubkey: P, created_at: 0, kind: 0, tags: [], content: "content" };

function verificationCode(event: Event): ErrorCode | undefined {
  try {
    verifyEvent(event);
    return undefined;
  } catch (error) {
    expect(error).toBeInstanceOf(VerificationError);
    return error instanceof VerificationError ? error.code : undefined;
  }
}

describe("serializeEvent", () => {
  it("produces the canonical array with no whitespace", () => {
    expect(serializeEvent(base)).toBe(`[0,"${P}",0,0,[],"content"]`);
  });

  it("escapes quotes and newlines in content", () => {
    expect(serializeEvent({ ...base, kind: 1, content: 'say "hi"\n' })).toBe(
      `[0,"${P}",0,1,[],"say \\"hi\\"\\n"]`
    );
  });

  it("keeps tag order", () => {
    const tags = [
      ["p", "b"],
      ["e", "a"],
    ];
    expect(serializeEvent({ ...base, tags })).toBe(
      `[0,"${P}",0,0,[["p","b"],["e","a"]],"content"]`
    );
  });
});

describe("getEventHash", () => {
  it("hashes the canonical encoding", () => {
    expect(getEventHash(base)).toBe(
      "91d69032185bdebe4265ff9445087da23b284e7eaca1fde2436e8d27a3a8327e"
    );
  });

  it("changes when any single field changes", () => {
    expect(getEventHash({ ...base, kind: 1 })).toBe(
      "5631813bc0f554cb3275a55f0d60ff1c6aa941f0a210d69276137ee845a64955"
    );
    expect(getEventHash({ ...base, created_at: 1 })).toBe(
      "5a44c3adf7ae742b60e2aece0124379750dffb03b2cec2667d1a5894d789afd4"
    );
    expect(getEventHash({ ...base, content: "content!" })).toBe(
      "db6428c0917dcdabbacf3204fb989cbcbf3c9e50dc14bbb36935f06d9245ea1d"
    );
    expect(getEventHash({ ...base, tags: [["t", "x"]] })).toBe(
      "6bf02ee1c5e61715a86a64a44703a1370ba7fd3892d3f85b608c8308e821de25"
    );
  });

  it("is deterministic", () => {
    expect(getEventHash(base)).toBe(getEventHash({ ...base }));
  });
});

describe("EventBuilder", () => {
  it("encodes and hashes its fields", () => {
    const builder = new EventBuilder({ ...base });
    expect(builder.encode()).toBe(serializeEvent(base));
    expect(builder.id()).toBe(getEventHash(base));
  });

  it("lowercases the pubkey", () => {
    const builder = new EventBuilder({ ...base, pubkey: P.toUpperCase() });
    expect(builder.unsigned.pubkey).toBe(P);
  });

  it("rejects kinds outside 0-65535", () => {
    expect(() => new EventBuilder({ ...base, kind: 65536 })).toThrow(InvalidInputError);
    expect(() => new EventBuilder({ ...base, kind: -1 })).toThrow(InvalidInputError);
    expect(() => new EventBuilder({ ...base, kind: 1.5 })).toThrow(InvalidInputError);
  });

  it("rejects malformed pubkeys", () => {
    expect(() => new EventBuilder({ ...base, pubkey: "abc" })).toThrow(InvalidInputError);
  });

  it("does not share tag arrays with the template", () => {
    const tags = [["t", "x"]];
    const builder = new EventBuilder({ ...base, tags });
    tags[0][1] = "y";
    expect(builder.unsigned.tags).toEqual([["t", "x"]]);
  });

  it("signs into a frozen event", () => {
    const event = new EventBuilder({ ...base }).sign(identity);
    expect(event.id).toBe("91d69032185bdebe4265ff9445087da23b284e7eaca1fde2436e8d27a3a8327e");
    expect(event.sig).toMatch(/^[0-9a-f]{128}$/);
    expect(Object.isFrozen(event)).toBe(true);
    expect(Object.isFrozen(event.tags)).toBe(true);
  });

  it("refuses to sign with a different identity", () => {
    const other = Identity.fromSecretKey("00".repeat(31) + "03");
    expect(() => new EventBuilder({ ...base }).sign(other)).toThrow(InvalidInputError);
  });
});

describe("verifyEvent", () => {
  const event = finalizeEvent({ kind: 1, content: "hello", created_at: 1000 }, identity);

  it("accepts a freshly signed event", () => {
    expect(() => verifyEvent(event)).not.toThrow();
    expect(isVerifiedEvent(event)).toBe(true);
  });

  it("reports a malformed signature", () => {
    expect(verificationCode({ ...event, sig: "abc" })).toBe(ErrorCode.MALFORMED_SIGNATURE);
  });

  it("reports a pubkey that is not a curve point", () => {
    expect(verificationCode({ ...event, pubkey: "f".repeat(64) })).toBe(ErrorCode.MALFORMED_KEY);
  });

  it("reports a pubkey that is not hex", () => {
    expect(verificationCode({ ...event, pubkey: "z".repeat(64) })).toBe(ErrorCode.MALFORMED_KEY);
  });

  it("reports content changed after signing", () => {
    expect(verificationCode({ ...event, content: "tampered" })).toBe(ErrorCode.ID_MISMATCH);
  });

  it("reports a signature made over another id", () => {
    const other = finalizeEvent({ kind: 1, content: "other", created_at: 1000 }, identity);
    expect(verificationCode({ ...event, sig: other.sig })).toBe(ErrorCode.SIGNATURE_INVALID);
    expect(isVerifiedEvent({ ...event, sig: other.sig })).toBe(false);
  });
});

describe("finalizeEvent", () => {
  it("mines when given a difficulty", () => {
    const event = finalizeEvent({ kind: 1, content: "pow", created_at: 1000 }, identity, 4);
    const nonce = event.tags.find((tag) => tag[0] === "nonce");
    expect(nonce?.[2]).toBe("4");
    expect(isVerifiedEvent(event)).toBe(true);
  });
});

describe("parseEvent", () => {
  it("accepts a well-formed event", () => {
    const event = finalizeEvent({ kind: 1, content: "hello", created_at: 1000 }, identity);
    expect(parseEvent(JSON.parse(JSON.stringify(event)))).toEqual(event);
  });

  it("returns null for missing fields", () => {
    expect(parseEvent({ id: "00", kind: 1 })).toBeNull();
    expect(parseEvent("not an event")).toBeNull();
  });
});
