import { schnorr } from "@noble/curves/secp256k1";
import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, hexToBytes, utf8ToBytes } from "@noble/hashes/utils";
import { z } from "zod";
import type { Event, EventFields, EventTemplate, UnsignedEvent } from "./types.js";
import type { Identity } from "./keys.js";
import { ErrorCode, InvalidInputError, PowTimeoutError, VerificationError } from "./errors.js";
import { countLeadingZeroBits, getTimestamp, isValidHex } from "./utils.js";

/**
 * Well-known event kinds
 */
export const Kind = {
  Metadata: 0,
  TextNote: 1,
  RecommendRelay: 2,
  Contacts: 3,
  EncryptedDirectMessage: 4,
  EventDeletion: 5,
  Reaction: 7,
} as const;

export const MAX_KIND = 65535;

export function isReplaceableKind(kind: number): boolean {
  return kind >= 10000 && kind < 20000;
}

export function isEphemeralKind(kind: number): boolean {
  return kind >= 20000 && kind < 30000;
}

/**
 * Canonical encoding hashed for the id and signed:
 * `[0,pubkey,created_at,kind,tags,content]` with no whitespace.
 */
export function serializeEvent(evt: EventFields): string {
  return JSON.stringify([0, evt.pubkey, evt.created_at, evt.kind, evt.tags, evt.content]);
}

function hashBytes(evt: EventFields): Uint8Array {
  return sha256(utf8ToBytes(serializeEvent(evt)));
}

/**
 * Event id: hex sha256 of the canonical encoding
 */
export function getEventHash(evt: EventFields): string {
  return bytesToHex(hashBytes(evt));
}

/**
 * Mutable event in preparation. Only encoding, mining and signing are exposed;
 * signing yields a frozen Event and the builder is not reachable from it.
 */
export class EventBuilder {
  private readonly fields: UnsignedEvent;

  constructor(template: EventTemplate) {
    if (!Number.isInteger(template.kind) || template.kind < 0 || template.kind > MAX_KIND) {
      throw new InvalidInputError(`Event kind must be an integer in 0-${MAX_KIND}`);
    }
    if (!isValidHex(template.pubkey, 64)) {
      throw new InvalidInputError("Event pubkey must be 64 hex characters");
    }
    this.fields = {
      pubkey: template.pubkey.toLowerCase(),
      created_at: template.created_at ?? getTimestamp(),
      kind: template.kind,
      tags: (template.tags ?? []).map((tag) => [...tag]),
      content: template.content,
    };
  }

  /** Snapshot of the current fields */
  get unsigned(): UnsignedEvent {
    return { ...this.fields, tags: this.fields.tags.map((tag) => [...tag]) };
  }

  encode(): string {
    return serializeEvent(this.fields);
  }

  id(): string {
    return getEventHash(this.fields);
  }

  /**
   * Search nonces until the id has at least `difficulty` leading zero bits.
   * Each failed attempt drops the nonce tag and refreshes created_at.
   * Expect about 2^difficulty iterations. Without `timeoutMs` there is no
   * upper bound; with it, PowTimeoutError is thrown once the time is spent.
   *
   * @returns number of iterations performed
   */
  mine(
    difficulty: number,
    { offset = 0, stride = 1, timeoutMs }: { offset?: number; stride?: number; timeoutMs?: number } = {}
  ): number {
    if (!Number.isInteger(difficulty) || difficulty < 0) {
      throw new InvalidInputError("Difficulty bits must be a non-negative integer");
    }
    if (difficulty === 0) return 0;

    const target = difficulty.toString();
    const deadline = timeoutMs === undefined ? Infinity : Date.now() + timeoutMs;
    let nonce = offset;
    let iterations = 0;

    for (;;) {
      iterations++;
      this.fields.tags.push(["nonce", nonce.toString(), target]);

      if (countLeadingZeroBits(hashBytes(this.fields)) >= difficulty) {
        return iterations;
      }

      this.fields.tags.pop();
      if (iterations % 1024 === 0 && timeoutMs !== undefined && Date.now() >= deadline) {
        throw new PowTimeoutError(timeoutMs);
      }
      this.fields.created_at = getTimestamp();
      nonce += stride;
    }
  }

  /**
   * Sign with the identity and freeze the result
   */
  sign(identity: Identity): Event {
    if (identity.publicKey !== this.fields.pubkey) {
      throw new InvalidInputError("Identity does not match the event pubkey");
    }
    const id = this.id();
    const tags = Object.freeze(this.fields.tags.map((tag) => Object.freeze([...tag])));
    return Object.freeze({
      id,
      pubkey: this.fields.pubkey,
      created_at: this.fields.created_at,
      kind: this.fields.kind,
      tags,
      content: this.fields.content,
      sig: identity.sign(id),
    });
  }
}

/**
 * Build, optionally mine, and sign an event for the identity
 */
export function finalizeEvent(
  template: Omit<EventTemplate, "pubkey">,
  identity: Identity,
  difficulty = 0
): Event {
  const builder = new EventBuilder({ ...template, pubkey: identity.publicKey });
  builder.mine(difficulty);
  return builder.sign(identity);
}

/**
 * Check an event's id and signature, throwing VerificationError on the first failure
 */
export function verifyEvent(event: Event): void {
  if (!isValidHex(event.sig, 128)) {
    throw new VerificationError(
      "Signature must be 128 hex characters",
      ErrorCode.MALFORMED_SIGNATURE
    );
  }
  if (!isValidHex(event.pubkey, 64)) {
    throw new VerificationError("Pubkey must be 64 hex characters", ErrorCode.MALFORMED_KEY);
  }
  try {
    schnorr.utils.lift_x(BigInt(`0x${event.pubkey}`));
  } catch {
    throw new VerificationError("Pubkey is not a valid curve point", ErrorCode.MALFORMED_KEY);
  }

  const hash = hashBytes(event);
  if (bytesToHex(hash) !== event.id.toLowerCase()) {
    throw new VerificationError("Event id does not match its content", ErrorCode.ID_MISMATCH);
  }

  if (!schnorr.verify(hexToBytes(event.sig.toLowerCase()), hash, hexToBytes(event.pubkey.toLowerCase()))) {
    throw new VerificationError("Signature verification failed", ErrorCode.SIGNATURE_INVALID);
  }
}

export function isVerifiedEvent(event: Event): boolean {
  try {
    verifyEvent(event);
    return true;
  } catch {
    return false;
  }
}

const hex = (length: number) => z.string().regex(new RegExp(`^[a-fA-F0-9]{${length}}$`));

export const eventSchema = z.object({
  id: hex(64),
  pubkey: hex(64),
  created_at: z.number().int().nonnegative(),
  kind: z.number().int().nonnegative(),
  tags: z.array(z.array(z.string())),
  content: z.string(),
  sig: hex(128),
});

/**
 * Validate an untrusted value as an Event, or return null.
 * Shape only; signatures are checked by verifyEvent.
 */
export function parseEvent(value: unknown): Event | null {
  const result = eventSchema.safeParse(value);
  return result.success ? result.data : null;
}
