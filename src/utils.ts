import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, randomBytes } from "@noble/hashes/utils";
import { z } from "zod";
import type { NostrConfig } from "./types.js";
import { ConfigError } from "./errors.js";

const HEX_RE = /^[a-fA-F0-9]+$/;

/**
 * Validate a hex string
 */
export function isValidHex(str: string, expectedLength?: number): boolean {
  if (typeof str !== "string") return false;
  if (expectedLength !== undefined && str.length !== expectedLength) return false;
  return HEX_RE.test(str);
}

/**
 * Validate a pubkey (64 hex characters)
 */
export function isValidPubkey(pubkey: string): boolean {
  return isValidHex(pubkey, 64);
}

/**
 * Validate a relay URL
 */
export function isValidRelayUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return parsed.protocol === "ws:" || parsed.protocol === "wss:";
  } catch {
    return false;
  }
}

const relayUrl = z.string().refine(isValidRelayUrl, {
  message: "must be a ws:// or wss:// URL",
});

const intFromEnv = (fallback: number, min: number) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === "") return fallback;
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed < min) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `must be an integer >= ${min}`,
        });
        return z.NEVER;
      }
      return parsed;
    });

const envSchema = z.object({
  NOSTR_PRIVKEY: z
    .string()
    .optional()
    .refine(
      (key) => key === undefined || isValidHex(key, 64) || key.startsWith("nsec1"),
      { message: "must be a 64-character hex string or an nsec key" }
    ),
  NOSTR_RELAYS: z
    .string()
    .optional()
    .transform((value) =>
      (value ?? "")
        .split(",")
        .map((url) => url.trim())
        .filter(Boolean)
    )
    .pipe(z.array(relayUrl)),
  NOSTR_POW_DIFFICULTY: intFromEnv(0, 0),
  NOSTR_POW_THREADS: intFromEnv(1, 1),
  NOSTR_EOSE_TIMEOUT_MS: intFromEnv(5000, 1),
  NOSTR_CONNECT_TIMEOUT_MS: intFromEnv(10000, 1),
});

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): NostrConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")} ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const vars = parsed.data;
  return {
    privkey: vars.NOSTR_PRIVKEY,
    relays: vars.NOSTR_RELAYS,
    powDifficulty: vars.NOSTR_POW_DIFFICULTY,
    powThreads: vars.NOSTR_POW_THREADS,
    eoseTimeoutMs: vars.NOSTR_EOSE_TIMEOUT_MS,
    connectTimeoutMs: vars.NOSTR_CONNECT_TIMEOUT_MS,
  };
}

/**
 * Random 64-char hex identifier, used for subscriptions
 */
export function generateSubscriptionId(): string {
  return bytesToHex(sha256(randomBytes(32)));
}

/**
 * Count leading zero bits, byte by byte, stopping at the first non-zero byte
 */
export function countLeadingZeroBits(bytes: Uint8Array): number {
  let count = 0;
  for (const byte of bytes) {
    if (byte === 0) {
      count += 8;
      continue;
    }
    count += Math.clz32(byte) - 24;
    break;
  }
  return count;
}

/**
 * Current unix time in seconds
 */
export function getTimestamp(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * Sleep for a specified number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Create a promise that rejects after a timeout
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  errorMessage = "Operation timed out"
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(errorMessage)), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Serializes async critical sections
 */
export class AsyncMutex {
  private queue: Array<() => void> = [];
  private locked = false;

  async lock(): Promise<void> {
    if (this.locked) {
      await new Promise<void>((resolve) => this.queue.push(resolve));
    }
    this.locked = true;
  }

  unlock(): void {
    const next = this.queue.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.lock();
    try {
      return await fn();
    } finally {
      this.unlock();
    }
  }
}
