import { Worker } from "worker_threads";
import { hexToBytes } from "@noble/hashes/utils";
import type { Event, EventTemplate, PowResult, PowWorkerData, UnsignedEvent } from "./types.js";
import type { Identity } from "./keys.js";
import { EventBuilder, getEventHash } from "./event.js";
import { InvalidInputError, PowTimeoutError, toError } from "./errors.js";
import { countLeadingZeroBits, isValidHex } from "./utils.js";

/**
 * Options for mineEventPow
 */
export interface MineOpts {
  /** Number of worker threads (default: 1) */
  threads?: number;
  /** Mine on the calling thread instead of a worker */
  inline?: boolean;
  /** Give up after this many milliseconds (default: never) */
  timeoutMs?: number;
}

/**
 * Leading zero bits of a hex event id
 */
export function getPowDifficulty(eventId: string): number {
  if (!isValidHex(eventId) || eventId.length % 2 !== 0) return 0;
  return countLeadingZeroBits(hexToBytes(eventId.toLowerCase()));
}

/**
 * Validate that an event ID has the required number of leading zero bits
 */
export function validatePowDifficulty(eventId: string, bits: number): boolean {
  if (bits <= 0) return true;
  return getPowDifficulty(eventId) >= bits;
}

/**
 * Check if an event has a valid nonce tag for the specified difficulty
 */
export function hasValidPow(
  evt: UnsignedEvent | { tags: ReadonlyArray<ReadonlyArray<string>>; id: string },
  bits: number
): boolean {
  if (bits <= 0) return true;

  const nonceTag = evt.tags.find((tag) => tag[0] === "nonce");
  if (!nonceTag || nonceTag.length < 3) {
    return false;
  }

  const declaredBits = parseInt(nonceTag[2], 10);
  if (isNaN(declaredBits) || declaredBits < bits) {
    return false;
  }

  const eventId = "id" in evt ? evt.id : getEventHash(evt);
  return validatePowDifficulty(eventId, bits);
}

/**
 * Mine on the current thread
 */
export function mineSingleThreaded(
  evt: UnsignedEvent,
  bits: number,
  offset = 0,
  stride = 1,
  timeoutMs?: number
): PowResult {
  const startTime = Date.now();
  const builder = new EventBuilder(evt);
  const iterations = builder.mine(bits, { offset, stride, timeoutMs });
  return {
    event: builder.unsigned,
    id: builder.id(),
    iterations,
    timeMs: Date.now() - startTime,
  };
}

/**
 * Multi-threaded PoW mining using worker threads. Each worker walks its own
 * slice of the nonce space; the first solution wins.
 */
function mineMultiThreaded(
  evt: UnsignedEvent,
  bits: number,
  threads: number,
  timeoutMs?: number
): Promise<PowResult> {
  return new Promise((resolve, reject) => {
    const workers: Worker[] = [];
    const startTime = Date.now();
    let settled = false;
    let timer: NodeJS.Timeout | undefined;

    const finish = (outcome: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      for (const w of workers) {
        w.terminate().catch((error: unknown) => {
          console.warn("Failed to terminate PoW worker:", toError(error).message);
        });
      }
      outcome();
    };

    for (let i = 0; i < threads; i++) {
      const workerData: PowWorkerData = {
        evt,
        bits,
        offset: i,
        stride: threads,
      };

      const worker = new Worker(new URL("./pow.worker.js", import.meta.url), {
        workerData,
      });

      worker.on("message", (result: PowResult) => {
        finish(() => resolve({ ...result, timeMs: Date.now() - startTime }));
      });

      worker.on("error", (error) => {
        finish(() => reject(new Error(`Worker error: ${error.message}`)));
      });

      // Workers are only terminated after settling, so an exit before that is a failure
      worker.on("exit", (code) => {
        finish(() => reject(new Error(`PoW worker exited with code ${code} before finding a nonce`)));
      });

      workers.push(worker);
    }

    if (timeoutMs !== undefined) {
      timer = setTimeout(() => finish(() => reject(new PowTimeoutError(timeoutMs))), timeoutMs);
    }
  });
}

/**
 * Mine proof-of-work for an event template
 *
 * Runs in worker threads by default so relay read loops keep running while
 * mining. Expected iterations are roughly 2^bits.
 *
 * @param evt - Event template to mine
 * @param bits - Target difficulty in leading zero bits
 * @returns Mined fields including the nonce tag, and the resulting id
 */
export async function mineEventPow(
  evt: EventTemplate,
  bits: number,
  { threads = 1, inline = false, timeoutMs }: MineOpts = {}
): Promise<PowResult> {
  if (!Number.isInteger(bits) || bits < 0) {
    throw new InvalidInputError("Difficulty bits must be a non-negative integer");
  }

  const unsigned = new EventBuilder(evt).unsigned;

  if (bits === 0) {
    return { event: unsigned, id: getEventHash(unsigned), iterations: 0, timeMs: 0 };
  }

  if (!Number.isInteger(threads) || threads < 1) {
    throw new InvalidInputError("Thread count must be at least 1");
  }

  console.log(
    `Starting PoW mining: ${bits} bits difficulty, ${inline ? "inline" : `${threads} thread(s)`}`
  );

  const result = inline
    ? mineSingleThreaded(unsigned, bits, 0, 1, timeoutMs)
    : await mineMultiThreaded(unsigned, bits, threads, timeoutMs);

  console.log(
    `PoW mining completed: ${result.iterations} iterations in ${result.timeMs}ms ` +
      `(${Math.round(result.iterations / Math.max(result.timeMs / 1000, 0.001))} iterations/sec)`
  );

  return result;
}

/**
 * Build, mine and sign an event for the identity. Unlike finalizeEvent, any
 * mining goes through mineEventPow, so it runs on worker threads unless
 * `opts.inline` is set.
 */
export async function finalizeEventPow(
  template: Omit<EventTemplate, "pubkey">,
  identity: Identity,
  difficulty: number,
  opts?: MineOpts
): Promise<Event> {
  const { event } = await mineEventPow(
    { ...template, pubkey: identity.publicKey },
    difficulty,
    opts
  );
  return new EventBuilder(event).sign(identity);
}
