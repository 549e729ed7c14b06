import { z } from "zod";
import type { Event, RelayMessage, ReqFilter } from "./types.js";
import { parseEvent } from "./event.js";

const eventFrame = z.tuple([z.literal("EVENT"), z.string(), z.unknown()]);
const eoseFrame = z.tuple([z.literal("EOSE"), z.string()]);
const okFrame = z.tuple([z.literal("OK"), z.string(), z.boolean()]).rest(z.unknown());
const noticeFrame = z.tuple([z.literal("NOTICE"), z.string()]);
const closedFrame = z.tuple([z.literal("CLOSED"), z.string()]).rest(z.unknown());

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/**
 * Classify a raw relay frame. Returns null for anything that is not one of
 * the known, well-formed relay messages.
 */
export function parseRelayMessage(raw: string): RelayMessage | null {
  const json = parseJson(raw);
  if (!Array.isArray(json) || typeof json[0] !== "string") return null;

  switch (json[0]) {
    case "EVENT": {
      const frame = eventFrame.safeParse(json);
      return frame.success ? { type: "EVENT", subscriptionId: frame.data[1], raw } : null;
    }
    case "EOSE": {
      const frame = eoseFrame.safeParse(json);
      return frame.success ? { type: "EOSE", subscriptionId: frame.data[1] } : null;
    }
    case "OK": {
      const frame = okFrame.safeParse(json);
      if (!frame.success) return null;
      const [, eventId, accepted, message] = frame.data;
      return {
        type: "OK",
        eventId,
        accepted,
        message: typeof message === "string" ? message : "",
      };
    }
    case "NOTICE": {
      const frame = noticeFrame.safeParse(json);
      return frame.success ? { type: "NOTICE", message: frame.data[1] } : null;
    }
    case "CLOSED": {
      const frame = closedFrame.safeParse(json);
      if (!frame.success) return null;
      const message = frame.data[2];
      return {
        type: "CLOSED",
        subscriptionId: frame.data[1],
        message: typeof message === "string" ? message : "",
      };
    }
    default:
      return null;
  }
}

/**
 * Parse the event out of each ["EVENT", id, event] frame, silently skipping
 * frames that are malformed or carry a malformed event
 */
export function extractEvents(frames: readonly string[]): Event[] {
  const events: Event[] = [];
  for (const raw of frames) {
    const json = parseJson(raw);
    const frame = eventFrame.safeParse(json);
    if (!frame.success) continue;
    const event = parseEvent(frame.data[2]);
    if (event) events.push(event);
  }
  return events;
}

export type RelayState = "awaiting" | "settled";

/**
 * Outcome of waiting for relays to finish sending stored events
 */
export interface SettleResult {
  settled: string[];
  timedOut: string[];
}

/**
 * One outstanding subscription: its filters, the EOSE state of every relay
 * that received it, and the raw EVENT frames seen so far
 */
export class Subscription {
  readonly id: string;
  readonly filters: ReqFilter[];
  private relays = new Map<string, RelayState>();
  private frames: string[] = [];
  private seen = new Set<string>();
  private waiters: Array<() => void> = [];

  constructor(id: string, filters: ReqFilter[], relays: Iterable<string> = []) {
    this.id = id;
    this.filters = filters;
    for (const url of relays) {
      this.relays.set(url, "awaiting");
    }
  }

  get relayUrls(): string[] {
    return Array.from(this.relays.keys());
  }

  stateOf(url: string): RelayState | undefined {
    return this.relays.get(url);
  }

  hasRelay(url: string): boolean {
    return this.relays.has(url);
  }

  addRelay(url: string): void {
    if (!this.relays.has(url)) {
      this.relays.set(url, "awaiting");
    }
  }

  /**
   * Buffer a raw EVENT frame. Identical frames are stored once.
   *
   * @returns false when the frame was a duplicate
   */
  addFrame(raw: string): boolean {
    if (this.seen.has(raw)) return false;
    this.seen.add(raw);
    this.frames.push(raw);
    return true;
  }

  /**
   * Mark a relay as done sending stored events
   */
  settle(url: string): void {
    if (this.relays.get(url) !== "awaiting") return;
    this.relays.set(url, "settled");
    this.notify();
  }

  /**
   * Stop waiting on a relay, e.g. after it was removed or its send failed
   */
  dropRelay(url: string): void {
    if (this.relays.delete(url)) {
      this.notify();
    }
  }

  isSettled(): boolean {
    for (const state of this.relays.values()) {
      if (state === "awaiting") return false;
    }
    return true;
  }

  /**
   * Resolve once every relay has settled or the timeout passes, whichever
   * comes first. Never rejects.
   */
  waitSettled(timeoutMs: number): Promise<SettleResult> {
    return new Promise((resolve) => {
      const done = () => {
        clearTimeout(timer);
        this.waiters = this.waiters.filter((waiter) => waiter !== check);
        resolve(this.settleResult());
      };
      const check = () => {
        if (this.isSettled()) done();
      };
      const timer = setTimeout(done, timeoutMs);
      this.waiters.push(check);
      check();
    });
  }

  /**
   * Take every buffered frame, leaving the buffer empty. Duplicates are only
   * suppressed between drains; callers that drain repeatedly dedupe by id.
   */
  drain(): string[] {
    const frames = this.frames;
    this.frames = [];
    this.seen.clear();
    return frames;
  }

  private settleResult(): SettleResult {
    const settled: string[] = [];
    const timedOut: string[] = [];
    for (const [url, state] of this.relays) {
      (state === "settled" ? settled : timedOut).push(url);
    }
    return { settled, timedOut };
  }

  private notify(): void {
    for (const waiter of [...this.waiters]) {
      waiter();
    }
  }
}

/**
 * Routes classified relay frames to outstanding subscriptions. Only EVENT
 * and EOSE are handled here; everything else is left to the caller.
 */
export class SubscriptionMatcher {
  private subscriptions = new Map<string, Subscription>();

  add(subscription: Subscription): void {
    this.subscriptions.set(subscription.id, subscription);
  }

  get(id: string): Subscription | undefined {
    return this.subscriptions.get(id);
  }

  remove(id: string): Subscription | undefined {
    const subscription = this.subscriptions.get(id);
    this.subscriptions.delete(id);
    return subscription;
  }

  values(): IterableIterator<Subscription> {
    return this.subscriptions.values();
  }

  /**
   * @returns the subscription the message was routed to, if any. A repeated
   * EVENT frame is not routed again.
   */
  route(url: string, message: RelayMessage): Subscription | undefined {
    switch (message.type) {
      case "EVENT": {
        const subscription = this.subscriptions.get(message.subscriptionId);
        if (!subscription || !subscription.hasRelay(url)) return undefined;
        return subscription.addFrame(message.raw) ? subscription : undefined;
      }
      case "EOSE": {
        const subscription = this.subscriptions.get(message.subscriptionId);
        if (!subscription) return undefined;
        subscription.settle(url);
        return subscription;
      }
      case "OK":
      case "NOTICE":
      case "CLOSED":
        return undefined;
    }
  }

  /**
   * Forget a relay in every subscription
   */
  dropRelay(url: string): void {
    for (const subscription of this.subscriptions.values()) {
      subscription.dropRelay(url);
    }
  }
}
