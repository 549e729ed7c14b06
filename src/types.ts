/**
 * Signable fields of an event, in the order the canonical encoding uses them
 */
export interface UnsignedEvent {
  /** Hex x-only public key of the author */
  pubkey: string;
  /** Unix timestamp in seconds */
  created_at: number;
  /** Event kind (0-65535) */
  kind: number;
  /** Ordered tags, each an ordered list of strings */
  tags: string[][];
  /** Arbitrary content, often JSON for structured kinds */
  content: string;
}

/**
 * Read-only view of the signable fields, accepted wherever an event is only encoded
 */
export interface EventFields {
  readonly pubkey: string;
  readonly created_at: number;
  readonly kind: number;
  readonly tags: ReadonlyArray<ReadonlyArray<string>>;
  readonly content: string;
}

/**
 * A signed, immutable event
 */
export interface Event extends EventFields {
  /** sha256 of the canonical encoding, 64 hex chars */
  readonly id: string;
  /** Schnorr signature over the id, 128 hex chars */
  readonly sig: string;
}

/**
 * Input for building an event
 */
export interface EventTemplate {
  pubkey: string;
  kind: number;
  content: string;
  tags?: string[][];
  /** Defaults to now */
  created_at?: number;
}

/**
 * Subscription filter. Absent keys impose no constraint.
 */
export interface ReqFilter {
  /** Event ids or id prefixes */
  ids?: string[];
  /** Author pubkeys or prefixes */
  authors?: string[];
  kinds?: number[];
  /** Event ids referenced in "e" tags */
  "#e"?: string[];
  /** Pubkeys referenced in "p" tags */
  "#p"?: string[];
  since?: number;
  until?: number;
  /** Maximum number of stored events returned */
  limit?: number;
}

/**
 * Frames a relay sends to the client, classified by their first element
 */
export type RelayMessage =
  | { type: "EVENT"; subscriptionId: string; raw: string }
  | { type: "EOSE"; subscriptionId: string }
  | { type: "OK"; eventId: string; accepted: boolean; message: string }
  | { type: "NOTICE"; message: string }
  | { type: "CLOSED"; subscriptionId: string; message: string };

/**
 * Client configuration, usually loaded from environment variables
 */
export interface NostrConfig {
  /** Secret key (hex or nsec), if the client signs */
  privkey?: string;
  /** List of relay URLs */
  relays: string[];
  /** PoW difficulty in bits (0 = disabled) */
  powDifficulty: number;
  /** Number of worker threads for PoW mining */
  powThreads: number;
  /** How long a one-shot query waits for every relay's EOSE */
  eoseTimeoutMs: number;
  /** Connection timeout per relay */
  connectTimeoutMs: number;
}

/**
 * PoW mining result
 */
export interface PowResult {
  /** Mined event fields, including the nonce tag */
  event: UnsignedEvent;
  /** Resulting event id */
  id: string;
  /** Number of iterations performed */
  iterations: number;
  /** Time taken in milliseconds */
  timeMs: number;
}

/**
 * Worker thread data for PoW mining
 */
export interface PowWorkerData {
  /** Event to mine */
  evt: UnsignedEvent;
  /** Target difficulty in bits */
  bits: number;
  /** Starting nonce offset */
  offset: number;
  /** Nonce increment stride */
  stride: number;
}

/**
 * Outcome of a one-shot query across relays
 */
export interface CollectionResult {
  /** Deduplicated events, in arrival order */
  events: Event[];
  /** Relays that sent EOSE */
  settled: string[];
  /** Relays that missed the deadline; their events so far are still included */
  timedOut: string[];
}

/**
 * Options for a one-shot query
 */
export interface CollectOpts {
  /** Deadline for every relay's EOSE (default: config.eoseTimeoutMs) */
  timeoutMs?: number;
  /** Drop events whose signature does not verify (default true) */
  verify?: boolean;
  /** Subscription id to use instead of a random one */
  subscriptionId?: string;
}

/**
 * Handle for a live subscription
 */
export interface SubscriptionHandle {
  /** Subscription id sent to relays */
  readonly id: string;
  /** Close the subscription */
  close(): Promise<void>;
  /** Async iterator for incoming events */
  [Symbol.asyncIterator](): AsyncIterableIterator<Event>;
}

/**
 * Relay information document (NIP-11)
 */
export interface RelayInformationDocument {
  id?: string;
  name?: string;
  description?: string;
  pubkey?: string;
  contact?: string;
  supported_nips?: number[];
  software?: string;
  version?: string;
}
