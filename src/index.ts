/**
 * nostr-wire - Nostr client library
 *
 * Canonical event encoding, content-addressed ids, Schnorr signing, proof-of-work
 * mining, and a relay pool that fans frames out to many relays and gathers the
 * results back.
 *
 * @example Basic Usage
 * ```typescript
 * import { Identity, createClient, finalizeEvent } from 'nostr-wire';
 *
 * const identity = Identity.generate();
 * const pool = createClient({ relays: ['wss://relay.example.com'] });
 * await pool.connect();
 *
 * const note = finalizeEvent({ kind: 1, content: 'hello' }, identity);
 * await pool.publish(note);
 *
 * const events = await pool.getEventsOf([{ authors: [identity.publicKey] }]);
 * await pool.disconnect();
 * ```
 *
 * @example Live subscription
 * ```typescript
 * const sub = await pool.stream([{ kinds: [1] }]);
 * for await (const event of sub) {
 *   console.log(event.content);
 * }
 * ```
 *
 * @example Environment Configuration
 * Set these environment variables:
 * - `NOSTR_PRIVKEY`: Your private key (hex or nsec, optional)
 * - `NOSTR_RELAYS`: Comma-separated relay URLs
 * - `NOSTR_POW_DIFFICULTY`: Default PoW bits (optional)
 * - `NOSTR_POW_THREADS`: Worker threads for PoW (optional)
 * - `NOSTR_EOSE_TIMEOUT_MS`: How long queries wait for relays (optional)
 * - `NOSTR_CONNECT_TIMEOUT_MS`: Connection timeout per relay (optional)
 */

/**
 * Keys and identities
 *
 * An Identity holds a secret key and the public forms derived from it. It signs
 * event ids and is never mutated after construction.
 */
export { Identity, getPublicKey, parseSecretKey } from "./keys.js";

/**
 * Events: canonical encoding, ids, building, signing and verification
 *
 * @example
 * ```typescript
 * const builder = new EventBuilder({ pubkey: identity.publicKey, kind: 1, content: 'hi' });
 * builder.mine(8);
 * const event = builder.sign(identity);
 * verifyEvent(event); // throws VerificationError on failure
 * ```
 */
export {
  EventBuilder,
  Kind,
  MAX_KIND,
  finalizeEvent,
  getEventHash,
  isEphemeralKind,
  isReplaceableKind,
  isVerifiedEvent,
  parseEvent,
  serializeEvent,
  verifyEvent,
} from "./event.js";

/**
 * Proof-of-work
 *
 * Mines on worker threads by default; pass `inline: true` to mine on the
 * calling thread.
 */
export {
  finalizeEventPow,
  getPowDifficulty,
  hasValidPow,
  mineEventPow,
  mineSingleThreaded,
  validatePowDifficulty,
} from "./pow.js";
export type { MineOpts } from "./pow.js";

/**
 * Relay pool
 */
export { RelayPool, createClient } from "./relayPool.js";
export type { RelayPoolEvents } from "./relayPool.js";
export { RelaySession, WebSocketChannel, connectWebSocket } from "./relay.js";
export type { ChannelFactory, RelayChannel } from "./relay.js";
export { LiveSubscription } from "./stream.js";

/**
 * Subscriptions and filters
 */
export {
  Subscription,
  SubscriptionMatcher,
  extractEvents,
  parseRelayMessage,
} from "./subscription.js";
export type { RelayState, SettleResult } from "./subscription.js";
export {
  formatCloseMessage,
  formatEventMessage,
  formatReqMessage,
  matchFilter,
  matchFilters,
  serializeFilter,
} from "./filter.js";

/**
 * Bech32 (npub / nsec / note) conversion
 */
export { autoToHex, fromBech32, toBech32 } from "./bech32.js";
export type { Bech32Kind } from "./bech32.js";

export { DEFAULT_HASHTAG_ALPHABET, parseHashtags } from "./hashtags.js";

/**
 * Protocol extensions
 */
export { addRecommendedRelay, publishTextNote, setMetadata } from "./nips/nip01.js";
export type { Metadata } from "./nips/nip01.js";
export { contactToTag, getContactList, setContactList, tagToContact } from "./nips/nip02.js";
export type { ContactListTag } from "./nips/nip02.js";
export {
  decryptPrivateMessages,
  getPrivateEventsWith,
  getPrivateMessagesWith,
  sendPrivateMessage,
} from "./nips/nip04.js";
export type { PrivateMessage } from "./nips/nip04.js";
export { checkNip05, getNip05Pubkey, parseNip05Identifier } from "./nips/nip05.js";
export { deleteEvent } from "./nips/nip09.js";
export { getRelayInformationDocument, supportsNip } from "./nips/nip11.js";
export { publishPowTextNote } from "./nips/nip13.js";
export {
  publishEphemeralEvent,
  publishNip16Event,
  publishReplaceableEvent,
} from "./nips/nip16.js";
export { dislike, like, reactTo } from "./nips/nip25.js";

/**
 * Configuration and helpers
 */
export {
  generateSubscriptionId,
  isValidPubkey,
  isValidRelayUrl,
  loadConfig,
} from "./utils.js";

/**
 * Errors
 *
 * Every error the library raises extends NostrError and carries a stable `code`.
 */
export * from "./errors.js";

// Export TypeScript types for library consumers
export type {
  CollectOpts,
  CollectionResult,
  Event,
  EventFields,
  EventTemplate,
  NostrConfig,
  PowResult,
  RelayInformationDocument,
  RelayMessage,
  ReqFilter,
  SubscriptionHandle,
  UnsignedEvent,
} from "./types.js";
