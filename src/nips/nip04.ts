import { nip04 } from "nostr-tools";
import type { CollectOpts, Event, ReqFilter } from "../types.js";
import type { Identity } from "../keys.js";
import type { RelayPool } from "../relayPool.js";
import { autoToHex } from "../bech32.js";
import { Kind } from "../event.js";
import { finalizeEventPow } from "../pow.js";
import { toError } from "../errors.js";

export interface PrivateMessage {
  /** Hex pubkey of the sender */
  author: string;
  content: string;
  timestamp: number;
}

/**
 * Encrypt a message for a pubkey (hex or npub) and publish it (kind 4)
 */
export async function sendPrivateMessage(
  pool: RelayPool,
  identity: Identity,
  recipient: string,
  message: string,
  difficulty = pool.powDifficulty
): Promise<Event> {
  const recipientHex = autoToHex(recipient);
  const encrypted = await nip04.encrypt(identity.secretKeyHex, recipientHex, message);

  const event = await finalizeEventPow(
    { kind: Kind.EncryptedDirectMessage, content: encrypted, tags: [["p", recipientHex]] },
    identity,
    difficulty,
    pool.mineOpts
  );
  await pool.publish(event);
  return event;
}

function conversationFilters(self: string, other: string, limit: number): ReqFilter[] {
  return [
    { authors: [self], kinds: [Kind.EncryptedDirectMessage], "#p": [other], limit },
    { authors: [other], kinds: [Kind.EncryptedDirectMessage], "#p": [self], limit },
  ];
}

/**
 * Encrypted events exchanged with a pubkey, in both directions
 */
export async function getPrivateEventsWith(
  pool: RelayPool,
  identity: Identity,
  pubkey: string,
  limit: number,
  opts?: CollectOpts
): Promise<Event[]> {
  const other = autoToHex(pubkey);
  return pool.getEventsOf(conversationFilters(identity.publicKey, other, limit), opts);
}

/**
 * Decrypt a conversation's events, newest first. Events that fail to decrypt
 * are skipped.
 */
export async function decryptPrivateMessages(
  identity: Identity,
  counterparty: string,
  events: Event[]
): Promise<PrivateMessage[]> {
  const other = autoToHex(counterparty);
  const messages: PrivateMessage[] = [];

  for (const event of events) {
    try {
      const content = await nip04.decrypt(identity.secretKeyHex, other, event.content);
      messages.push({ author: event.pubkey, content, timestamp: event.created_at });
    } catch (error) {
      console.warn(`Skipping undecryptable message ${event.id}:`, toError(error).message);
    }
  }

  return messages.sort((a, b) => b.timestamp - a.timestamp);
}

/**
 * Fetch and decrypt the conversation with a pubkey, newest first
 */
export async function getPrivateMessagesWith(
  pool: RelayPool,
  identity: Identity,
  pubkey: string,
  limit: number,
  opts?: CollectOpts
): Promise<PrivateMessage[]> {
  const events = await getPrivateEventsWith(pool, identity, pubkey, limit, opts);
  return decryptPrivateMessages(identity, pubkey, events);
}
