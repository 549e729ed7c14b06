import type { CollectOpts, Event } from "../types.js";
import type { Identity } from "../keys.js";
import type { RelayPool } from "../relayPool.js";
import { autoToHex } from "../bech32.js";
import { Kind } from "../event.js";
import { finalizeEventPow } from "../pow.js";

/**
 * One followed key, with an optional relay hint and petname
 */
export interface ContactListTag {
  key: string;
  mainRelay?: string;
  surname?: string;
}

/**
 * `["p", key, relay?, surname?]`. A surname without a relay keeps its
 * position by writing the relay as "".
 */
export function contactToTag(contact: ContactListTag): string[] {
  const tag = ["p", contact.key];

  if (contact.mainRelay !== undefined) {
    tag.push(contact.mainRelay);
    if (contact.surname !== undefined) {
      tag.push(contact.surname);
    }
  } else if (contact.surname !== undefined) {
    tag.push("", contact.surname);
  }

  return tag;
}

export function tagToContact(tag: ReadonlyArray<string>): ContactListTag | null {
  if (tag[0] !== "p" || tag[1] === undefined) return null;

  const contact: ContactListTag = { key: tag[1] };
  if (tag.length > 2) contact.mainRelay = tag[2];
  if (tag.length > 3) contact.surname = tag[3];
  return contact;
}

/**
 * Publish the full contact list (kind 3), replacing the previous one
 */
export async function setContactList(
  pool: RelayPool,
  identity: Identity,
  contacts: ContactListTag[],
  difficulty = pool.powDifficulty
): Promise<Event> {
  const event = await finalizeEventPow(
    { kind: Kind.Contacts, content: "", tags: contacts.map(contactToTag) },
    identity,
    difficulty,
    pool.mineOpts
  );
  await pool.publish(event);
  return event;
}

/**
 * Fetch the newest contact list of a pubkey (hex or npub)
 */
export async function getContactList(
  pool: RelayPool,
  pubkey: string,
  opts?: CollectOpts
): Promise<ContactListTag[]> {
  const author = autoToHex(pubkey);
  const events = await pool.getEventsOf(
    [{ authors: [author], kinds: [Kind.Contacts], limit: 1 }],
    opts
  );

  const latest = events.reduce<Event | undefined>(
    (newest, event) => (!newest || event.created_at > newest.created_at ? event : newest),
    undefined
  );
  if (!latest) return [];

  const contacts: ContactListTag[] = [];
  for (const tag of latest.tags) {
    const contact = tagToContact(tag);
    if (contact) contacts.push(contact);
  }
  return contacts;
}
