import type { Event } from "../types.js";
import type { Identity } from "../keys.js";
import type { RelayPool } from "../relayPool.js";
import { autoToHex } from "../bech32.js";
import { Kind } from "../event.js";
import { finalizeEventPow } from "../pow.js";

/**
 * React to an event (kind 7). Ids and pubkeys may be hex or bech32.
 */
export async function reactTo(
  pool: RelayPool,
  identity: Identity,
  eventId: string,
  eventPubkey: string,
  reaction: string,
  difficulty = pool.powDifficulty
): Promise<Event> {
  const event = await finalizeEventPow(
    {
      kind: Kind.Reaction,
      content: reaction,
      tags: [
        ["e", autoToHex(eventId)],
        ["p", autoToHex(eventPubkey)],
      ],
    },
    identity,
    difficulty,
    pool.mineOpts
  );
  await pool.publish(event);
  return event;
}

export function like(
  pool: RelayPool,
  identity: Identity,
  eventId: string,
  eventPubkey: string,
  difficulty = pool.powDifficulty
): Promise<Event> {
  return reactTo(pool, identity, eventId, eventPubkey, "+", difficulty);
}

export function dislike(
  pool: RelayPool,
  identity: Identity,
  eventId: string,
  eventPubkey: string,
  difficulty = pool.powDifficulty
): Promise<Event> {
  return reactTo(pool, identity, eventId, eventPubkey, "-", difficulty);
}
