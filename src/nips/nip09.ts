import type { Event } from "../types.js";
import type { Identity } from "../keys.js";
import type { RelayPool } from "../relayPool.js";
import { autoToHex } from "../bech32.js";
import { Kind } from "../event.js";
import { finalizeEventPow } from "../pow.js";

/**
 * Ask relays to delete one of our events (kind 5)
 */
export async function deleteEvent(
  pool: RelayPool,
  identity: Identity,
  eventId: string,
  reason = "",
  difficulty = pool.powDifficulty
): Promise<Event> {
  const event = await finalizeEventPow(
    { kind: Kind.EventDeletion, content: reason, tags: [["e", autoToHex(eventId)]] },
    identity,
    difficulty,
    pool.mineOpts
  );
  await pool.publish(event);
  return event;
}
