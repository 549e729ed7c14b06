import type { Event } from "../types.js";
import type { Identity } from "../keys.js";
import type { RelayPool } from "../relayPool.js";
import { KindOutOfRangeError, NoRelaysError } from "../errors.js";
import { finalizeEventPow } from "../pow.js";
import { supportsNip } from "./nip11.js";

const MAX_BASE_KIND = 9999;
const REPLACEABLE_OFFSET = 10000;
const EPHEMERAL_OFFSET = 20000;

function offsetKind(kind: number, offset: number): number {
  if (!Number.isInteger(kind) || kind < 0 || kind > MAX_BASE_KIND) {
    throw new KindOutOfRangeError(kind, MAX_BASE_KIND);
  }
  return kind + offset;
}

/**
 * Publish to the connected relays whose information document lists NIP-16
 *
 * @returns URLs the event was delivered to
 */
export async function publishNip16Event(pool: RelayPool, event: Event): Promise<string[]> {
  const relays = pool.getRelays();
  const support = await Promise.all(relays.map((url) => supportsNip(url, 16)));
  const supported = relays.filter((_, i) => support[i]);

  if (supported.length === 0) {
    throw new NoRelaysError("No connected relay supports NIP-16");
  }
  return pool.publish(event, supported);
}

/**
 * Publish a replaceable event; `kind` (0-9999) is offset into 10000-19999
 */
export async function publishReplaceableEvent(
  pool: RelayPool,
  identity: Identity,
  kind: number,
  content: string,
  tags: string[][] = [],
  difficulty = pool.powDifficulty
): Promise<Event> {
  const event = await finalizeEventPow(
    { kind: offsetKind(kind, REPLACEABLE_OFFSET), content, tags },
    identity,
    difficulty,
    pool.mineOpts
  );
  await publishNip16Event(pool, event);
  return event;
}

/**
 * Publish an ephemeral event; `kind` (0-9999) is offset into 20000-29999
 */
export async function publishEphemeralEvent(
  pool: RelayPool,
  identity: Identity,
  kind: number,
  content: string,
  tags: string[][] = [],
  difficulty = pool.powDifficulty
): Promise<Event> {
  const event = await finalizeEventPow(
    { kind: offsetKind(kind, EPHEMERAL_OFFSET), content, tags },
    identity,
    difficulty,
    pool.mineOpts
  );
  await publishNip16Event(pool, event);
  return event;
}
