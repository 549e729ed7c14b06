import type { Event } from "../types.js";
import type { Identity } from "../keys.js";
import type { RelayPool } from "../relayPool.js";
import { InvalidInputError } from "../errors.js";
import { Kind } from "../event.js";
import { finalizeEventPow } from "../pow.js";
import { withHashtags } from "../hashtags.js";
import { isValidRelayUrl } from "../utils.js";

export interface Metadata {
  name?: string;
  about?: string;
  picture?: string;
}

/**
 * Publish profile metadata (kind 0). At least one field is required.
 */
export async function setMetadata(
  pool: RelayPool,
  identity: Identity,
  metadata: Metadata,
  difficulty = pool.powDifficulty
): Promise<Event> {
  const content: Metadata = {};
  if (metadata.name !== undefined) content.name = metadata.name;
  if (metadata.about !== undefined) content.about = metadata.about;
  if (metadata.picture !== undefined) content.picture = metadata.picture;

  if (Object.keys(content).length === 0) {
    throw new InvalidInputError("No metadata provided");
  }

  const event = await finalizeEventPow(
    { kind: Kind.Metadata, content: JSON.stringify(content), tags: [] },
    identity,
    difficulty,
    pool.mineOpts
  );
  await pool.publish(event);
  return event;
}

/**
 * Publish a text note (kind 1). Hashtags in the content are added as "t"
 * tags; pass `hashtagAlphabet` to change what counts as one.
 */
export async function publishTextNote(
  pool: RelayPool,
  identity: Identity,
  content: string,
  tags: string[][] = [],
  difficulty = pool.powDifficulty,
  hashtagAlphabet?: string
): Promise<Event> {
  const event = await finalizeEventPow(
    { kind: Kind.TextNote, content, tags: withHashtags(content, tags, hashtagAlphabet) },
    identity,
    difficulty,
    pool.mineOpts
  );
  await pool.publish(event);
  return event;
}

/**
 * Recommend a relay to followers (kind 2)
 */
export async function addRecommendedRelay(
  pool: RelayPool,
  identity: Identity,
  relayUrl: string,
  difficulty = pool.powDifficulty
): Promise<Event> {
  if (!isValidRelayUrl(relayUrl)) {
    throw new InvalidInputError(`Invalid relay URL: ${relayUrl}`);
  }

  const event = await finalizeEventPow(
    { kind: Kind.RecommendRelay, content: relayUrl, tags: [] },
    identity,
    difficulty,
    pool.mineOpts
  );
  await pool.publish(event);
  return event;
}
