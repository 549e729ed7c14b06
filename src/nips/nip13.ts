import type { Event } from "../types.js";
import type { Identity } from "../keys.js";
import type { RelayPool } from "../relayPool.js";
import { Kind } from "../event.js";
import { withHashtags } from "../hashtags.js";
import { type MineOpts, finalizeEventPow } from "../pow.js";

/**
 * Mine a text note to the given difficulty, sign and publish it. Mining runs
 * on worker threads unless `opts.inline` is set.
 */
export async function publishPowTextNote(
  pool: RelayPool,
  identity: Identity,
  content: string,
  tags: string[][],
  difficulty: number,
  opts: MineOpts = pool.mineOpts
): Promise<Event> {
  const event = await finalizeEventPow(
    { kind: Kind.TextNote, content, tags: withHashtags(content, tags) },
    identity,
    difficulty,
    opts
  );
  await pool.publish(event);
  return event;
}
