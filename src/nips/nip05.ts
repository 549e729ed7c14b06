import { nip05 } from "nostr-tools";
import { autoToHex } from "../bech32.js";
import { Nip05Error } from "../errors.js";

const IDENTIFIER = /^([\w.+-]+)@([\w-]+(?:\.[\w-]+)+)$/;

/**
 * Split `name@domain` (or `_@domain`) into its parts
 */
export function parseNip05Identifier(identifier: string): { name: string; domain: string } {
  const match = IDENTIFIER.exec(identifier.trim());
  if (!match) {
    throw new Nip05Error("NIP-05 identifier must be in the form name@domain or _@domain");
  }
  return { name: match[1], domain: match[2].toLowerCase() };
}

/**
 * Look up the hex pubkey an identifier points to
 */
export async function getNip05Pubkey(identifier: string): Promise<string> {
  const { name, domain } = parseNip05Identifier(identifier);

  let profile: Awaited<ReturnType<typeof nip05.queryProfile>>;
  try {
    profile = await nip05.queryProfile(`${name}@${domain}`);
  } catch (error) {
    throw new Nip05Error(`NIP-05 lookup for ${identifier} failed`, error);
  }

  if (!profile) {
    throw new Nip05Error(`No pubkey published for ${identifier}`);
  }
  return profile.pubkey;
}

/**
 * Whether the identifier resolves to the given pubkey (hex or npub)
 */
export async function checkNip05(identifier: string, pubkey: string): Promise<boolean> {
  const expected = autoToHex(pubkey);
  const found = await getNip05Pubkey(identifier);
  return found.toLowerCase() === expected;
}
