import { nip11 } from "nostr-tools";
import { z } from "zod";
import type { RelayInformationDocument } from "../types.js";
import { RelayInfoError, UrlParseError } from "../errors.js";
import { isValidRelayUrl } from "../utils.js";

const relayInfoSchema = z.object({
  id: z.string().optional(),
  name: z.string().optional(),
  description: z.string().optional(),
  pubkey: z.string().optional(),
  contact: z.string().optional(),
  supported_nips: z.array(z.number().int()).optional(),
  software: z.string().optional(),
  version: z.string().optional(),
});

/**
 * Fetch a relay's information document
 */
export async function getRelayInformationDocument(
  relayUrl: string
): Promise<RelayInformationDocument> {
  if (!isValidRelayUrl(relayUrl)) {
    throw new UrlParseError(relayUrl);
  }

  let body: unknown;
  try {
    body = await nip11.fetchRelayInformation(relayUrl);
  } catch (error) {
    throw new RelayInfoError(`Relay information document for ${relayUrl} is not accessible`, error);
  }

  const parsed = relayInfoSchema.safeParse(body);
  if (!parsed.success) {
    throw new RelayInfoError(
      `Relay information document for ${relayUrl} is invalid`,
      parsed.error
    );
  }
  return parsed.data;
}

/**
 * Whether the relay advertises support for a NIP. Unreachable relays count
 * as not supporting it.
 */
export async function supportsNip(relayUrl: string, nip: number): Promise<boolean> {
  try {
    const info = await getRelayInformationDocument(relayUrl);
    return info.supported_nips?.includes(nip) ?? false;
  } catch (error) {
    if (error instanceof RelayInfoError) {
      console.warn(error.message);
      return false;
    }
    throw error;
  }
}
