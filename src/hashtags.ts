/** Characters a hashtag may contain unless the caller passes its own set */
export const DEFAULT_HASHTAG_ALPHABET =
  "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";

/**
 * Find `#word` hashtags in content and return them as `["t", word]` tags.
 * A hashtag runs until the first character outside the alphabet. Tags are
 * lowercased and each appears once, in order of first use.
 */
export function parseHashtags(
  content: string,
  alphabet: string = DEFAULT_HASHTAG_ALPHABET
): string[][] {
  const allowed = new Set(alphabet);
  const seen = new Set<string>();
  const tags: string[][] = [];

  for (const word of content.split(/\s+/)) {
    if (!word.startsWith("#")) continue;

    let tag = "";
    for (const char of word.slice(1)) {
      if (!allowed.has(char)) break;
      tag += char;
    }

    const normalized = tag.toLowerCase();
    if (normalized && !seen.has(normalized)) {
      seen.add(normalized);
      tags.push(["t", normalized]);
    }
  }

  return tags;
}

/**
 * Append hashtag tags for the content that are not already present
 */
export function withHashtags(
  content: string,
  tags: string[][],
  alphabet?: string
): string[][] {
  const present = new Set(tags.filter((tag) => tag[0] === "t").map((tag) => tag[1]));
  const added = parseHashtags(content, alphabet).filter((tag) => !present.has(tag[1]));
  return [...tags, ...added];
}
