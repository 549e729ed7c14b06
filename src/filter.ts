import type { Event, ReqFilter } from "./types.js";

const FILTER_KEYS = ["ids", "authors", "kinds", "#e", "#p", "since", "until", "limit"] as const;

/**
 * Filter as sent on the wire: absent keys are left out entirely, never null
 */
export function serializeFilter(filter: ReqFilter): Record<string, unknown> {
  const json: Record<string, unknown> = {};
  for (const key of FILTER_KEYS) {
    const value = filter[key];
    if (value !== undefined && value !== null) {
      json[key] = value;
    }
  }
  return json;
}

function matchPrefix(field: string, prefixes?: string[]): boolean {
  if (!prefixes) return true;
  return prefixes.some((prefix) => field.startsWith(prefix.toLowerCase()));
}

function matchTag(
  tags: Event["tags"],
  letter: string,
  values?: string[]
): boolean {
  if (!values) return true;
  return tags.some((tag) => tag[0] === letter && tag[1] !== undefined && values.includes(tag[1]));
}

/**
 * Whether the event satisfies every present field of the filter
 */
export function matchFilter(event: Event, filter: ReqFilter): boolean {
  if (filter.kinds && !filter.kinds.includes(event.kind)) return false;
  if (!matchPrefix(event.id, filter.ids)) return false;
  if (!matchPrefix(event.pubkey, filter.authors)) return false;
  if (filter.since !== undefined && event.created_at < filter.since) return false;
  if (filter.until !== undefined && event.created_at > filter.until) return false;
  if (!matchTag(event.tags, "e", filter["#e"])) return false;
  if (!matchTag(event.tags, "p", filter["#p"])) return false;
  return true;
}

/**
 * Whether any of the filters admits the event
 */
export function matchFilters(event: Event, filters: ReqFilter[]): boolean {
  return filters.some((filter) => matchFilter(event, filter));
}

export function formatEventMessage(event: Event): string {
  return JSON.stringify(["EVENT", event]);
}

export function formatReqMessage(subscriptionId: string, filters: ReqFilter[]): string {
  return JSON.stringify(["REQ", subscriptionId, ...filters.map(serializeFilter)]);
}

export function formatCloseMessage(subscriptionId: string): string {
  return JSON.stringify(["CLOSE", subscriptionId]);
}
