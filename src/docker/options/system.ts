import { encodeFilters, type EventFilterKind, type Filter } from '../filters';
import { encodeQuery } from '../query';

export interface EventsOptions {
  /** UNIX timestamp or RFC 3339 date */
  since?: string;
  until?: string;
  filters?: readonly Filter<EventFilterKind>[];
}

export function serializeEventsOptions(options: EventsOptions = {}): string | undefined {
  return encodeQuery({
    since: options.since,
    until: options.until,
    filters: encodeFilters(options.filters),
  });
}
