import type { Headers } from 'undici';
import {
  BODY_FRAMING_HEADERS,
  OUTBOUND_DROPPED_HEADERS,
  type HeaderEntries,
} from '@lmstudio-compat-proxy/shared';

const RESPONSE_DROPPED = new Set<string>(BODY_FRAMING_HEADERS);
const REQUEST_DROPPED = new Set<string>([...BODY_FRAMING_HEADERS, ...OUTBOUND_DROPPED_HEADERS]);

function without(headers: HeaderEntries, dropped: ReadonlySet<string>): HeaderEntries {
  return headers.filter(([name]) => !dropped.has(name.toLowerCase()));
}

/**
 * The body sent downstream has been decoded (and possibly re-encoded), so
 * length and encoding headers from upstream no longer describe it.
 */
export function sanitizeResponseHeaders(headers: HeaderEntries): HeaderEntries {
  return without(headers, RESPONSE_DROPPED);
}

/**
 * Inbound headers minus body framing, `host` (recomputed for the upstream),
 * `connection` and `accept-encoding` (renegotiated by the outbound client).
 */
export function sanitizeRequestHeaders(headers: HeaderEntries): HeaderEntries {
  return without(headers, REQUEST_DROPPED);
}

/**
 * Node's raw header list is `[name, value, name, value, ...]` in arrival order.
 */
export function fromRawHeaders(raw: string[]): HeaderEntries {
  const entries: HeaderEntries = [];
  for (let i = 0; i + 1 < raw.length; i += 2) {
    entries.push([raw[i], raw[i + 1]]);
  }
  return entries;
}

/**
 * `Headers` joins repeated values except `set-cookie`, which is kept per cookie.
 */
export function fromFetchHeaders(headers: Headers): HeaderEntries {
  const entries: HeaderEntries = [];
  headers.forEach((value, name) => {
    if (name !== 'set-cookie') entries.push([name, value]);
  });
  for (const cookie of headers.getSetCookie()) {
    entries.push(['set-cookie', cookie]);
  }
  return entries;
}

export function getHeader(headers: HeaderEntries, name: string): string | undefined {
  const lower = name.toLowerCase();
  return headers.find(([key]) => key.toLowerCase() === lower)?.[1];
}

/**
 * Groups repeated names (case-insensitively, first casing wins) so that
 * `res.setHeader` keeps every value.
 */
export function toOutgoingHeaders(headers: HeaderEntries): Array<[name: string, value: string | string[]]> {
  const grouped = new Map<string, [name: string, value: string | string[]]>();
  for (const [name, value] of headers) {
    const key = name.toLowerCase();
    const existing = grouped.get(key);
    if (!existing) {
      grouped.set(key, [name, value]);
    } else {
      const [first, current] = existing;
      grouped.set(key, [first, Array.isArray(current) ? [...current, value] : [current, value]]);
    }
  }
  return [...grouped.values()];
}
