import { URL } from "node:url";

export const DEFAULT_TRACKING_PARAMS: readonly string[] = [
  "utm_source",
  "utm_medium",
  "utm_campaign",
  "utm_content",
  "utm_term",
  "gclid",
  "fbclid",
  "ref",
  "v",
  "version",
  "download",
  "format",
];

type QueryPair = [key: string, value: string];

const FALLBACK_PATTERN = /^([a-z][a-z0-9+.-]*:\/\/)([^/?#]*)([^?#]*)(\?[^#]*)?/i;

export function parseUrlSafe(input: string): URL | null {
  try {
    return new URL(input);
  } catch {
    return null;
  }
}

/**
 * Lower-cases a host and strips leading `www.` labels, so the result is a
 * fixed point. Other subdomains are left alone.
 */
export function normalizeHost(host: string): string {
  return host.trim().toLowerCase().replace(/^(?:www\.)+/, "");
}

function toTrackingSet(trackingParams: Iterable<string>): Set<string> {
  return new Set(Array.from(trackingParams, (param) => param.toLowerCase()));
}

function comparePairs(a: QueryPair, b: QueryPair): number {
  if (a[0] !== b[0]) {
    return a[0] < b[0] ? -1 : 1;
  }
  if (a[1] !== b[1]) {
    return a[1] < b[1] ? -1 : 1;
  }
  return 0;
}

function filterAndSort(pairs: QueryPair[], tracking: Set<string>): QueryPair[] {
  return pairs.filter(([key]) => !tracking.has(key.toLowerCase())).sort(comparePairs);
}

function canonicalizeParsed(url: URL, tracking: Set<string>): string {
  const pairs = filterAndSort(Array.from(url.searchParams.entries()), tracking);
  const params = new URLSearchParams(pairs);
  const query = params.toString();

  url.hostname = normalizeHost(url.hostname);
  url.search = query ? `?${query}` : "";
  url.hash = "";
  return url.toString();
}

// Only reached for input WHATWG URL refuses; keeps the raw encoding as-is.
function canonicalizeFallback(raw: string, tracking: Set<string>): string {
  const withoutFragment = raw.split("#", 1)[0];
  const match = FALLBACK_PATTERN.exec(withoutFragment);
  if (!match) {
    return withoutFragment;
  }

  const [, scheme, authority, path, search] = match;
  const pairs: QueryPair[] = (search ?? "")
    .slice(1)
    .split("&")
    .filter((part) => part.length > 0)
    .map((part): QueryPair => {
      const eq = part.indexOf("=");
      return eq < 0 ? [part, ""] : [part.slice(0, eq), part.slice(eq + 1)];
    });
  const query = filterAndSort(pairs, tracking)
    .map(([key, value]) => (value ? `${key}=${value}` : key))
    .join("&");

  return `${scheme.toLowerCase()}${normalizeHost(authority)}${path}${query ? `?${query}` : ""}`;
}

/**
 * Canonical identity of a URL, used as the dedup and storage key.
 *
 * Never throws: input that does not parse still gets a best-effort
 * normalized form, and the fetcher rejects it later.
 */
export function canonicalize(raw: string, trackingParams: Iterable<string> = DEFAULT_TRACKING_PARAMS): string {
  const trimmed = raw.trim();
  const tracking = toTrackingSet(trackingParams);
  const parsed = parseUrlSafe(trimmed);
  if (!parsed) {
    return canonicalizeFallback(trimmed, tracking);
  }
  return canonicalizeParsed(parsed, tracking);
}

/** Politeness key: the normalized host (with any explicit port). */
export function hostKey(url: string): string {
  const parsed = parseUrlSafe(url.trim());
  if (!parsed) {
    const match = FALLBACK_PATTERN.exec(url.trim());
    return match ? normalizeHost(match[2]) : "";
  }
  return normalizeHost(parsed.host);
}

export function sameHost(a: string, b: string): boolean {
  const ua = parseUrlSafe(a.trim());
  const ub = parseUrlSafe(b.trim());
  if (!ua || !ub) {
    return false;
  }
  return normalizeHost(ua.hostname) === normalizeHost(ub.hostname);
}
