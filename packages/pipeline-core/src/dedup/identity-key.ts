/**
 * FILE PURPOSE: Canonical identity keys for deduplication
 *
 * WHY: The same page arrives as `https://Example.com/a/`, `https://example.com/a#top`
 *      and `https://example.com/a?utm_source=x`. Dedup compares canonical keys,
 *      so all three collapse to one record.
 */

const TRACKING_PARAM = /^(utm_[a-z]+|fbclid|gclid)$/i;

/**
 * URLs: scheme and host lowercased (by URL), default port and fragment
 * dropped, tracking parameters removed, remaining query parameters sorted,
 * trailing slash removed except for the root path.
 * Anything else: trimmed, lowercased, whitespace collapsed.
 */
export function canonicalizeIdentityKey(raw: string): string {
  const trimmed = raw.trim();
  const url = tryParseUrl(trimmed);
  if (!url) {
    return trimmed.toLowerCase().replace(/\s+/g, ' ');
  }

  url.hash = '';
  const params = [...url.searchParams.entries()]
    .filter(([key]) => !TRACKING_PARAM.test(key))
    .sort(([a, av], [b, bv]) => (a === b ? av.localeCompare(bv) : a.localeCompare(b)));
  url.search = new URLSearchParams(params).toString();

  if (url.pathname.length > 1 && url.pathname.endsWith('/')) {
    url.pathname = url.pathname.replace(/\/+$/, '');
  }
  return url.toString();
}

function tryParseUrl(value: string): URL | null {
  if (!/^[a-z][a-z0-9+.-]*:\/\//i.test(value)) return null;
  try {
    return new URL(value);
  } catch {
    return null;
  }
}
