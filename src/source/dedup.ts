const TRACKING_PREFIXES = ['utm_', 'fbclid', 'gclid', 'mc_', 'mkt_', '_ga'];

/**
 * Canonical form of a post URL, used as its external id:
 * - lowercase scheme + host, no www.
 * - tracking params (utm_*, fbclid, gclid, ...) removed, remaining params sorted
 * - no fragment, no trailing slashes
 */
export function normalizeUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    return raw.trim();
  }

  url.protocol = url.protocol.toLowerCase();
  url.hostname = url.hostname.toLowerCase();
  if (url.hostname.startsWith('www.')) {
    url.hostname = url.hostname.slice(4);
  }

  const keysToRemove: string[] = [];
  for (const key of url.searchParams.keys()) {
    if (TRACKING_PREFIXES.some((p) => key.toLowerCase().startsWith(p))) {
      keysToRemove.push(key);
    }
  }
  for (const key of keysToRemove) {
    url.searchParams.delete(key);
  }
  url.searchParams.sort();

  let pathname = url.pathname;
  while (pathname.length > 1 && pathname.endsWith('/')) {
    pathname = pathname.slice(0, -1);
  }
  if (pathname === '/') pathname = '';

  const search = url.searchParams.toString();
  return `${url.protocol}//${url.hostname}${url.port ? ':' + url.port : ''}${pathname}${search ? '?' + search : ''}`;
}

/**
 * Resolve an href against the page it appeared on. Fragment-only and non-http links yield null.
 */
export function resolveLink(baseUrl: string, href: string | null | undefined): string | null {
  if (!href) return null;
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith('#')) return null;
  try {
    const resolved = new URL(trimmed, baseUrl);
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') return null;
    resolved.hash = '';
    return resolved.toString();
  } catch {
    return null;
  }
}
