// Resolves listing URLs and stable identifiers from card attributes

/**
 * Absolute https URL without query string or fragment, '' when unparsable
 */
export function normalizeUrl(u?: string | null, baseUrl?: string): string {
  if (!u) return '';
  try {
    const url = new URL(u, baseUrl);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') return '';
    url.protocol = 'https:';
    url.search = '';
    url.hash = '';
    return url.toString();
  } catch {
    return '';
  }
}

/**
 * Absolute URL for an ad link, query kept (OLX puts nothing volatile there that
 * would break the link itself).
 */
export function resolveListingUrl(href: string, baseUrl: string): string {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return '';
  }
}

/**
 * The card DOM id when present; otherwise the ad path, so the same ad found
 * through different tracking parameters keeps one identity.
 */
export function buildListingId(domId: string | undefined, href: string, baseUrl: string): string {
  const trimmed = (domId || '').trim();
  if (trimmed) return trimmed;

  const normalized = normalizeUrl(href, baseUrl);
  if (!normalized) return href.trim();
  return new URL(normalized).pathname;
}
