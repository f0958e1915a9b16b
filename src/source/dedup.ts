import { sha256 } from '../shared/utils.js';

const TRACKING_PARAM_PREFIXES = ['utm_', 'ref', 'source', 'fbclid', 'gclid', 'mc_', 'mkt_', 'spm'];

/**
 * Canonical form of a link, so that the same article reached through different
 * share links yields one fingerprint: lowercase scheme and host without `www.`,
 * no tracking params, sorted query, no fragment, no trailing slash.
 * Unparseable input is returned trimmed.
 */
export function normalizeUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    return raw.trim();
  }

  const host = url.hostname.toLowerCase().replace(/^www\./, '');

  for (const key of [...url.searchParams.keys()]) {
    const lower = key.toLowerCase();
    if (TRACKING_PARAM_PREFIXES.some((p) => lower.startsWith(p))) {
      url.searchParams.delete(key);
    }
  }
  url.searchParams.sort();

  const pathname = url.pathname.replace(/\/+$/, '');
  const search = url.searchParams.toString();
  const port = url.port ? `:${url.port}` : '';

  if (url.protocol === 'file:') {
    return `file://${pathname}`;
  }
  return `${url.protocol}//${host}${port}${pathname}${search ? `?${search}` : ''}`;
}

/**
 * Stable fingerprint for a feed entry. Entries without a usable link fall back to
 * their title and publish time.
 */
export function itemFingerprint(link: string, title: string, publishedAt?: string | null): string {
  const canonical = link.trim() ? normalizeUrl(link) : '';
  return sha256(canonical || `title:${title.trim()}|${publishedAt ?? ''}`);
}
