import { md5Hex } from './signature';

const SURL_PATTERN = /[?&]surl=([A-Za-z0-9_-]+)/;
const PATH_PATTERN = /\/s\/([A-Za-z0-9_-]+)/;

/** Mirrors whose `/s/` links the commercial API accepts as-is. */
const PASSTHROUGH_MIRRORS = ['terasharelink.com', '1024terabox.com', 'freeterabox.com', 'nephobox.com'];

/**
 * True when the URL contains one of the supported domain tokens (case-insensitive).
 */
export function isSupportedShareUrl(url: unknown, domains: readonly string[]): boolean {
  if (typeof url !== 'string' || url.trim() === '') return false;
  const lower = url.trim().toLowerCase();
  return domains.some(domain => lower.includes(domain.toLowerCase()));
}

/**
 * Read the `surl` query parameter from a URL, typically the final URL of the
 * share redirect.
 */
export function parseSurl(url: string): string | null {
  const match = url.match(/surl=([^ &#]+)/);
  return match ? match[1] : null;
}

/**
 * Canonical short code of a share URL, independent of the mirror domain.
 * `/s/1abc` and `?surl=abc` name the same share, so the path form drops its
 * leading `1`.
 */
export function extractShortCode(url: string): string | null {
  const query = url.match(SURL_PATTERN);
  if (query) return query[1];

  const pathMatch = url.match(PATH_PATTERN);
  if (!pathMatch) return null;

  const code = pathMatch[1];
  return code.length > 1 && code.startsWith('1') ? code.slice(1) : code;
}

/**
 * Cache key for a share URL: the short code, or a hash of the whole URL when
 * there is none.
 */
export function cacheKeyFor(url: string): string {
  const code = extractShortCode(url);
  if (code) return code;
  return `hash_${md5Hex(url).slice(0, 12)}`;
}

/**
 * Rewrite a share URL into a form the commercial API accepts.
 */
export function normalizeForCommercialApi(url: string): string {
  if (!url.includes('/s/')) return url;

  const match = url.match(/\/s\/([^/?&#]+)/);
  if (!match) return url;

  const mirror = PASSTHROUGH_MIRRORS.find(domain => url.includes(domain));
  if (mirror) return `https://${mirror}/s/${match[1]}`;

  const code = extractShortCode(url) ?? match[1];
  return `https://www.terabox.app/sharing/link?surl=${code}`;
}

/**
 * Host part of a URL for messages, or the raw string when it does not parse.
 */
export function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return url;
  }
}

/**
 * True for an absolute http(s) URL.
 */
export function isAbsoluteHttpUrl(url: string): boolean {
  try {
    const { protocol } = new URL(url);
    return protocol === 'https:' || protocol === 'http:';
  } catch {
    return false;
  }
}

/**
 * Share URL with query and fragment stripped, for logging.
 */
export function redactShareUrl(url: string): string {
  return url.replace(/[?#].*$/, '');
}
