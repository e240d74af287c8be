/**
 * Percent-encode everything outside the unreserved set (`A-Z a-z 0-9 - _ . ~`).
 * `encodeURIComponent` leaves `!'()*` alone, so those are escaped here too.
 */
export function percentEncodeAll(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    ch => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

function toUrlSafeBase64(value: string): string {
  return Buffer.from(value, 'utf-8').toString('base64').replace(/\+/g, '-').replace(/\//g, '_');
}

/**
 * Hide a download URL behind one of the relay's indirection hosts:
 * `https://<host>.workers.dev/?url=<urlsafe-base64(percent-encoded url)>`.
 */
export function wrapUrl(url: string, hosts: readonly string[], random: () => number = Math.random): string {
  if (hosts.length === 0) {
    throw new Error('No indirection hosts configured');
  }
  const host = hosts[Math.min(Math.floor(random() * hosts.length), hosts.length - 1)];
  return `https://${host}.workers.dev/?url=${toUrlSafeBase64(percentEncodeAll(url))}`;
}

/**
 * The percent-encoded payload carried by a wrapped URL, or null if the URL
 * carries none or does not parse.
 */
export function decodeWrappedPayload(wrapped: string): string | null {
  let param: string | null;
  try {
    param = new URL(wrapped).searchParams.get('url');
  } catch {
    return null;
  }
  if (!param) return null;
  return Buffer.from(param, 'base64url').toString('utf-8');
}

/** Inverse of {@link wrapUrl}. */
export function unwrapUrl(wrapped: string): string | null {
  const payload = decodeWrappedPayload(wrapped);
  return payload === null ? null : decodeURIComponent(payload);
}
