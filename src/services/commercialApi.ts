import { z } from 'zod';
import type { CommercialConfig } from '../config';
import { checkApiKeyFormat } from '../helpers/credentials';
import { errorMessage, Logger } from '../helpers/logger';
import { idString, parseJsonBody, type CommercialItem } from '../helpers/normalize';
import { normalizeForCommercialApi, redactShareUrl } from '../helpers/shareUrl';
import { RETRYABLE_STATUSES, type HttpResponse, type HttpTransport } from '../transport/httpTransport';
import type { CredentialCheck } from '../types';
import { AuthError, ExtractionError, NetworkError, URLValidationError } from '../types/errors';
import { ApiKeyPool } from './apiKeyPool';

const log = new Logger('commercial');

/** A 429 on a pooled key moves to the next key instead of backing off. */
const POOLED_RETRY_STATUSES: ReadonlySet<number> = new Set([...RETRYABLE_STATUSES].filter(status => status !== 429));

const KEY_CHECK_SHARE = 'https://www.terabox.app/sharing/link?surl=keycheck';

const rawItemSchema = z.object({
  file_name: z.string().optional(),
  fn: z.string().optional(),
  direct_link: z.string().optional(),
  link: z.string().optional(),
  sizebytes: z.union([z.number(), z.string()]).optional(),
  thumb: z.string().optional(),
  thumbnail: z.string().optional(),
  fs_id: idString.optional(),
});

const responseSchema = z.union([z.array(rawItemSchema), rawItemSchema]);

const errorBodySchema = z.object({ message: z.string() });

/** Shape of items kept in the response cache. */
export const commercialItemsSchema = z.array(z.object({
  remoteId: z.string(),
  name: z.string(),
  sizeBytes: z.number(),
  thumbnailUrl: z.string(),
  directLink: z.string(),
  downloadLink: z.string(),
}));

function decodeName(name: string): string {
  try {
    return decodeURIComponent(name);
  } catch {
    return name;
  }
}

function toItem(raw: z.output<typeof rawItemSchema>, index: number): CommercialItem | null {
  const direct = raw.direct_link ?? '';
  const download = raw.link || direct;
  if (!direct && !download) return null;

  const size = Number(raw.sizebytes ?? 0);
  return {
    remoteId: raw.fs_id ?? String(index),
    name: decodeName(raw.file_name ?? raw.fn ?? 'Unknown'),
    sizeBytes: Number.isFinite(size) && size > 0 ? size : 0,
    thumbnailUrl: raw.thumb ?? raw.thumbnail ?? '',
    directLink: direct || download,
    downloadLink: download,
  };
}

/**
 * Client for the commercial link-resolution API (RapidAPI-style key headers).
 * A caller-supplied key is used alone; otherwise keys come from the pool,
 * which is rotated when the API answers 401, 403 or 429.
 */
export class CommercialApiClient {
  private readonly keys: ApiKeyPool;

  constructor(
    private readonly transport: HttpTransport,
    private readonly config: CommercialConfig,
    keys?: ApiKeyPool,
  ) {
    this.keys = keys ?? new ApiKeyPool(config.apiKeys, { cooldownMs: config.keyCooldownMs });
  }

  async fetchShare(shareUrl: string, apiKey?: string): Promise<CommercialItem[]> {
    const normalized = normalizeForCommercialApi(shareUrl);
    log.info('Requesting file info', { url: redactShareUrl(normalized) });

    if (apiKey) {
      const res = await this.lookup(normalized, apiKey, RETRYABLE_STATUSES);
      if (res.status !== 200) throw statusError(res);
      return toItems(res);
    }
    if (this.keys.size === 0) {
      throw new AuthError('No API key provided for the commercial backend');
    }

    let lastError: Error | null = null;
    for (let attempt = 0; attempt < this.keys.size; attempt++) {
      const lease = this.keys.next();
      if (!lease) break;

      const res = await this.lookup(normalized, lease.key, POOLED_RETRY_STATUSES);
      if (res.status === 429) {
        this.keys.markRateLimited(lease.id, retryAfterMs(res));
        lastError = statusError(res);
        continue;
      }
      if (res.status === 401 || res.status === 403) {
        this.keys.markInvalid(lease.id);
        lastError = statusError(res);
        continue;
      }

      this.keys.markSuccess(lease.id);
      if (res.status !== 200) throw statusError(res);
      return toItems(res);
    }

    if (lastError) throw lastError;
    throw this.keys.allRejected()
      ? new AuthError('All commercial API keys were rejected')
      : new NetworkError('All commercial API keys are rate limited', true);
  }

  /**
   * Format check, then one lookup of a placeholder share. Only 401 and 403
   * mark the key invalid; anything else leaves it usable but unconfirmed.
   */
  async validateKey(apiKey: string): Promise<CredentialCheck> {
    const format = checkApiKeyFormat(apiKey);
    if (format.status === 'invalid') return format;

    let res: HttpResponse;
    try {
      res = await this.lookup(KEY_CHECK_SHARE, apiKey.trim(), RETRYABLE_STATUSES, 0);
    } catch (err) {
      log.warn('API key check did not complete', { error: errorMessage(err) });
      return { status: 'warning', message: `Cannot verify API key: ${errorMessage(err)}` };
    }

    switch (res.status) {
      case 200: return { status: 'valid', message: 'API key authentication successful' };
      case 401: return { status: 'invalid', message: 'Invalid API key: authentication failed' };
      case 403: return { status: 'invalid', message: 'API key access denied: check subscription' };
      case 429: return { status: 'warning', message: 'Rate limit exceeded: API key is valid' };
      default: return { status: 'warning', message: `API responded with HTTP ${res.status}` };
    }
  }

  private lookup(
    shareUrl: string,
    key: string,
    retryStatuses: ReadonlySet<number>,
    retries?: number,
  ): Promise<HttpResponse> {
    return this.transport.get(`${this.config.url}/url`, {
      query: { url: shareUrl },
      headers: {
        'x-rapidapi-key': key,
        'x-rapidapi-host': this.config.host,
        accept: 'application/json',
      },
      allowErrorStatus: true,
      retryStatuses,
      retries,
    });
  }
}

function toItems(res: HttpResponse): CommercialItem[] {
  const body = parseJsonBody(res, responseSchema, 'commercial API');
  const items = (Array.isArray(body) ? body : [body])
    .map(toItem)
    .filter((item): item is CommercialItem => item !== null);

  if (items.length === 0) {
    throw new ExtractionError('No valid file data found in response');
  }
  return items;
}

/** `Retry-After` in ms when given as seconds. */
function retryAfterMs(res: HttpResponse): number | undefined {
  const value = res.headers['retry-after'];
  if (!value || !/^\d+$/.test(value.trim())) return undefined;
  return parseInt(value, 10) * 1000;
}

function statusError(res: HttpResponse): Error {
  switch (res.status) {
    case 401: return new AuthError('Invalid API key. Please check your API key.');
    case 403: return new AuthError('API access denied. Check your subscription.');
    case 429: return new NetworkError('Rate limit exceeded. Please wait before making more requests.', true);
    case 400: return new URLValidationError('Invalid share URL format.');
    case 404: return new ExtractionError('File not found or URL expired.');
  }

  let message = `HTTP ${res.status}`;
  try {
    const parsed = errorBodySchema.safeParse(res.json());
    if (parsed.success) message = parsed.data.message;
  } catch {
    log.debug('Error response is not JSON', { status: res.status });
  }

  return res.status >= 500
    ? new NetworkError(`API error: ${message}`, true)
    : new ExtractionError(`API error: ${message}`);
}
