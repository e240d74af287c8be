import { z } from 'zod';
import { errorMessage, Logger } from '../helpers/logger';
import {
  flattenTree,
  idString,
  parseJsonBody,
  shareInfoSchema,
  shareListSchema,
  type ListingItem,
  type ShareInfoResponse,
} from '../helpers/normalize';
import { backoffDelay, retry, type RandomSource, type Sleep } from '../helpers/retry';
import { parseSurl, redactShareUrl } from '../helpers/shareUrl';
import type { HttpTransport } from '../transport/httpTransport';
import type {
  CookieAuth,
  ExtractionCredentials,
  FileNode,
  RelayAuth,
  ScrapeAuth,
  ScrapingStrategy,
  ShareIdentity,
  ShareReference,
  TraversalWarning,
} from '../types';
import { ExtractionError, NetworkError } from '../types/errors';
import { walkTree } from './treeWalker';

const log = new Logger('resolver');

export const APP_ID = '250528';
const AUTH_PAGE_URL = 'https://www.terabox.app/wap/share/filelist';
const SHARE_INFO_URL = 'https://www.terabox.com/api/shorturlinfo';
const SHARE_LIST_URL = 'https://www.terabox.com/share/list';

const JSON_ACCEPT = 'application/json, text/plain, */*';
const JS_TOKEN_PATTERN = /%28%22(.*?)%22%29/;

/** Jitter window of the relay's backoff, in ms. */
const RELAY_JITTER_MS = [500, 1500] as const;

const relayInfoSchema = z.object({
  ok: z.boolean().optional(),
  sign: z.string().optional(),
  timestamp: idString.optional(),
  message: z.string().optional(),
});

export interface ResolvedShare {
  share: ShareIdentity;
  fileTree: FileNode[];
  warnings: TraversalWarning[];
  auth: ScrapeAuth | CookieAuth | RelayAuth;
}

export interface ShareResolverOptions {
  transport: HttpTransport;
  /** Browser-profile transport used for the relay. */
  relayTransport: HttpTransport;
  relayUrl: string;
  maxRetries: number;
  retryBaseDelayMs: number;
  sleep?: Sleep;
  random?: RandomSource;
}

interface Listing {
  info: ShareInfoResponse & { shareid: string; uk: string };
  tree: FileNode[];
  warnings: TraversalWarning[];
}

/**
 * Turns a share URL into a file tree plus the session material link
 * generation needs, using one of the three scraping strategies.
 */
export class ShareResolver {
  constructor(private readonly options: ShareResolverOptions) {}

  async resolve(
    shareUrl: string,
    strategy: ScrapingStrategy,
    credentials: ExtractionCredentials = {},
  ): Promise<ResolvedShare> {
    log.info('Resolving share', { url: redactShareUrl(shareUrl), strategy });

    switch (strategy) {
      case 'scrape': return this.resolveScrape(shareUrl);
      case 'cookie': return this.resolveWithCookie(shareUrl, credentials.cookie);
      case 'relay': return this.resolveWithRelay(shareUrl);
    }
  }

  /** Follow the share URL's redirects and read the short code from where they land. */
  async resolveReference(shareUrl: string): Promise<ShareReference> {
    const res = await this.options.transport.get(shareUrl, { followRedirects: true });
    const shortCode = parseSurl(res.url);
    if (!shortCode) {
      throw new ExtractionError('Could not extract short URL from redirect');
    }
    return Object.freeze({ url: shareUrl, shortCode });
  }

  private async resolveScrape(shareUrl: string): Promise<ResolvedShare> {
    const { transport } = this.options;
    const { shortCode } = await this.resolveReference(shareUrl);

    const authUrl = `${AUTH_PAGE_URL}?surl=${shortCode}`;
    const page = await transport.get(authUrl, {
      headers: { referer: shareUrl, 'sec-fetch-site': 'same-origin' },
    });
    const token = page.body.replace(/\\/g, '').match(JS_TOKEN_PATTERN);
    if (!token) {
      throw new ExtractionError('Could not extract JS token from response');
    }

    const browserId = transport.getCookie('browserid') ?? '';
    const cookie = `lang=id;${transport.cookieHeader()}`;

    const { info, tree, warnings } = await this.list(shortCode, authUrl);

    return {
      share: identity(shortCode, info),
      fileTree: tree,
      warnings,
      auth: {
        kind: 'scrape',
        uk: info.uk,
        shareId: info.shareid,
        sign: info.sign ?? '',
        timestamp: info.timestamp ?? '',
        jsToken: token[1],
        browserId,
        cookie,
      },
    };
  }

  private async resolveWithCookie(shareUrl: string, cookie: string | undefined): Promise<ResolvedShare> {
    if (!cookie || cookie.trim() === '') {
      throw new ExtractionError('Cookie mode requires a session cookie');
    }
    const { shortCode } = await this.resolveReference(shareUrl);
    const { info, tree, warnings } = await this.list(shortCode, shareUrl, cookie.trim());

    const directLinks: Record<string, string> = {};
    for (const node of flattenTree(tree)) {
      if (node.directLink) directLinks[node.remoteId] = node.directLink;
    }

    return {
      share: identity(shortCode, info),
      fileTree: tree,
      warnings,
      auth: { kind: 'cookie', uk: info.uk, shareId: info.shareid, directLinks },
    };
  }

  private async resolveWithRelay(shareUrl: string): Promise<ResolvedShare> {
    const { shortCode } = await this.resolveReference(shareUrl);
    const { info, tree, warnings } = await this.list(shortCode, shareUrl);
    const { sign, timestamp } = await this.fetchRelaySignature(shortCode);

    return {
      share: { shortCode, uk: info.uk, shareId: info.shareid, sign, timestamp },
      fileTree: tree,
      warnings,
      auth: { kind: 'relay', uk: info.uk, shareId: info.shareid, sign, timestamp },
    };
  }

  /** Root listing plus share identity, expanded into a tree. */
  private async list(shortCode: string, referer: string, cookie?: string): Promise<Listing> {
    const res = await this.options.transport.get(SHARE_INFO_URL, {
      query: { app_id: APP_ID, shorturl: `1${shortCode}`, root: 1 },
      headers: { accept: JSON_ACCEPT, referer },
      cookies: cookie,
    });
    const info = parseJsonBody(res, shareInfoSchema, 'share listing');

    if (info.errno !== 0) {
      throw new ExtractionError(`Share listing failed (errno ${info.errno}${info.errmsg ? `: ${info.errmsg}` : ''})`);
    }
    if (info.list.length === 0) {
      throw new ExtractionError('No files found in the response');
    }
    const { shareid, uk } = info;
    if (shareid === undefined || uk === undefined) {
      throw new ExtractionError('Share listing is missing the share id');
    }

    const { tree, warnings } = await walkTree(info.list, dir => this.listDirectory(shortCode, dir, cookie));
    log.info('Listed share', { shortCode, entries: info.list.length, warnings: warnings.length });

    return { info: { ...info, shareid, uk }, tree, warnings };
  }

  private async listDirectory(shortCode: string, dir: string, cookie?: string): Promise<ListingItem[]> {
    const res = await this.options.transport.get(SHARE_LIST_URL, {
      query: { app_id: APP_ID, shorturl: shortCode, root: 0, dir },
      headers: { accept: JSON_ACCEPT },
      cookies: cookie,
    });
    const listing = parseJsonBody(res, shareListSchema, 'directory listing');
    if (listing.errno !== 0) {
      throw new ExtractionError(`Directory listing failed (errno ${listing.errno})`);
    }
    return listing.list;
  }

  /**
   * Ask the relay for the share's sign and timestamp. Refusals, failed
   * requests and undecodable bodies are retried with backoff.
   */
  private async fetchRelaySignature(shortCode: string): Promise<{ sign: string; timestamp: string }> {
    const { relayTransport, relayUrl, maxRetries, retryBaseDelayMs, sleep, random } = this.options;

    try {
      return await retry(
        async attempt => {
          log.debug('Requesting relay signature', { shortCode, attempt: attempt + 1 });
          const res = await relayTransport.get(`${relayUrl}/api/get-info`, {
            query: { shorturl: shortCode, pwd: '' },
            headers: {
              accept: JSON_ACCEPT,
              'accept-language': 'en-US,en;q=0.9,id;q=0.8',
              referer: `${relayUrl}/`,
              'sec-fetch-mode': 'cors',
              'sec-fetch-site': 'same-origin',
            },
            retries: 0,
          });

          const reply = parseJsonBody(res, relayInfoSchema, 'external service');
          if (!reply.ok || reply.sign === undefined || reply.timestamp === undefined) {
            throw new ExtractionError(`External service failed: ${reply.message ?? 'External service returned error'}`);
          }
          return { sign: reply.sign, timestamp: reply.timestamp };
        },
        {
          retries: maxRetries,
          delay: n => backoffDelay(n, { baseDelayMs: retryBaseDelayMs, jitterMs: RELAY_JITTER_MS, random }),
          retryIf: err => err instanceof ExtractionError || err instanceof NetworkError,
          onRetry: (err, n) => log.warn('Relay attempt failed', { shortCode, retry: n, error: errorMessage(err) }),
          sleep,
        },
      );
    } catch (err) {
      if (err instanceof NetworkError) {
        throw new ExtractionError(`External service connection failed: ${err.message}`);
      }
      throw err;
    }
  }
}

function identity(shortCode: string, info: Listing['info']): ShareIdentity {
  return {
    shortCode,
    uk: info.uk,
    shareId: info.shareid,
    sign: info.sign ?? '',
    timestamp: info.timestamp ?? '',
  };
}
