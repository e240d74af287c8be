import { z } from 'zod';
import { errorMessage, Logger } from '../helpers/logger';
import { wrapUrl } from '../helpers/linkWrapper';
import { parseJsonBody } from '../helpers/normalize';
import type { RandomSource } from '../helpers/retry';
import type { HttpTransport } from '../transport/httpTransport';
import { MOBILE_USER_AGENT } from '../transport/userAgents';
import type {
  AuthContext,
  CommercialAuth,
  CookieAuth,
  LinkRank,
  OfficialAuth,
  RelayAuth,
  ScrapeAuth,
} from '../types';
import { DownloadError } from '../types/errors';
import { OfficialApiClient } from './officialApi';
import { APP_ID } from './shareResolver';

const log = new Logger('links');

const SHARE_DOWNLOAD_URL = 'https://www.terabox.com/share/download';

const downloadReplySchema = z.object({
  errno: z.number().default(0),
  dlink: z.string().optional(),
});

const relayDownloadSchema = z.object({ downloadLink: z.string().min(1) });

export type RankedLinks = Partial<Record<LinkRank, string>>;

export interface LinkGeneratorOptions {
  transport: HttpTransport;
  relayTransport: HttpTransport;
  relayUrl: string;
  wrapperHosts: readonly string[];
  random?: RandomSource;
}

/**
 * Derive the mirror variants of a resolved download URL: the same URL with
 * the throttling marker swapped, and that URL on the `d3` edge host. Both are
 * unofficial and may stop working at any time.
 */
export function mirrorLinks(finalUrl: string): { medium: string; fast: string } | null {
  const host = finalUrl.match(/:\/\/(.*?)\./);
  if (!host) return null;

  const medium = finalUrl.replaceAll('by=themis', 'by=dapunta');
  const fast = medium.replace(`://${host[1]}.`, '://d3.');
  return { medium, fast };
}

/**
 * Produces download links for one file from the session material an
 * extraction returned. Best effort: no retries.
 */
export class LinkGenerator {
  constructor(private readonly options: LinkGeneratorOptions) {}

  async generate(remoteId: string, auth: AuthContext): Promise<RankedLinks> {
    switch (auth.kind) {
      case 'scrape': return this.fromScrape(remoteId, auth);
      case 'cookie': return fromCookie(remoteId, auth);
      case 'relay': return this.fromRelay(remoteId, auth);
      case 'official': return this.fromOfficial(remoteId, auth);
      case 'commercial': return fromCommercial(remoteId, auth);
    }
  }

  private async fromScrape(remoteId: string, auth: ScrapeAuth): Promise<RankedLinks> {
    const { transport } = this.options;
    const res = await transport.get(SHARE_DOWNLOAD_URL, {
      query: {
        uk: auth.uk,
        sign: auth.sign,
        shareid: auth.shareId,
        primaryid: auth.shareId,
        timestamp: auth.timestamp,
        jsToken: auth.jsToken,
        fid_list: `[${remoteId}]`,
        app_id: APP_ID,
        channel: 'dubox',
        product: 'share',
        clienttype: 0,
        'dp-logid': '',
        nozip: 0,
        web: 1,
      },
      cookies: auth.cookie,
      retries: 0,
    });

    const reply = parseJsonBody(res, downloadReplySchema, 'share download');
    if (reply.errno !== 0 || !reply.dlink) {
      throw new DownloadError(`Download link request failed (errno ${reply.errno})`);
    }

    const links: RankedLinks = { slow: reply.dlink };
    try {
      const head = await transport.head(reply.dlink, { followRedirects: true, retries: 0, cookies: auth.cookie });
      const mirrors = mirrorLinks(head.url);
      if (mirrors) Object.assign(links, mirrors);
    } catch (err) {
      log.debug('Mirror derivation failed', { remoteId, error: errorMessage(err) });
    }
    return links;
  }

  private async fromRelay(remoteId: string, auth: RelayAuth): Promise<RankedLinks> {
    const { relayUrl, wrapperHosts, random } = this.options;
    const payload = {
      shareid: auth.shareId,
      uk: auth.uk,
      sign: auth.sign,
      timestamp: auth.timestamp,
      fs_id: remoteId,
    };

    const links: RankedLinks = {};

    try {
      links.slow = await this.relayDownload(`${relayUrl}/api/get-download`, payload);
    } catch (err) {
      log.warn('Relay download link failed', { remoteId, error: errorMessage(err) });
    }

    try {
      const second = await this.relayDownload(`${relayUrl}/api/get-downloadp`, payload);
      links.medium = wrapUrl(second, wrapperHosts, random);
    } catch (err) {
      log.warn('Relay proxied link failed', { remoteId, error: errorMessage(err) });
    }

    if (!links.slow && !links.medium) {
      throw new DownloadError('External service returned no download links');
    }
    return links;
  }

  private async relayDownload(url: string, payload: Record<string, string>): Promise<string> {
    const { relayUrl, relayTransport } = this.options;
    const res = await relayTransport.post(url, {
      json: payload,
      headers: {
        'accept-language': 'en-US,en;q=0.9,id;q=0.8',
        referer: `${relayUrl}/`,
        'sec-fetch-mode': 'cors',
        'sec-fetch-site': 'same-origin',
        'user-agent': MOBILE_USER_AGENT,
      },
      retries: 0,
    });
    return parseJsonBody(res, relayDownloadSchema, 'external service').downloadLink;
  }

  private async fromOfficial(remoteId: string, auth: OfficialAuth): Promise<RankedLinks> {
    const client = new OfficialApiClient(this.options.transport, {
      credentials: { accessToken: auth.accessToken },
      apiDomain: auth.apiDomain,
    });
    const links = await client.shareDownloadLinks(auth.shareId, [remoteId], auth.uk, auth.sekey);
    const dlink = links[remoteId];
    if (!dlink) {
      throw new DownloadError('No download link returned for this file');
    }
    return { slow: dlink };
  }
}

function fromCookie(remoteId: string, auth: CookieAuth): RankedLinks {
  const link = auth.directLinks[remoteId];
  if (!link) {
    throw new DownloadError('No direct link recorded for this file');
  }
  return { slow: link };
}

function fromCommercial(remoteId: string, auth: CommercialAuth): RankedLinks {
  const entry = auth.links[remoteId];
  if (!entry) {
    throw new DownloadError('No download link recorded for this file');
  }
  const links: RankedLinks = { slow: entry.direct };
  if (entry.download && entry.download !== entry.direct) links.medium = entry.download;
  return links;
}
