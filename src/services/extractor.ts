import type { AppConfig } from '../config';
import { Logger } from '../helpers/logger';
import { normalizeListing, type CommercialItem } from '../helpers/normalize';
import { sleep as realSleep, type RandomSource, type Sleep } from '../helpers/retry';
import { cacheKeyFor, extractShortCode, isAbsoluteHttpUrl, isSupportedShareUrl, redactShareUrl } from '../helpers/shareUrl';
import type { TransportProfile } from '../transport/browserProfile';
import { HttpTransport } from '../transport/httpTransport';
import {
  BACKENDS,
  type AuthContext,
  type Backend,
  type CredentialCheck,
  type DownloadLinkSet,
  type ExtractionCredentials,
  type ExtractionResult,
  type ExtractionSuccess,
  type ExtractOptions,
  type ScrapingStrategy,
} from '../types';
import { AuthError, describeError, ExtractionError, URLValidationError } from '../types/errors';
import { ApiKeyPool, type ApiKeyStatus } from './apiKeyPool';
import { CommercialApiClient, commercialItemsSchema } from './commercialApi';
import { CookieValidator } from './cookieValidator';
import { LinkGenerator } from './linkGenerator';
import { OfficialApiClient } from './officialApi';
import type { ResponseCache } from './responseCache';
import { ShareResolver } from './shareResolver';

const log = new Logger('extractor');

export type TransportFactory = (profile: TransportProfile) => HttpTransport;

export interface ShareExtractorOptions {
  cache?: ResponseCache | null;
  transportFactory?: TransportFactory;
  sleep?: Sleep;
  random?: RandomSource;
}

export function isBackend(value: unknown): value is Backend {
  return typeof value === 'string' && BACKENDS.some(backend => backend === value);
}

/**
 * Single entry point for extraction: validates the URL, runs the chosen
 * backend and turns every failure into a result. Its methods do not throw.
 */
export class ShareExtractor {
  private readonly cache: ResponseCache | null;
  private readonly createTransport: TransportFactory;
  /** Lives as long as the extractor so key health carries across requests. */
  private readonly keyPool: ApiKeyPool;

  constructor(
    private readonly config: AppConfig,
    private readonly options: ShareExtractorOptions = {},
  ) {
    this.cache = options.cache ?? null;
    this.keyPool = new ApiKeyPool(config.commercial.apiKeys, { cooldownMs: config.commercial.keyCooldownMs });
    this.createTransport = options.transportFactory
      ?? (profile => new HttpTransport(config.transport, { profile, sleep: options.sleep, random: options.random }));
  }

  async extract(url: string, backend: Backend, options: ExtractOptions = {}): Promise<ExtractionResult> {
    const started = Date.now();
    try {
      if (!isSupportedShareUrl(url, this.config.supportedDomains)) {
        throw new URLValidationError('Unsupported share URL');
      }
      if (!isAbsoluteHttpUrl(url.trim())) {
        throw new URLValidationError('Malformed share URL');
      }
      if (!isBackend(backend)) {
        throw new URLValidationError(`Unknown backend: ${String(backend)}`);
      }

      const result = await this.run(url.trim(), backend, options);
      log.info('Extraction succeeded', {
        url: redactShareUrl(url),
        backend,
        cached: result.cached,
        warnings: result.warnings.length,
        durationMs: Date.now() - started,
      });
      return result;
    } catch (err) {
      const description = describeError(err);
      log.warn('Extraction failed', {
        url: redactShareUrl(String(url)),
        backend,
        errorKind: description.errorKind,
        error: description.message,
      });
      return { status: 'failed', backend, ...description };
    }
  }

  /**
   * Extract several shares one after another with `batch.delayMs` between
   * them. Results keep the order of `urls`; one failure does not stop the rest.
   */
  async extractMany(urls: readonly string[], backend: Backend, options: ExtractOptions = {}): Promise<ExtractionResult[]> {
    const wait = this.options.sleep ?? realSleep;
    const results: ExtractionResult[] = [];

    for (const [index, url] of urls.entries()) {
      if (index > 0 && this.config.batch.delayMs > 0) {
        await wait(this.config.batch.delayMs);
      }
      log.debug('Batch item', { index: index + 1, total: urls.length });
      results.push(await this.extract(url, backend, options));
    }

    log.info('Batch finished', {
      backend,
      total: urls.length,
      failed: results.filter(result => result.status === 'failed').length,
    });
    return results;
  }

  async validateApiKey(apiKey: string): Promise<CredentialCheck> {
    const transport = this.createTransport('standard');
    try {
      const client = new CommercialApiClient(transport, this.config.commercial, this.keyPool);
      const check = await client.validateKey(apiKey);
      log.info('Checked API key', { status: check.status });
      return check;
    } finally {
      await transport.close();
    }
  }

  async validateCookie(cookie: string): Promise<CredentialCheck> {
    const transport = this.createTransport('standard');
    try {
      const check = await new CookieValidator(transport).validate(cookie);
      log.info('Checked cookie', { status: check.status });
      return check;
    } finally {
      await transport.close();
    }
  }

  /** Health of the configured commercial API keys, without the keys. */
  commercialKeyStatus(): ApiKeyStatus[] {
    return this.keyPool.status();
  }

  async generateLinks(remoteId: string, auth: AuthContext): Promise<DownloadLinkSet> {
    const transport = this.createTransport('standard');
    const relayTransport = this.createTransport('browser');
    try {
      const generator = new LinkGenerator({
        transport,
        relayTransport,
        relayUrl: this.config.relay.url,
        wrapperHosts: this.config.relay.wrapperHosts,
        random: this.options.random,
      });
      const links = await generator.generate(remoteId, auth);
      log.info('Generated download links', { backend: auth.kind, ranks: Object.keys(links) });
      return { status: 'success', links };
    } catch (err) {
      const description = describeError(err);
      log.warn('Link generation failed', { backend: auth.kind, error: description.message });
      return { status: 'failed', ...description };
    } finally {
      await Promise.all([transport.close(), relayTransport.close()]);
    }
  }

  private async run(url: string, backend: Backend, options: ExtractOptions): Promise<ExtractionSuccess> {
    const credentials = options.credentials ?? {};
    switch (backend) {
      case 'scrape':
      case 'cookie':
      case 'relay':
        return this.scrape(url, backend, credentials);
      case 'official':
        return this.official(url, credentials);
      case 'commercial':
        return this.commercial(url, credentials, options.forceRefresh ?? false);
    }
  }

  private async scrape(
    url: string,
    strategy: ScrapingStrategy,
    credentials: ExtractionCredentials,
  ): Promise<ExtractionSuccess> {
    const transport = this.createTransport('standard');
    const relayTransport = this.createTransport('browser');
    try {
      const resolver = new ShareResolver({
        transport,
        relayTransport,
        relayUrl: this.config.relay.url,
        maxRetries: this.config.transport.maxRetries,
        retryBaseDelayMs: this.config.transport.retryBaseDelayMs,
        sleep: this.options.sleep,
        random: this.options.random,
      });
      const resolved = await resolver.resolve(url, strategy, credentials);
      return { status: 'success', backend: strategy, cached: false, ...resolved };
    } finally {
      await Promise.all([transport.close(), relayTransport.close()]);
    }
  }

  private async official(url: string, credentials: ExtractionCredentials): Promise<ExtractionSuccess> {
    if (!credentials.official) {
      throw new AuthError('Official backend requires Open Platform credentials');
    }
    const shortCode = extractShortCode(url);
    if (!shortCode) {
      throw new ExtractionError('Could not find a short code in the share URL');
    }

    const transport = this.createTransport('standard');
    try {
      const client = new OfficialApiClient(transport, {
        credentials: credentials.official,
        apiDomain: this.config.officialApiDomain,
      });
      const resolved = await client.resolveShare(shortCode, credentials.password);
      return { status: 'success', backend: 'official', cached: false, ...resolved };
    } finally {
      await transport.close();
    }
  }

  private async commercial(
    url: string,
    credentials: ExtractionCredentials,
    forceRefresh: boolean,
  ): Promise<ExtractionSuccess> {
    if (this.cache && !forceRefresh) {
      const hit = commercialItemsSchema.safeParse(this.cache.get(url));
      if (hit.success) {
        log.debug('Serving cached response', { key: cacheKeyFor(url) });
        return commercialResult(url, hit.data, true);
      }
    }

    const transport = this.createTransport('standard');
    try {
      const client = new CommercialApiClient(transport, this.config.commercial, this.keyPool);
      const items = await client.fetchShare(url, credentials.apiKey);
      this.cache?.put(url, items);
      return commercialResult(url, items, false);
    } finally {
      await transport.close();
    }
  }
}

function commercialResult(url: string, items: CommercialItem[], cached: boolean): ExtractionSuccess {
  const links: Record<string, { direct: string; download: string }> = {};
  for (const item of items) {
    links[item.remoteId] = { direct: item.directLink, download: item.downloadLink };
  }

  return {
    status: 'success',
    backend: 'commercial',
    share: { shortCode: extractShortCode(url) ?? cacheKeyFor(url), uk: '', shareId: '', sign: '', timestamp: '' },
    fileTree: normalizeListing({ source: 'commercial', items }),
    auth: { kind: 'commercial', links },
    warnings: [],
    cached,
  };
}
