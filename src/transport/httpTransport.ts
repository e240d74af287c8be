import { errors, request, type Dispatcher } from 'undici';
import type { TransportConfig } from '../config';
import { errorMessage, Logger } from '../helpers/logger';
import { backoffDelay, retry, type RandomSource, type Sleep } from '../helpers/retry';
import { hostOf, redactShareUrl } from '../helpers/shareUrl';
import { AppError, HttpStatusError, NetworkError, TimeoutError } from '../types/errors';
import { createAgent, defaultHeaders, isBotChallenge, type TransportProfile } from './browserProfile';
import { DESKTOP_USER_AGENTS, pickUserAgent } from './userAgents';

export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'OPTIONS';

export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

const REDIRECT_STATUSES: ReadonlySet<number> = new Set([301, 302, 303, 307, 308]);
const MAX_REDIRECTS = 10;

/** Jitter added to every backoff delay, in ms. */
const RETRY_JITTER_MS = [100, 500] as const;

export interface RequestOptions {
  headers?: Record<string, string>;
  query?: Record<string, string | number>;
  /** JSON request body. */
  json?: unknown;
  /** Form-encoded request body. */
  form?: Record<string, string>;
  /** Explicit Cookie header; replaces the jar for this request. */
  cookies?: string;
  /** Retry budget for this request; defaults to the instance's `maxRetries`. */
  retries?: number;
  /** Statuses retried with backoff; defaults to `RETRYABLE_STATUSES`. */
  retryStatuses?: ReadonlySet<number>;
  /** Return non-2xx responses instead of throwing. */
  allowErrorStatus?: boolean;
  followRedirects?: boolean;
}

export interface HttpResponse {
  status: number;
  /** URL of the response after redirects. */
  url: string;
  headers: Record<string, string>;
  body: string;
  json(): unknown;
}

export interface TransportOptions {
  profile?: TransportProfile;
  /** Connection pool; an undici `Agent` is created when omitted. */
  dispatcher?: Dispatcher;
  userAgents?: readonly string[];
  sleep?: Sleep;
  random?: RandomSource;
  logger?: Logger;
}

/**
 * HTTP client for the share services: a pooled connection, retries with
 * exponential backoff and user-agent rotation, manual redirect following and
 * a cookie jar scoped to the instance.
 */
export class HttpTransport {
  readonly profile: TransportProfile;
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private readonly userAgents: readonly string[];
  private readonly random: RandomSource;
  private readonly sleep: Sleep | undefined;
  private readonly log: Logger;
  private readonly jar = new Map<string, string>();
  private currentUserAgent: string;

  constructor(
    private readonly config: TransportConfig,
    options: TransportOptions = {},
  ) {
    this.profile = options.profile ?? 'standard';
    this.ownsDispatcher = options.dispatcher === undefined;
    this.dispatcher = options.dispatcher ?? createAgent(this.profile, config);
    this.userAgents = options.userAgents ?? DESKTOP_USER_AGENTS;
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep;
    this.log = options.logger ?? new Logger(`transport:${this.profile}`);
    this.currentUserAgent = pickUserAgent(this.userAgents, this.random);
  }

  get userAgent(): string {
    return this.currentUserAgent;
  }

  get(url: string, options?: RequestOptions): Promise<HttpResponse> {
    return this.send('GET', url, options);
  }

  head(url: string, options?: RequestOptions): Promise<HttpResponse> {
    return this.send('HEAD', url, options);
  }

  post(url: string, options?: RequestOptions): Promise<HttpResponse> {
    return this.send('POST', url, options);
  }

  async send(method: HttpMethod, url: string, options: RequestOptions = {}): Promise<HttpResponse> {
    const retries = options.retries ?? this.config.maxRetries;
    const target = withQuery(url, options.query);

    return retry(
      async attempt => {
        if (attempt > 0) this.rotateUserAgent();
        try {
          const response = await this.sendOnce(method, target, options, attempt < retries);
          this.logAttempt(method, target, attempt, `HTTP ${response.status}`);
          return response;
        } catch (err) {
          const mapped = toNetworkError(err, target);
          this.logAttempt(method, target, attempt, mapped.message);
          throw mapped;
        }
      },
      {
        retries,
        delay: n => backoffDelay(n, {
          baseDelayMs: this.config.retryBaseDelayMs,
          jitterMs: RETRY_JITTER_MS,
          random: this.random,
        }),
        retryIf: err => err instanceof NetworkError && err.transient,
        onRetry: (_err, n, delayMs) => {
          this.log.debug('Retrying request', { method, url: redactShareUrl(target), retry: n, delayMs: Math.round(delayMs) });
        },
        sleep: this.sleep,
      },
    );
  }

  /** Cookies collected from `Set-Cookie` headers. */
  cookies(): Record<string, string> {
    return Object.fromEntries(this.jar);
  }

  getCookie(name: string): string | undefined {
    return this.jar.get(name);
  }

  cookieHeader(): string {
    return [...this.jar].map(([name, value]) => `${name}=${value}`).join(';');
  }

  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }

  private async sendOnce(
    method: HttpMethod,
    url: string,
    options: RequestOptions,
    canRetry: boolean,
  ): Promise<HttpResponse> {
    const follow = options.followRedirects ?? true;
    let currentUrl = url;
    let currentMethod = method;
    let includeBody = true;
    const originHost = hostOf(url);

    for (let hop = 0; ; hop++) {
      const { statusCode, headers, body } = await request(currentUrl, {
        method: currentMethod,
        headers: this.buildHeaders(options, includeBody, hostOf(currentUrl) === originHost),
        body: includeBody ? encodeBody(options) : undefined,
        dispatcher: this.dispatcher,
        headersTimeout: this.config.requestTimeoutMs,
        bodyTimeout: this.config.requestTimeoutMs,
      });
      this.storeCookies(headers['set-cookie']);

      const location = headerValue(headers.location);
      if (follow && REDIRECT_STATUSES.has(statusCode) && location) {
        await body.dump();
        if (hop + 1 > MAX_REDIRECTS) {
          throw new NetworkError(`Too many redirects from ${hostOf(url)}`, false);
        }
        currentUrl = new URL(location, currentUrl).toString();
        if (statusCode === 303 || ((statusCode === 301 || statusCode === 302) && currentMethod === 'POST')) {
          currentMethod = 'GET';
          includeBody = false;
        }
        continue;
      }

      const text = await body.text();

      if (this.profile === 'browser' && isBotChallenge(statusCode, text)) {
        throw new NetworkError(`Bot challenge from ${hostOf(currentUrl)}`, true);
      }
      const retryable = options.retryStatuses ?? RETRYABLE_STATUSES;
      if (retryable.has(statusCode) && (canRetry || !options.allowErrorStatus)) {
        throw new HttpStatusError(statusCode, currentUrl, true);
      }
      if (statusCode >= 400 && !options.allowErrorStatus) {
        throw new HttpStatusError(statusCode, currentUrl, false);
      }

      return buildResponse(statusCode, currentUrl, headers, text);
    }
  }

  /** Cookies go only to the host the request was addressed to, never across a redirect. */
  private buildHeaders(options: RequestOptions, includeBody: boolean, sendCookies: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      ...defaultHeaders(this.profile),
      'user-agent': this.currentUserAgent,
    };
    if (includeBody && options.json !== undefined) {
      headers['content-type'] = 'application/json';
    } else if (includeBody && options.form) {
      headers['content-type'] = 'application/x-www-form-urlencoded';
    }

    const cookie = sendCookies ? options.cookies ?? this.cookieHeader() : '';
    if (cookie) headers.cookie = cookie;

    for (const [name, value] of Object.entries(options.headers ?? {})) {
      headers[name.toLowerCase()] = value;
    }
    return headers;
  }

  private storeCookies(setCookie: string | string[] | undefined): void {
    if (!setCookie) return;
    for (const line of Array.isArray(setCookie) ? setCookie : [setCookie]) {
      const pair = line.split(';', 1)[0];
      const eq = pair.indexOf('=');
      if (eq <= 0) continue;
      this.jar.set(pair.slice(0, eq).trim(), pair.slice(eq + 1).trim());
    }
  }

  private rotateUserAgent(): void {
    const previous = this.currentUserAgent;
    this.currentUserAgent = pickUserAgent(this.userAgents, this.random);
    if (previous !== this.currentUserAgent) {
      this.log.debug('Rotated user agent', { userAgent: this.currentUserAgent.slice(0, 40) });
    }
  }

  private logAttempt(method: HttpMethod, url: string, attempt: number, outcome: string): void {
    this.log.debug('HTTP attempt', { method, url: redactShareUrl(url), attempt: attempt + 1, outcome });
  }
}

function withQuery(url: string, query: RequestOptions['query']): string {
  if (!query) return url;
  let target: URL;
  try {
    target = new URL(url);
  } catch {
    throw new NetworkError(`Invalid request URL: ${url}`, false);
  }
  for (const [key, value] of Object.entries(query)) {
    target.searchParams.set(key, String(value));
  }
  return target.toString();
}

function encodeBody(options: RequestOptions): string | undefined {
  if (options.json !== undefined) return JSON.stringify(options.json);
  if (options.form) return new URLSearchParams(options.form).toString();
  return undefined;
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function buildResponse(
  status: number,
  url: string,
  rawHeaders: Record<string, string | string[] | undefined>,
  body: string,
): HttpResponse {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(rawHeaders)) {
    if (value === undefined) continue;
    headers[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return {
    status,
    url,
    headers,
    body,
    json: () => JSON.parse(body),
  };
}

function isTimeout(err: unknown): boolean {
  return err instanceof errors.ConnectTimeoutError
    || err instanceof errors.HeadersTimeoutError
    || err instanceof errors.BodyTimeoutError;
}

function toNetworkError(err: unknown, url: string): AppError {
  if (err instanceof AppError) return err;
  const host = hostOf(url);
  if (isTimeout(err)) return new TimeoutError(`Request to ${host} timed out`);
  return new NetworkError(`Request to ${host} failed: ${errorMessage(err)}`, true);
}
