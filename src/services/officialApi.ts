import { z } from 'zod';
import { Logger } from '../helpers/logger';
import { idString, listingItemSchema, parseJsonBody, type ListingItem } from '../helpers/normalize';
import { signRequest } from '../helpers/signature';
import type { HttpResponse, HttpTransport } from '../transport/httpTransport';
import type { FileNode, OfficialAuth, OfficialCredentials, ShareIdentity, TraversalWarning } from '../types';
import { AuthError, ExtractionError } from '../types/errors';
import { walkTree } from './treeWalker';

const log = new Logger('official');

const OAUTH_BASE = 'https://www.terabox.com/oauth';
const LOGIN_URL = 'https://www.terabox.com/wap/outside/login';

/** Returned by the token endpoint while the user has not confirmed a device code. */
const AUTHORIZATION_PENDING = 400001;

const envelopeSchema = z.object({ errno: z.number().default(0) }).passthrough();
const dataEnvelopeSchema = z.object({ data: z.unknown() });

const tokenDataSchema = z.object({
  access_token: z.string(),
  refresh_token: z.string(),
  expires_in: z.number(),
});

const deviceCodeSchema = z.object({
  device_code: z.string(),
  qrcode_url: z.string(),
  expires_in: z.number(),
  interval: z.number(),
});

const tokenInfoSchema = z.object({
  api_domain: z.string(),
  upload_domain: z.string().optional(),
  user_id: idString.optional(),
  expires_in: z.number().optional(),
});

const verifySchema = z.object({ randsk: z.string() });

const shareInfoSchema = z.object({
  shareid: idString,
  uk: idString,
  list: z.array(listingItemSchema).default([]),
});

const shareListSchema = z.object({
  list: z.array(listingItemSchema).default([]),
});

const downloadSchema = z.object({
  list: z.array(z.object({ fs_id: idString, dlink: z.string() })).default([]),
});

export interface TokenSet {
  accessToken: string;
  refreshToken: string;
  expiresIn: number;
}

export interface DeviceCode {
  deviceCode: string;
  qrcodeUrl: string;
  expiresIn: number;
  interval: number;
}

export type DevicePollResult =
  | { status: 'success'; tokens: TokenSet }
  | { status: 'pending' };

export interface TokenInfo {
  apiDomain: string;
  uploadDomain: string;
  userId: string | null;
  expiresIn: number | null;
}

export interface OfficialShare {
  share: ShareIdentity;
  fileTree: FileNode[];
  warnings: TraversalWarning[];
  auth: OfficialAuth;
}

export interface OfficialApiOptions {
  credentials?: Partial<OfficialCredentials>;
  apiDomain: string;
  now?: () => number;
}

/**
 * Client for the TeraBox Open Platform: OAuth (authorization code and
 * device code flows) plus the share endpoints.
 */
export class OfficialApiClient {
  private readonly credentials: Partial<OfficialCredentials>;
  private readonly now: () => number;
  private accessToken: string | undefined;
  private refreshToken: string | undefined;
  private domain: string;

  constructor(
    private readonly transport: HttpTransport,
    options: OfficialApiOptions,
  ) {
    this.credentials = options.credentials ?? {};
    this.now = options.now ?? Date.now;
    this.accessToken = this.credentials.accessToken;
    this.refreshToken = this.credentials.refreshToken;
    this.domain = this.credentials.apiDomain ?? options.apiDomain;
  }

  get apiDomain(): string {
    return this.domain;
  }

  get isAuthenticated(): boolean {
    return this.accessToken !== undefined;
  }

  authorizationUrl(mobile = false): string {
    const url = new URL(LOGIN_URL);
    url.searchParams.set('clientId', this.signingCredentials().clientId);
    if (mobile) url.searchParams.set('isFromApp', '1');
    return url.toString();
  }

  async exchangeCode(code: string): Promise<TokenSet> {
    const res = await this.transport.post(`${OAUTH_BASE}/gettoken`, {
      form: { ...this.signedForm(), grant_type: 'authorization_code', code },
    });
    return this.storeTokens(this.readData(res, tokenDataSchema, 'Token exchange'));
  }

  async refreshAccessToken(): Promise<TokenSet> {
    if (!this.refreshToken) {
      throw new AuthError('No refresh token available');
    }
    const res = await this.transport.post(`${OAUTH_BASE}/refreshtoken`, {
      form: { ...this.signedForm(), refresh_token: this.refreshToken },
    });
    return this.storeTokens(this.readData(res, tokenDataSchema, 'Token refresh'));
  }

  async requestDeviceCode(): Promise<DeviceCode> {
    const res = await this.transport.get(`${OAUTH_BASE}/devicecode`, {
      query: { client_id: this.signingCredentials().clientId },
    });
    const data = this.readData(res, deviceCodeSchema, 'Device code request');
    return {
      deviceCode: data.device_code,
      qrcodeUrl: data.qrcode_url,
      expiresIn: data.expires_in,
      interval: data.interval,
    };
  }

  async pollDeviceToken(deviceCode: string): Promise<DevicePollResult> {
    const res = await this.transport.post(`${OAUTH_BASE}/gettoken`, {
      form: { ...this.signedForm(), grant_type: 'device_code', code: deviceCode },
    });
    const envelope = parseJsonBody(res, envelopeSchema, 'Device token poll');
    if (envelope.errno === AUTHORIZATION_PENDING) {
      return { status: 'pending' };
    }
    const tokens = this.storeTokens(this.readData(res, tokenDataSchema, 'Device token poll'));
    return { status: 'success', tokens };
  }

  /** Look up the token's API domain and remember it for later calls. */
  async tokenInfo(): Promise<TokenInfo> {
    const res = await this.transport.post(`${OAUTH_BASE}/tokeninfo`, {
      form: { access_token: this.requireToken() },
    });
    const data = this.readData(res, tokenInfoSchema, 'Token info');
    this.domain = data.api_domain;
    return {
      apiDomain: data.api_domain,
      uploadDomain: data.upload_domain ?? data.api_domain,
      userId: data.user_id ?? null,
      expiresIn: data.expires_in ?? null,
    };
  }

  /** Exchange a share password for the `randsk` session key. */
  async verifySharePassword(shortCode: string, password: string): Promise<string> {
    const res = await this.transport.post(`https://${this.domain}/openapi/share/verify`, {
      query: { access_token: this.requireToken(), surl: shortCode },
      form: { pwd: password },
    });
    return this.readBody(res, verifySchema, 'Share password verification').randsk;
  }

  async shareInfo(shortCode: string, sekey?: string): Promise<z.output<typeof shareInfoSchema>> {
    const query: Record<string, string | number> = {
      access_token: this.requireToken(),
      shorturl: `1${shortCode}`,
      root: 1,
    };
    if (sekey) query.spd = sekey;

    const res = await this.transport.get(`https://${this.domain}/openapi/api/shorturlinfo`, { query });
    return this.readBody(res, shareInfoSchema, 'Share info');
  }

  async shareFileList(shortCode: string, sekey: string, dir: string, page = 1, num = 100): Promise<ListingItem[]> {
    const res = await this.transport.get(`https://${this.domain}/openapi/share/list`, {
      query: {
        access_token: this.requireToken(),
        shorturl: shortCode,
        sekey,
        page,
        num,
        root: 0,
        dir,
      },
    });
    return this.readBody(res, shareListSchema, 'Share file list').list;
  }

  /** Direct links keyed by file id. */
  async shareDownloadLinks(
    shareId: string,
    fsIds: string[],
    uk: string,
    sekey: string,
  ): Promise<Record<string, string>> {
    const res = await this.transport.get(`https://${this.domain}/openapi/share/download`, {
      query: {
        access_token: this.requireToken(),
        shareid: shareId,
        fid_list: `[${fsIds.join(',')}]`,
        uk,
        sekey,
      },
    });
    const { list } = this.readBody(res, downloadSchema, 'Share download');
    return Object.fromEntries(list.map(item => [item.fs_id, item.dlink]));
  }

  /**
   * Resolve a share into its file tree, refreshing the access token first
   * when only a refresh token is held.
   */
  async resolveShare(shortCode: string, password?: string): Promise<OfficialShare> {
    if (!this.accessToken && this.refreshToken) {
      await this.refreshAccessToken();
    }
    const accessToken = this.requireToken();

    const sekey = password ? await this.verifySharePassword(shortCode, password) : '';
    const info = await this.shareInfo(shortCode, sekey || undefined);
    if (info.list.length === 0) {
      throw new ExtractionError('No files found in the response');
    }

    const { tree, warnings } = await walkTree(info.list, dir => this.shareFileList(shortCode, sekey, dir));
    log.info('Resolved share', { shortCode, files: info.list.length, warnings: warnings.length });

    return {
      share: { shortCode, uk: info.uk, shareId: info.shareid, sign: '', timestamp: '' },
      fileTree: tree,
      warnings,
      auth: {
        kind: 'official',
        accessToken,
        apiDomain: this.domain,
        uk: info.uk,
        shareId: info.shareid,
        sekey,
      },
    };
  }

  private signingCredentials(): OfficialCredentials {
    const { clientId, clientSecret, privateSecret } = this.credentials;
    if (!clientId || !clientSecret || !privateSecret) {
      const missing = Object.entries({ clientId, clientSecret, privateSecret })
        .filter(([, value]) => !value)
        .map(([name]) => name);
      throw new AuthError(`Missing Open Platform credentials: ${missing.join(', ')}`);
    }
    return { ...this.credentials, clientId, clientSecret, privateSecret };
  }

  private signedForm(): Record<string, string> {
    const { clientId, clientSecret, privateSecret } = this.signingCredentials();
    const timestamp = Math.floor(this.now() / 1000);
    return {
      client_id: clientId,
      client_secret: clientSecret,
      timestamp: String(timestamp),
      sign: signRequest(clientId, timestamp, clientSecret, privateSecret),
    };
  }

  private requireToken(): string {
    if (!this.accessToken) {
      throw new AuthError('No access token available; complete authorization first');
    }
    return this.accessToken;
  }

  private storeTokens(data: z.output<typeof tokenDataSchema>): TokenSet {
    this.accessToken = data.access_token;
    this.refreshToken = data.refresh_token;
    log.info('Obtained access token', { expiresIn: data.expires_in });
    return { accessToken: data.access_token, refreshToken: data.refresh_token, expiresIn: data.expires_in };
  }

  /** Errno-checked body of an OAuth response, whose payload sits under `data`. */
  private readData<T extends z.ZodTypeAny>(res: HttpResponse, schema: T, operation: string): z.output<T> {
    const { data } = this.readBody(res, dataEnvelopeSchema, operation);
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new ExtractionError(`Unexpected response from ${operation}`);
    }
    return parsed.data;
  }

  /** Errno-checked body of an Open API response, whose payload is the body itself. */
  private readBody<T extends z.ZodTypeAny>(res: HttpResponse, schema: T, operation: string): z.output<T> {
    this.checkErrno(res, operation);
    return parseJsonBody(res, schema, operation);
  }

  private checkErrno(res: HttpResponse, operation: string): void {
    const { errno } = parseJsonBody(res, envelopeSchema, operation);
    if (errno !== 0) {
      throw new ExtractionError(`${operation} failed (errno ${errno})`);
    }
  }
}
