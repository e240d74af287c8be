import type { ErrorKind } from './errors';

export const BACKENDS = ['scrape', 'cookie', 'relay', 'official', 'commercial'] as const;

export type Backend = (typeof BACKENDS)[number];

/** Backends that go through the share resolver's scraping strategies. */
export type ScrapingStrategy = Extract<Backend, 'scrape' | 'cookie' | 'relay'>;

export type FileCategory = 'video' | 'image' | 'document' | 'archive' | 'audio' | 'other';

export interface FileNode {
  isDirectory: boolean;
  path: string;
  remoteId: string;
  name: string;
  type: FileCategory;
  sizeBytes: number;
  thumbnailUrl: string;
  children: FileNode[];
  directLink?: string;
}

/** A share URL paired with the short code its redirect resolved to. */
export interface ShareReference {
  readonly url: string;
  readonly shortCode: string;
}

export interface ShareIdentity {
  shortCode: string;
  uk: string;
  shareId: string;
  sign: string;
  timestamp: string;
}

/** A directory whose listing failed and was left empty. */
export interface TraversalWarning {
  path: string;
  message: string;
}

export interface ScrapeAuth {
  kind: 'scrape';
  uk: string;
  shareId: string;
  sign: string;
  timestamp: string;
  jsToken: string;
  browserId: string;
  cookie: string;
}

export interface CookieAuth {
  kind: 'cookie';
  uk: string;
  shareId: string;
  directLinks: Record<string, string>;
}

export interface RelayAuth {
  kind: 'relay';
  uk: string;
  shareId: string;
  sign: string;
  timestamp: string;
}

export interface OfficialAuth {
  kind: 'official';
  accessToken: string;
  apiDomain: string;
  uk: string;
  shareId: string;
  sekey: string;
}

export interface CommercialAuth {
  kind: 'commercial';
  links: Record<string, { direct: string; download: string }>;
}

/** Everything link generation needs later, per backend. */
export type AuthContext = ScrapeAuth | CookieAuth | RelayAuth | OfficialAuth | CommercialAuth;

export interface ExtractionSuccess {
  status: 'success';
  backend: Backend;
  share: ShareIdentity;
  fileTree: FileNode[];
  auth: AuthContext;
  warnings: TraversalWarning[];
  cached: boolean;
}

export interface ExtractionFailure {
  status: 'failed';
  backend: Backend;
  message: string;
  errorKind: ErrorKind;
  retryable: boolean;
}

export type ExtractionResult = ExtractionSuccess | ExtractionFailure;

export type LinkRank = 'slow' | 'medium' | 'fast';

export type DownloadLinkSet =
  | { status: 'success'; links: Partial<Record<LinkRank, string>> }
  | { status: 'failed'; message: string; errorKind: ErrorKind; retryable: boolean };

export interface OfficialCredentials {
  clientId: string;
  clientSecret: string;
  privateSecret: string;
  accessToken?: string;
  refreshToken?: string;
  apiDomain?: string;
}

/** Caller-supplied secrets; the core never stores them. */
export interface ExtractionCredentials {
  cookie?: string;
  apiKey?: string;
  password?: string;
  official?: OfficialCredentials;
}

export interface ExtractOptions {
  credentials?: ExtractionCredentials;
  forceRefresh?: boolean;
}

/** Outcome of a credential check; `warning` means usable but unconfirmed. */
export interface CredentialCheck {
  status: 'valid' | 'warning' | 'invalid';
  message: string;
}
