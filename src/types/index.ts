// Extraction types
export { BACKENDS } from './extraction';
export type {
  AuthContext,
  Backend,
  CommercialAuth,
  CookieAuth,
  CredentialCheck,
  DownloadLinkSet,
  ExtractionCredentials,
  ExtractionFailure,
  ExtractionResult,
  ExtractionSuccess,
  ExtractOptions,
  FileCategory,
  FileNode,
  LinkRank,
  OfficialAuth,
  OfficialCredentials,
  RelayAuth,
  ScrapeAuth,
  ScrapingStrategy,
  ShareIdentity,
  ShareReference,
  TraversalWarning,
} from './extraction';

// Cache types
export type { CacheEntry, CacheEntryRow, CacheStats } from './cache';

// Errors
export {
  AppError,
  AuthError,
  DownloadError,
  ExtractionError,
  HttpStatusError,
  NetworkError,
  NotFoundError,
  RequestValidationError,
  TimeoutError,
  URLValidationError,
  describeError,
  statusForKind,
} from './errors';
export type { ErrorDescription, ErrorKind } from './errors';
