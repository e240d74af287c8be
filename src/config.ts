import fs from 'fs';
import path from 'path';

export interface TransportConfig {
  maxRetries: number;
  retryBaseDelayMs: number;
  requestTimeoutMs: number;
  connectTimeoutMs: number;
}

export interface RelayConfig {
  url: string;
  wrapperHosts: string[];
}

export interface CommercialConfig {
  url: string;
  host: string;
  /** Key pool, tried in order and rotated on 401, 403 and 429. */
  apiKeys: string[];
  /** How long a rate-limited key sits out when the API sends no Retry-After. */
  keyCooldownMs: number;
}

export interface BatchConfig {
  maxUrls: number;
  /** Pause between consecutive extractions of one batch. */
  delayMs: number;
}

export interface CacheConfig {
  enabled: boolean;
  dbPath: string;
  ttlHours: number;
}

export interface AppConfig {
  port: number;
  supportedDomains: string[];
  transport: TransportConfig;
  relay: RelayConfig;
  commercial: CommercialConfig;
  officialApiDomain: string;
  cache: CacheConfig;
  batch: BatchConfig;
  requestBodyMaxBytes: number;
  shutdownTimeoutMs: number;
}

export const DEFAULT_SUPPORTED_DOMAINS = [
  'terabox.com',
  'terabox.app',
  '1024terabox.com',
  '1024tera.com',
  'freeterabox.com',
  'nephobox.com',
  'terasharelink.com',
  'terafileshare.com',
];

export const DEFAULT_WRAPPER_HOSTS = [
  'plain-grass-58b2.comprehensiveaquamarine',
  'royal-block-6609.ninnetta7875',
  'bold-hall-f23e.7rochelle',
  'winter-thunder-0360.belitawhite',
  'fragrant-term-0df9.elviraeducational',
  'purple-glitter-924b.miguelalocal',
];

type Env = Record<string, string | undefined>;

function requirePositiveInt(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined) return fallback;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed <= 0) {
    throw new Error(`Invalid config: ${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function requireNonNegativeInt(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined) return fallback;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    throw new Error(`Invalid config: ${name} must be a non-negative integer, got "${value}"`);
  }
  return parsed;
}

function requirePositiveNumber(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Invalid config: ${name} must be a positive number, got "${value}"`);
  }
  return parsed;
}

function requireUrl(value: string | undefined, fallback: string, name: string): string {
  const raw = value ?? fallback;
  try {
    new URL(raw);
  } catch {
    throw new Error(`Invalid config: ${name} must be an absolute URL, got "${raw}"`);
  }
  return raw.replace(/\/+$/, '');
}

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (value === undefined) return [...fallback];
  const items = value.split(',').map(s => s.trim().toLowerCase()).filter(Boolean);
  return items.length > 0 ? items : [...fallback];
}

/** Comma-separated secrets; case is kept. */
function parseSecrets(value: string | undefined): string[] {
  return (value ?? '').split(',').map(s => s.trim()).filter(Boolean);
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  return !['0', 'false', 'no', 'off'].includes(value.trim().toLowerCase());
}

export function loadConfig(env: Env = process.env): AppConfig {
  const commercialUrl = requireUrl(
    env.COMMERCIAL_API_URL,
    'https://terabox-downloader-direct-download-link-generator2.p.rapidapi.com',
    'COMMERCIAL_API_URL',
  );

  const config: AppConfig = {
    port: requirePositiveInt(env.PORT, 3000, 'PORT'),
    supportedDomains: parseList(env.SUPPORTED_DOMAINS, DEFAULT_SUPPORTED_DOMAINS),
    transport: {
      maxRetries: requireNonNegativeInt(env.MAX_RETRIES, 3, 'MAX_RETRIES'),
      retryBaseDelayMs: requirePositiveInt(env.RETRY_BASE_DELAY_MS, 1000, 'RETRY_BASE_DELAY_MS'),
      requestTimeoutMs: requirePositiveInt(env.REQUEST_TIMEOUT_MS, 30_000, 'REQUEST_TIMEOUT_MS'),
      connectTimeoutMs: requirePositiveInt(env.CONNECT_TIMEOUT_MS, 10_000, 'CONNECT_TIMEOUT_MS'),
    },
    relay: {
      url: requireUrl(env.RELAY_URL, 'https://terabox.hnn.workers.dev', 'RELAY_URL'),
      wrapperHosts: parseList(env.RELAY_WRAPPER_HOSTS, DEFAULT_WRAPPER_HOSTS),
    },
    commercial: {
      url: commercialUrl,
      host: env.COMMERCIAL_API_HOST || new URL(commercialUrl).host,
      apiKeys: parseSecrets(env.COMMERCIAL_API_KEY),
      keyCooldownMs: requirePositiveInt(env.COMMERCIAL_KEY_COOLDOWN_MS, 3_600_000, 'COMMERCIAL_KEY_COOLDOWN_MS'),
    },
    officialApiDomain: env.OFFICIAL_API_DOMAIN || 'www.terabox.com',
    cache: {
      enabled: parseBoolean(env.CACHE_ENABLED, true),
      dbPath: env.CACHE_DB_PATH || './data/response-cache.db',
      ttlHours: requirePositiveNumber(env.CACHE_TTL_HOURS, 24, 'CACHE_TTL_HOURS'),
    },
    batch: {
      maxUrls: requirePositiveInt(env.BATCH_MAX_URLS, 20, 'BATCH_MAX_URLS'),
      delayMs: requireNonNegativeInt(env.BATCH_DELAY_MS, 1000, 'BATCH_DELAY_MS'),
    },
    requestBodyMaxBytes: requirePositiveInt(env.REQUEST_BODY_MAX_BYTES, 1_048_576, 'REQUEST_BODY_MAX_BYTES'),
    shutdownTimeoutMs: requirePositiveInt(env.SHUTDOWN_TIMEOUT_MS, 30_000, 'SHUTDOWN_TIMEOUT_MS'),
  };

  return config;
}

/**
 * Create the cache database directory and verify it is writable.
 * In-memory databases need nothing.
 */
export function prepareCacheStorage(config: CacheConfig): void {
  if (!config.enabled || config.dbPath === ':memory:') return;

  const dbDir = path.dirname(config.dbPath);
  fs.mkdirSync(dbDir, { recursive: true });

  try {
    fs.accessSync(dbDir, fs.constants.W_OK);
  } catch {
    throw new Error(
      `Cannot write to cache directory: ${dbDir}. ` +
      'If running in Docker with a volume mount, ensure the volume is writable by the container user.'
    );
  }
}
