import Database from 'better-sqlite3';
import type { CacheConfig } from '../config';
import { errorMessage, Logger } from '../helpers/logger';
import { cacheKeyFor, redactShareUrl } from '../helpers/shareUrl';
import type { CacheEntry, CacheEntryRow, CacheStats } from '../types';
import { runMigrations } from './migrator';

const log = new Logger('cache');

const HOUR_MS = 3_600_000;

export interface ResponseCacheOptions {
  ttlHours: number;
  now?: () => number;
}

/**
 * SQLite-backed cache of upstream responses, keyed by share short code so
 * every mirror domain of a share hits the same entry. Expired rows stay in
 * the table until swept.
 */
export class ResponseCache {
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly stmts: ReturnType<ResponseCache['prepareStatements']>;

  constructor(
    private readonly db: Database.Database,
    options: ResponseCacheOptions,
  ) {
    this.ttlMs = Math.round(options.ttlHours * HOUR_MS);
    this.now = options.now ?? Date.now;

    runMigrations(this.db);
    this.stmts = this.prepareStatements();
  }

  /** Open (or create) the database file named by the config. */
  static open(config: CacheConfig, now?: () => number): ResponseCache {
    log.info('Opening response cache', { path: config.dbPath, ttlHours: config.ttlHours });

    const db = new Database(config.dbPath);
    db.pragma('journal_mode = WAL');
    db.pragma('busy_timeout = 5000');

    return new ResponseCache(db, { ttlHours: config.ttlHours, now });
  }

  private prepareStatements() {
    return {
      get: this.db.prepare<[string], CacheEntryRow>('SELECT * FROM response_cache WHERE share_key = ?'),
      all: this.db.prepare<[], CacheEntryRow>('SELECT * FROM response_cache ORDER BY stored_at DESC'),
      upsert: this.db.prepare<[string, string, string, number, number]>(`
        INSERT OR REPLACE INTO response_cache (share_key, share_url, payload, stored_at, ttl_ms)
        VALUES (?, ?, ?, ?, ?)
      `),
      remove: this.db.prepare<[string]>('DELETE FROM response_cache WHERE share_key = ?'),
      sweep: this.db.prepare<[number]>('DELETE FROM response_cache WHERE ? - stored_at > ttl_ms'),
      clear: this.db.prepare('DELETE FROM response_cache'),
    };
  }

  get ttl(): number {
    return this.ttlMs;
  }

  /** Cached payload for a share, or undefined when absent or expired. */
  get(shareUrl: string): unknown {
    const key = cacheKeyFor(shareUrl);
    const row = this.stmts.get.get(key);
    if (!row) return undefined;

    if (this.isExpired(row)) {
      log.debug('Cache entry expired', { key });
      return undefined;
    }

    try {
      return JSON.parse(row.payload);
    } catch (err) {
      log.warn('Unreadable cache entry', { key, error: errorMessage(err) });
      return undefined;
    }
  }

  /** Full entry for a share, expired or not. */
  entry(shareUrl: string): CacheEntry | undefined {
    const row = this.stmts.get.get(cacheKeyFor(shareUrl));
    if (!row) return undefined;

    let payload: unknown;
    try {
      payload = JSON.parse(row.payload);
    } catch {
      payload = null;
    }
    return { key: row.share_key, shareUrl: row.share_url, payload, storedAt: row.stored_at, ttlMs: row.ttl_ms };
  }

  /** Store a payload; false when it could not be written. */
  put(shareUrl: string, payload: unknown): boolean {
    const key = cacheKeyFor(shareUrl);
    try {
      const serialized = JSON.stringify(payload);
      if (serialized === undefined) {
        log.warn('Refusing to cache a payload with no JSON form', { key });
        return false;
      }
      this.stmts.upsert.run(key, shareUrl, serialized, this.now(), this.ttlMs);
      log.debug('Cached response', { key, url: redactShareUrl(shareUrl) });
      return true;
    } catch (err) {
      log.warn('Failed to cache response', { key, error: errorMessage(err) });
      return false;
    }
  }

  remove(shareUrl: string): boolean {
    return this.stmts.remove.run(cacheKeyFor(shareUrl)).changes > 0;
  }

  /** Delete expired rows; returns how many went. */
  sweepExpired(): number {
    const removed = this.stmts.sweep.run(this.now()).changes;
    if (removed > 0) log.info('Swept expired cache entries', { removed });
    return removed;
  }

  clear(): number {
    const removed = this.stmts.clear.run().changes;
    log.info('Cleared response cache', { removed });
    return removed;
  }

  stats(): CacheStats {
    const now = this.now();
    const entries = this.stmts.all.all().map(row => ({
      key: row.share_key,
      shareUrl: row.share_url,
      storedAt: new Date(row.stored_at).toISOString(),
      ageMs: now - row.stored_at,
      valid: !this.isExpired(row, now),
    }));
    const valid = entries.filter(e => e.valid).length;

    return {
      total: entries.length,
      valid,
      expired: entries.length - valid,
      ttlMs: this.ttlMs,
      entries,
    };
  }

  close(): void {
    this.db.close();
  }

  private isExpired(row: CacheEntryRow, now: number = this.now()): boolean {
    return now - row.stored_at > row.ttl_ms;
  }
}
