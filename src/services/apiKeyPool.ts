import { Logger } from '../helpers/logger';

const log = new Logger('key-pool');

const DEFAULT_COOLDOWN_MS = 60 * 60 * 1000;

export type ApiKeyState = 'healthy' | 'rate_limited' | 'invalid';

export interface ApiKeyLease {
  id: string;
  key: string;
}

/** Pool entry as reported to callers; the key itself is never included. */
export interface ApiKeyStatus {
  id: string;
  state: ApiKeyState;
  rateLimitedUntil: string | null;
  requests: number;
  failures: number;
}

export interface ApiKeyPoolOptions {
  cooldownMs?: number;
  now?: () => number;
}

interface KeyEntry {
  id: string;
  key: string;
  state: ApiKeyState;
  rateLimitedUntil: number | null;
  requests: number;
  failures: number;
}

/**
 * Ordered set of API keys with sticky selection: the current key is used
 * until it is rate limited or rejected, then the next usable one takes over.
 * Rate-limited keys come back once their cooldown has passed; rejected keys
 * stay out until `reset()`.
 */
export class ApiKeyPool {
  private readonly entries: KeyEntry[];
  private readonly cooldownMs: number;
  private readonly now: () => number;
  private current = 0;

  constructor(keys: readonly string[], options: ApiKeyPoolOptions = {}) {
    this.entries = keys
      .filter(key => key.length > 0)
      .map((key, i): KeyEntry => ({ id: `key_${i + 1}`, key, state: 'healthy', rateLimitedUntil: null, requests: 0, failures: 0 }));
    this.cooldownMs = options.cooldownMs ?? DEFAULT_COOLDOWN_MS;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.length;
  }

  /** The key to use next, or null when every key is rate limited or rejected. */
  next(): ApiKeyLease | null {
    for (let i = 0; i < this.entries.length; i++) {
      const index = (this.current + i) % this.entries.length;
      const entry = this.entries[index];
      if (!this.isAvailable(entry)) continue;

      if (index !== this.current) {
        log.info('Rotated API key', { keyId: entry.id });
        this.current = index;
      }
      entry.requests++;
      return { id: entry.id, key: entry.key };
    }
    return null;
  }

  markSuccess(id: string): void {
    const entry = this.find(id);
    if (entry) entry.state = 'healthy';
  }

  markRateLimited(id: string, retryAfterMs?: number): void {
    const entry = this.find(id);
    if (!entry) return;

    entry.state = 'rate_limited';
    entry.rateLimitedUntil = this.now() + (retryAfterMs ?? this.cooldownMs);
    entry.failures++;
    log.warn('API key rate limited', { keyId: id, until: new Date(entry.rateLimitedUntil).toISOString() });
    this.advancePast(entry);
  }

  markInvalid(id: string): void {
    const entry = this.find(id);
    if (!entry) return;

    entry.state = 'invalid';
    entry.failures++;
    log.warn('API key rejected', { keyId: id });
    this.advancePast(entry);
  }

  /** True when the pool is non-empty and every key has been rejected. */
  allRejected(): boolean {
    return this.entries.length > 0 && this.entries.every(entry => entry.state === 'invalid');
  }

  status(): ApiKeyStatus[] {
    return this.entries.map((entry): ApiKeyStatus => {
      const cooling = entry.state === 'rate_limited' && !this.isAvailable(entry);
      return {
        id: entry.id,
        state: entry.state === 'rate_limited' && !cooling ? 'healthy' : entry.state,
        rateLimitedUntil: cooling && entry.rateLimitedUntil !== null
          ? new Date(entry.rateLimitedUntil).toISOString()
          : null,
        requests: entry.requests,
        failures: entry.failures,
      };
    });
  }

  reset(): void {
    for (const entry of this.entries) {
      entry.state = 'healthy';
      entry.rateLimitedUntil = null;
    }
    this.current = 0;
  }

  private isAvailable(entry: KeyEntry): boolean {
    switch (entry.state) {
      case 'healthy': return true;
      case 'invalid': return false;
      case 'rate_limited': return entry.rateLimitedUntil !== null && this.now() >= entry.rateLimitedUntil;
    }
  }

  private find(id: string): KeyEntry | undefined {
    return this.entries.find(entry => entry.id === id);
  }

  private advancePast(entry: KeyEntry): void {
    const index = this.entries.indexOf(entry);
    if (index === this.current && this.entries.length > 1) {
      this.current = (index + 1) % this.entries.length;
    }
  }
}
