export interface CacheEntryRow {
  share_key: string;
  share_url: string;
  payload: string;
  stored_at: number;
  ttl_ms: number;
}

export interface CacheEntry {
  key: string;
  shareUrl: string;
  payload: unknown;
  storedAt: number;
  ttlMs: number;
}

export interface CacheStats {
  total: number;
  valid: number;
  expired: number;
  ttlMs: number;
  entries: {
    key: string;
    shareUrl: string;
    storedAt: string;
    ageMs: number;
    valid: boolean;
  }[];
}
