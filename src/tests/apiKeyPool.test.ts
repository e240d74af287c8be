import { ApiKeyPool } from '../services/apiKeyPool';

describe('ApiKeyPool', () => {
  let now: number;

  beforeEach(() => {
    now = Date.parse('2026-01-01T00:00:00.000Z');
  });

  function pool(keys: string[], cooldownMs = 60_000): ApiKeyPool {
    return new ApiKeyPool(keys, { cooldownMs, now: () => now });
  }

  it('should skip empty keys and number the rest', () => {
    const keys = pool(['test-key-a', '', 'test-key-b']);

    expect(keys.size).toBe(2);
    expect(keys.status().map(entry => entry.id)).toEqual(['key_1', 'key_2']);
  });

  it('should keep using the current key while it works', () => {
    const keys = pool(['test-key-a', 'test-key-b']);

    expect(keys.next()).toEqual({ id: 'key_1', key: 'test-key-a' });
    keys.markSuccess('key_1');
    expect(keys.next()).toEqual({ id: 'key_1', key: 'test-key-a' });
  });

  it('should rotate past a rate-limited key until its cooldown ends', () => {
    const keys = pool(['test-key-a', 'test-key-b']);
    keys.next();

    keys.markRateLimited('key_1');

    expect(keys.next()).toEqual({ id: 'key_2', key: 'test-key-b' });
    expect(keys.status()[0]).toEqual({
      id: 'key_1',
      state: 'rate_limited',
      rateLimitedUntil: '2026-01-01T00:01:00.000Z',
      requests: 1,
      failures: 1,
    });

    keys.markRateLimited('key_2');
    expect(keys.next()).toBeNull();

    now += 60_000;
    expect(keys.next()).toEqual({ id: 'key_1', key: 'test-key-a' });
    expect(keys.status()[0]).toMatchObject({ state: 'healthy', rateLimitedUntil: null });
  });

  it('should honor a shorter Retry-After', () => {
    const keys = pool(['test-key-a']);

    keys.markRateLimited('key_1', 5_000);
    now += 5_000;

    expect(keys.next()).toEqual({ id: 'key_1', key: 'test-key-a' });
  });

  it('should drop rejected keys until reset', () => {
    const keys = pool(['test-key-a', 'test-key-b']);

    keys.markInvalid('key_1');
    expect(keys.allRejected()).toBe(false);
    keys.markInvalid('key_2');

    expect(keys.allRejected()).toBe(true);
    expect(keys.next()).toBeNull();

    keys.reset();
    expect(keys.next()).toEqual({ id: 'key_1', key: 'test-key-a' });
  });

  it('should ignore unknown key ids', () => {
    const keys = pool(['test-key-a']);

    keys.markInvalid('key_9');
    keys.markRateLimited('key_9');

    expect(keys.status()).toEqual([
      { id: 'key_1', state: 'healthy', rateLimitedUntil: null, requests: 0, failures: 0 },
    ]);
  });

  it('should report an empty pool as not rejected', () => {
    expect(pool([]).allRejected()).toBe(false);
    expect(pool([]).next()).toBeNull();
  });
});
