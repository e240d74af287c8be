import { DEFAULT_SUPPORTED_DOMAINS } from '../config';
import {
  cacheKeyFor,
  extractShortCode,
  hostOf,
  isAbsoluteHttpUrl,
  isSupportedShareUrl,
  normalizeForCommercialApi,
  parseSurl,
  redactShareUrl,
} from '../helpers/shareUrl';

describe('shareUrl', () => {
  describe('isSupportedShareUrl', () => {
    it('should accept every configured mirror domain', () => {
      expect(isSupportedShareUrl('https://terabox.com/s/1abc', DEFAULT_SUPPORTED_DOMAINS)).toBe(true);
      expect(isSupportedShareUrl('https://www.1024tera.com/s/1abc', DEFAULT_SUPPORTED_DOMAINS)).toBe(true);
      expect(isSupportedShareUrl('https://terafileshare.com/s/1abc', DEFAULT_SUPPORTED_DOMAINS)).toBe(true);
    });

    it('should match domains case-insensitively', () => {
      expect(isSupportedShareUrl('HTTPS://WWW.TERABOX.APP/s/1abc', DEFAULT_SUPPORTED_DOMAINS)).toBe(true);
    });

    it('should reject other hosts, empty strings and non-strings', () => {
      expect(isSupportedShareUrl('https://example.com/s/1abc', DEFAULT_SUPPORTED_DOMAINS)).toBe(false);
      expect(isSupportedShareUrl('', DEFAULT_SUPPORTED_DOMAINS)).toBe(false);
      expect(isSupportedShareUrl('   ', DEFAULT_SUPPORTED_DOMAINS)).toBe(false);
      expect(isSupportedShareUrl(undefined, DEFAULT_SUPPORTED_DOMAINS)).toBe(false);
      expect(isSupportedShareUrl(42, DEFAULT_SUPPORTED_DOMAINS)).toBe(false);
    });
  });

  describe('parseSurl', () => {
    it('should read the surl parameter up to the next separator', () => {
      expect(parseSurl('https://www.terabox.com/sharing/link?surl=abc123&from=x')).toBe('abc123');
    });

    it('should return null when there is none', () => {
      expect(parseSurl('https://www.terabox.com/main')).toBeNull();
    });
  });

  describe('extractShortCode', () => {
    it('should prefer the surl query parameter', () => {
      expect(extractShortCode('https://www.terabox.app/sharing/link?surl=xyz_9')).toBe('xyz_9');
    });

    it('should drop the leading 1 of the path form', () => {
      expect(extractShortCode('https://terabox.com/s/1xyz_9')).toBe('xyz_9');
    });

    it('should keep a path code that does not start with 1', () => {
      expect(extractShortCode('https://terabox.com/s/xyz')).toBe('xyz');
    });

    it('should return null for URLs without a code', () => {
      expect(extractShortCode('https://www.terabox.com/web/share/init')).toBeNull();
    });
  });

  describe('cacheKeyFor', () => {
    it('should give every mirror form of a share the same key', () => {
      const keys = [
        'https://terabox.com/s/1abcDEF',
        'https://www.1024terabox.com/s/1abcDEF',
        'https://www.terabox.app/sharing/link?surl=abcDEF',
      ].map(cacheKeyFor);

      expect(keys).toEqual(['abcDEF', 'abcDEF', 'abcDEF']);
    });

    it('should fall back to a truncated md5 of the URL', () => {
      expect(cacheKeyFor('https://www.terabox.com/web/share/init')).toBe('hash_96fc72698f35');
    });
  });

  describe('normalizeForCommercialApi', () => {
    it('should leave URLs without a /s/ path alone', () => {
      const url = 'https://www.terabox.app/sharing/link?surl=abc';
      expect(normalizeForCommercialApi(url)).toBe(url);
    });

    it('should keep passthrough mirrors on their own domain', () => {
      expect(normalizeForCommercialApi('https://www.1024terabox.com/s/1abc?from=app')).toBe('https://1024terabox.com/s/1abc');
      expect(normalizeForCommercialApi('https://terasharelink.com/s/1abc')).toBe('https://terasharelink.com/s/1abc');
    });

    it('should rewrite other mirrors to the sharing link form', () => {
      expect(normalizeForCommercialApi('https://terabox.com/s/1abc')).toBe('https://www.terabox.app/sharing/link?surl=abc');
    });
  });

  describe('hostOf', () => {
    it('should return the host or the raw string', () => {
      expect(hostOf('https://www.terabox.com:8443/s/1abc')).toBe('www.terabox.com:8443');
      expect(hostOf('terabox.com/s/1abc')).toBe('terabox.com/s/1abc');
    });
  });

  describe('isAbsoluteHttpUrl', () => {
    it('should accept only absolute http(s) URLs', () => {
      expect(isAbsoluteHttpUrl('https://terabox.com/s/1abc')).toBe(true);
      expect(isAbsoluteHttpUrl('http://terabox.com/s/1abc')).toBe(true);
      expect(isAbsoluteHttpUrl('terabox.com/s/1abc')).toBe(false);
      expect(isAbsoluteHttpUrl('ftp://terabox.com/s/1abc')).toBe(false);
    });
  });

  describe('redactShareUrl', () => {
    it('should strip query and fragment', () => {
      expect(redactShareUrl('https://www.terabox.com/openapi/share/list?access_token=test-token#x')).toBe(
        'https://www.terabox.com/openapi/share/list',
      );
    });
  });
});
