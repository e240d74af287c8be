import { z } from 'zod';
import { checkCookieFormat } from '../helpers/credentials';
import { errorMessage, Logger } from '../helpers/logger';
import type { HttpTransport } from '../transport/httpTransport';
import type { CredentialCheck } from '../types';

const log = new Logger('cookie-check');

const HOME_URL = 'https://www.terabox.com/';
const USER_INFO_URL = 'https://www.terabox.com/api/user/info';
const FILES_URL = 'https://www.terabox.com/main';

const LOGGED_IN_MARKERS = ['logout', 'profile', 'dashboard', 'my files'];
const LOGGED_OUT_MARKERS = ['login', 'sign in', 'register'];

const userInfoSchema = z.object({ errno: z.number() });

function countMarkers(text: string, markers: readonly string[]): number {
  return markers.filter(marker => text.includes(marker)).length;
}

/**
 * Checks a TeraBox session cookie against the live site. The cookie's
 * shape is checked first; then the home page, the user-info API and the
 * file manager are tried in turn, and the first definite answer wins.
 */
export class CookieValidator {
  constructor(private readonly transport: HttpTransport) {}

  async validate(cookie: string): Promise<CredentialCheck> {
    const format = checkCookieFormat(cookie);
    if (format.status === 'invalid') return format;

    const checks = [
      () => this.checkHomePage(cookie),
      () => this.checkUserInfo(cookie),
      () => this.checkFilesPage(cookie),
    ];

    let lastError = 'Unknown error';
    for (const check of checks) {
      try {
        const result = await check();
        if (result.status !== 'invalid') return result;
        lastError = result.message;
      } catch (err) {
        lastError = errorMessage(err);
        log.debug('Cookie check step failed', { error: lastError });
      }
    }
    return { status: 'invalid', message: `Cookie validation failed: ${lastError}` };
  }

  private async checkHomePage(cookie: string): Promise<CredentialCheck> {
    const res = await this.transport.get(HOME_URL, { cookies: cookie, allowErrorStatus: true });
    if (res.status !== 200) {
      return { status: 'invalid', message: `HTTP ${res.status}: server rejected request` };
    }

    const page = res.body.toLowerCase();
    return countMarkers(page, LOGGED_IN_MARKERS) > countMarkers(page, LOGGED_OUT_MARKERS)
      ? { status: 'valid', message: 'Cookie appears to be valid (logged in)' }
      : { status: 'warning', message: 'Cookie may not be fully authenticated' };
  }

  private async checkUserInfo(cookie: string): Promise<CredentialCheck> {
    const res = await this.transport.get(USER_INFO_URL, { cookies: cookie, allowErrorStatus: true });
    if (res.status === 401) {
      return { status: 'invalid', message: 'Cookie is invalid or expired' };
    }
    if (res.status !== 200) {
      return { status: 'warning', message: `API returned HTTP ${res.status}` };
    }

    let body: unknown;
    try {
      body = res.json();
    } catch {
      return { status: 'warning', message: 'API response was not JSON, but request succeeded' };
    }
    const parsed = userInfoSchema.safeParse(body);
    return parsed.success && parsed.data.errno === 0
      ? { status: 'valid', message: 'Cookie validated via API' }
      : { status: 'warning', message: 'API returned an error, cookie may be invalid' };
  }

  private async checkFilesPage(cookie: string): Promise<CredentialCheck> {
    const res = await this.transport.get(FILES_URL, { cookies: cookie, allowErrorStatus: true });
    if (res.status !== 200) {
      return { status: 'invalid', message: `HTTP ${res.status}: access denied` };
    }

    const landed = res.url.toLowerCase();
    return landed.includes('login') || landed.includes('signin')
      ? { status: 'invalid', message: 'Cookie is invalid: redirected to login' }
      : { status: 'valid', message: 'Cookie allows access to main page' };
  }
}
