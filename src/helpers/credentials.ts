import type { CredentialCheck } from '../types';

const API_KEY_LENGTH = 50;
const API_KEY_PATTERN = /^[a-z0-9]+msh[a-z0-9]+jsn[a-z0-9]+$/i;

const CORE_COOKIES = ['ndus', 'BDUSS', 'STOKEN'];
const SIDE_COOKIES = ['__bid_n', '__stripe_mid', 'sessionid'];

/**
 * Offline shape check of a marketplace API key: 50 alphanumerics carrying
 * the `msh` and `jsn` markers in that order.
 */
export function checkApiKeyFormat(apiKey: string): CredentialCheck {
  const key = apiKey.trim();
  if (!key) {
    return { status: 'invalid', message: 'API key must be a non-empty string' };
  }
  if (key.length !== API_KEY_LENGTH) {
    return {
      status: 'invalid',
      message: `Invalid API key length. Expected ${API_KEY_LENGTH} characters, got ${key.length}`,
    };
  }

  const badChars = [...new Set(key.replace(/[a-z0-9]/gi, ''))].sort();
  if (badChars.length > 0) {
    return { status: 'invalid', message: `API key contains invalid characters: ${badChars.join(', ')}` };
  }

  const lower = key.toLowerCase();
  for (const marker of ['msh', 'jsn']) {
    if (!lower.includes(marker)) {
      return { status: 'invalid', message: `API key missing "${marker}" marker` };
    }
  }
  if (!API_KEY_PATTERN.test(key)) {
    return { status: 'invalid', message: 'Invalid API key format. Expected "msh" before "jsn"' };
  }
  return { status: 'valid', message: 'API key format is valid' };
}

/** Names of the `name=value` pairs in a Cookie header. */
export function cookieNames(cookie: string): string[] {
  return cookie
    .split(';')
    .map(pair => pair.split('=', 1)[0].trim())
    .filter(Boolean);
}

/** Offline check that a Cookie header carries a TeraBox session. */
export function checkCookieFormat(cookie: string): CredentialCheck {
  if (cookie.trim().length < 10) {
    return { status: 'invalid', message: 'Cookie is too short or empty' };
  }

  const names = new Set(cookieNames(cookie));
  const core = CORE_COOKIES.filter(name => names.has(name));
  if (core.length > 0) {
    return { status: 'valid', message: `Cookie format looks valid (found: ${core.join(', ')})` };
  }

  const side = SIDE_COOKIES.filter(name => names.has(name));
  if (side.length > 0) {
    return { status: 'warning', message: `Cookie contains ${side.join(', ')} but missing core TeraBox cookies` };
  }
  return { status: 'invalid', message: 'Cookie does not contain any recognized TeraBox cookies' };
}
