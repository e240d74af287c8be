import { Agent } from 'undici';

export type TransportProfile = 'standard' | 'browser';

/** Cipher order of a desktop Chrome ClientHello. */
const CHROME_CIPHERS = [
  'TLS_AES_128_GCM_SHA256',
  'TLS_AES_256_GCM_SHA384',
  'TLS_CHACHA20_POLY1305_SHA256',
  'ECDHE-ECDSA-AES128-GCM-SHA256',
  'ECDHE-RSA-AES128-GCM-SHA256',
  'ECDHE-ECDSA-AES256-GCM-SHA384',
  'ECDHE-RSA-AES256-GCM-SHA384',
  'ECDHE-ECDSA-CHACHA20-POLY1305',
  'ECDHE-RSA-CHACHA20-POLY1305',
  'ECDHE-RSA-AES128-SHA',
  'ECDHE-RSA-AES256-SHA',
  'AES128-GCM-SHA256',
  'AES256-GCM-SHA384',
  'AES128-SHA',
  'AES256-SHA',
].join(':');

const BASE_HEADERS: Record<string, string> = {
  accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,image/apng,*/*;q=0.8',
  'accept-language': 'en-US,en;q=0.9',
  'cache-control': 'no-cache',
  pragma: 'no-cache',
  'sec-fetch-dest': 'document',
  'sec-fetch-mode': 'navigate',
  'sec-fetch-site': 'none',
  'sec-fetch-user': '?1',
  'upgrade-insecure-requests': '1',
};

const CLIENT_HINT_HEADERS: Record<string, string> = {
  'sec-ch-ua': '"Chromium";v="120", "Google Chrome";v="120", "Not?A_Brand";v="99"',
  'sec-ch-ua-mobile': '?0',
  'sec-ch-ua-platform': '"Windows"',
};

export function defaultHeaders(profile: TransportProfile): Record<string, string> {
  return profile === 'browser' ? { ...BASE_HEADERS, ...CLIENT_HINT_HEADERS } : { ...BASE_HEADERS };
}

export interface AgentTimeouts {
  connectTimeoutMs: number;
  requestTimeoutMs: number;
}

export function createAgent(profile: TransportProfile, timeouts: AgentTimeouts): Agent {
  return new Agent({
    keepAliveTimeout: 10_000,
    headersTimeout: timeouts.requestTimeoutMs,
    bodyTimeout: timeouts.requestTimeoutMs,
    connect: profile === 'browser'
      ? { timeout: timeouts.connectTimeoutMs, ciphers: CHROME_CIPHERS }
      : { timeout: timeouts.connectTimeoutMs },
  });
}

const CHALLENGE_MARKERS = ['cf-chl', 'challenge-platform', 'Just a moment...', 'Attention Required!'];

/**
 * Anti-bot interstitials are served as 403/503 HTML pages and usually clear
 * after a short wait.
 */
export function isBotChallenge(status: number, body: string): boolean {
  if (status !== 403 && status !== 503) return false;
  return CHALLENGE_MARKERS.some(marker => body.includes(marker));
}
