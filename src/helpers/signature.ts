import crypto from 'crypto';

export function md5Hex(value: string): string {
  return crypto.createHash('md5').update(value).digest('hex');
}

/**
 * Request signature for the Open Platform:
 * `md5(clientId_timestamp_clientSecret_privateSecret)`.
 */
export function signRequest(
  clientId: string,
  timestamp: number,
  clientSecret: string,
  privateSecret: string,
): string {
  return md5Hex(`${clientId}_${timestamp}_${clientSecret}_${privateSecret}`);
}
