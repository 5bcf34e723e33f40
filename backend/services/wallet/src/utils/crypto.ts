import crypto from 'crypto';
import { v4 as uuidv4 } from 'uuid';

const WALLET_ID_ALPHABET = 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789';

const randomGroup = (length: number): string => {
  let group = '';
  for (let i = 0; i < length; i++) {
    group += WALLET_ID_ALPHABET[crypto.randomInt(WALLET_ID_ALPHABET.length)];
  }
  return group;
};

// Public wallet identifier, e.g. QRW-7KQ2-MX9D-4HTP
export const generateWalletId = (): string =>
  `QRW-${randomGroup(4)}-${randomGroup(4)}-${randomGroup(4)}`;

export const WALLET_ID_PATTERN = /^QRW-[A-Z0-9]{4}-[A-Z0-9]{4}-[A-Z0-9]{4}$/;

export const generateTransactionId = (): string =>
  `TXN${Date.now()}${crypto.randomBytes(4).toString('hex').toUpperCase()}`;

export const generateReference = (prefix: 'WD' | 'DEP' | 'MOMO'): string =>
  `${prefix}_${Date.now()}_${uuidv4().replace(/-/g, '').slice(0, 12)}`;

export const generateUuid = (): string => uuidv4();

export const hashIp = (ip: string | undefined): string =>
  crypto.createHash('sha256').update(ip || 'unknown').digest('hex').substring(0, 16);

export const hmacHex = (algorithm: 'sha256' | 'sha512', secret: string, payload: string | Buffer): string =>
  crypto.createHmac(algorithm, secret).update(payload).digest('hex');

/**
 * Constant-time string comparison. Unequal lengths compare false without
 * reaching timingSafeEqual, which throws on them.
 */
export const safeCompare = (a: string, b: string): boolean => {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  if (left.length !== right.length) {
    return false;
  }
  return crypto.timingSafeEqual(left, right);
};
