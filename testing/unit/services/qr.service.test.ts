/**
 * QR Service Unit Tests
 */

import { hmacHex } from '../../../backend/services/wallet/src/utils/crypto';
import { ERROR_CODES } from '../../../backend/services/wallet/src/utils/errors';
import { createTestHarness, START_TIME, TestHarness } from '../../utils/test-harness';

const USER = 'user-ada';
const OTHER = 'user-bayo';
const QR_SECRET = 'test-qr-secret';
const FIFTEEN_MINUTES = 15 * 60 * 1000;

const sign = (payload: string) => ({ payload, signature: hmacHex('sha256', QR_SECRET, payload) });

describe('QrService', () => {
  let h: TestHarness;

  beforeEach(() => {
    h = createTestHarness();
    h.seedAccount({ userId: USER, fullName: 'Ada Obi', walletId: 'QRW-ADA1-2222-3333' });
    h.seedAccount({ userId: OTHER, walletId: 'QRW-BAYO-2222-3333' });
  });

  describe('signQrPayload', () => {
    it('should sign the exact payload it returns', async () => {
      const signed = await h.container.qr.signQrPayload(h.ctx(USER), {
        walletId: 'QRW-ADA1-2222-3333',
        amount: 2500,
        note: 'Lunch'
      });

      expect(signed.payload).toBe(
        JSON.stringify({
          walletId: 'QRW-ADA1-2222-3333',
          amount: 2500,
          note: 'Lunch',
          timestamp: START_TIME.getTime(),
          userId: USER
        })
      );
      expect(signed.signature).toBe(hmacHex('sha256', QR_SECRET, signed.payload));
      expect(signed.expiresAt).toBe(START_TIME.getTime() + FIFTEEN_MINUTES);
    });

    it('should refuse a wallet the caller does not own', async () => {
      await expect(
        h.container.qr.signQrPayload(h.ctx(USER), { walletId: 'QRW-BAYO-2222-3333' })
      ).rejects.toMatchObject({ code: ERROR_CODES.AUTH_PERMISSION_DENIED });
    });

    it('should refuse negative amounts', async () => {
      await expect(
        h.container.qr.signQrPayload(h.ctx(USER), { walletId: 'QRW-ADA1-2222-3333', amount: -5 })
      ).rejects.toMatchObject({ code: ERROR_CODES.TXN_AMOUNT_INVALID });
    });

    it('should fail when no signing secret is configured', async () => {
      const unconfigured = createTestHarness({ QR_SIGNING_SECRET: undefined });
      unconfigured.seedAccount({ userId: USER, walletId: 'QRW-ADA1-2222-3333' });

      await expect(
        unconfigured.container.qr.signQrPayload(unconfigured.ctx(USER), { walletId: 'QRW-ADA1-2222-3333' })
      ).rejects.toMatchObject({ code: ERROR_CODES.CONFIG_MISSING, details: { service: 'qr' } });
    });
  });

  describe('verifyQrSignature', () => {
    it('should resolve a fresh code to its recipient', async () => {
      const signed = await h.container.qr.signQrPayload(h.ctx(USER), {
        walletId: 'QRW-ADA1-2222-3333',
        amount: 2500,
        note: 'Lunch'
      });

      await expect(h.container.qr.verifyQrSignature(h.ctx(OTHER), signed)).resolves.toEqual({
        valid: true,
        walletId: 'QRW-ADA1-2222-3333',
        amount: 2500,
        note: 'Lunch',
        recipientName: 'Ada Obi',
        profilePhotoUrl: null
      });
    });

    it('should reject a tampered payload', async () => {
      const signed = await h.container.qr.signQrPayload(h.ctx(USER), { walletId: 'QRW-ADA1-2222-3333', amount: 10 });

      await expect(
        h.container.qr.verifyQrSignature(h.ctx(OTHER), {
          payload: signed.payload.replace('"amount":10', '"amount":10000'),
          signature: signed.signature
        })
      ).resolves.toEqual({ valid: false, reason: 'Invalid signature' });
    });

    it('should reject an expired code', async () => {
      const signed = await h.container.qr.signQrPayload(h.ctx(USER), { walletId: 'QRW-ADA1-2222-3333' });
      h.clock.advance(FIFTEEN_MINUTES + 1);

      await expect(h.container.qr.verifyQrSignature(h.ctx(OTHER), signed)).resolves.toEqual({
        valid: false,
        reason: 'QR code expired'
      });
    });

    it('should reject a signed payload that is not a QR payload', async () => {
      await expect(h.container.qr.verifyQrSignature(h.ctx(OTHER), sign('not json'))).resolves.toEqual({
        valid: false,
        reason: 'Invalid payload format'
      });
      await expect(
        h.container.qr.verifyQrSignature(h.ctx(OTHER), sign(JSON.stringify({ walletId: 'QRW-ADA1-2222-3333' })))
      ).resolves.toEqual({ valid: false, reason: 'Invalid payload format' });
    });

    it('should reject a code for a wallet that no longer exists', async () => {
      const payload = JSON.stringify({
        walletId: 'QRW-GONE-0000-0000',
        amount: 0,
        note: '',
        timestamp: START_TIME.getTime(),
        userId: 'user-gone'
      });

      await expect(h.container.qr.verifyQrSignature(h.ctx(OTHER), sign(payload))).resolves.toEqual({
        valid: false,
        reason: 'Wallet not found'
      });
    });

    it('should require both payload and signature', async () => {
      await expect(
        h.container.qr.verifyQrSignature(h.ctx(OTHER), { payload: '{}', signature: '' })
      ).rejects.toMatchObject({ code: ERROR_CODES.SYSTEM_VALIDATION_FAILED });
    });
  });
});
