/**
 * Webhook API Integration Tests
 */

import { Application } from 'express';
import request from 'supertest';
import { createApp } from '../../../backend/services/wallet/src/app';
import { TransactionStatus } from '../../../backend/services/wallet/src/types';
import { hmacHex } from '../../../backend/services/wallet/src/utils/crypto';
import { momoStatus } from '../../utils/fake-gateways';
import { balanceOf, createTestHarness, TestHarness } from '../../utils/test-harness';

const USER = 'user-ada';

describe('Webhook API Integration', () => {
  let h: TestHarness;
  let app: Application;

  beforeEach(() => {
    h = createTestHarness();
    h.seedAccount({ userId: USER, walletId: 'QRW-ADA1-2222-3333', balance: 1000 });
    h.seedRates();
    app = createApp(h.container);
  });

  describe('POST /gatewayWebhook', () => {
    let body: string;

    beforeEach(async () => {
      const { reference } = await h.container.deposits.initializeTransaction(h.ctx(USER), {
        email: 'ada@example.com',
        amount: 2500
      });
      body = JSON.stringify({
        event: 'charge.success',
        data: { reference, amount: 250000, currency: 'NGN', channel: 'card' }
      });
    });

    it('should verify the signature over the raw body and credit the wallet', async () => {
      const response = await request(app)
        .post('/gatewayWebhook')
        .set('Content-Type', 'application/json')
        .set('x-paystack-signature', hmacHex('sha512', 'test-paystack-secret', body))
        .send(body);

      expect(response.status).toBe(200);
      expect(response.text).toBe('Credited 2500 NGN');
      expect(await balanceOf(h.store, USER)).toBe(3500);
    });

    it('should reject a bad signature', async () => {
      const response = await request(app)
        .post('/gatewayWebhook')
        .set('Content-Type', 'application/json')
        .set('x-paystack-signature', hmacHex('sha512', 'wrong-secret', body))
        .send(body);

      expect(response.status).toBe(401);
      expect(response.text).toBe('Invalid signature');
      expect(await balanceOf(h.store, USER)).toBe(1000);
    });

    it('should answer 405 to other methods', async () => {
      const response = await request(app).get('/gatewayWebhook');

      expect(response.status).toBe(405);
      expect(response.text).toBe('Method Not Allowed');
    });

    it('should refuse to settle when the gateway cannot confirm the charge', async () => {
      h.paystack.verifyTransaction.mockRejectedValueOnce(new Error('ETIMEDOUT'));

      const response = await request(app)
        .post('/gatewayWebhook')
        .set('Content-Type', 'application/json')
        .set('x-paystack-signature', hmacHex('sha512', 'test-paystack-secret', body))
        .send(body);

      expect(response.status).toBe(502);
      expect(response.text).toBe('Unable to verify transaction status');
    });
  });

  describe('POST /momoWebhook', () => {
    let referenceId: string;
    let body: string;

    beforeEach(async () => {
      ({ referenceId } = await h.container.momo.momoRequestToPay(h.ctx(USER), {
        amount: 9,
        phoneNumber: '46733123453',
        idempotencyKey: 'momo-key-00000001'
      }));
      body = JSON.stringify({ externalId: referenceId, status: 'SUCCESSFUL', financialTransactionId: '555001' });
    });

    it('should settle a collection the provider confirms', async () => {
      h.momoGateway.getRequestToPayStatus.mockResolvedValueOnce(
        momoStatus(referenceId, TransactionStatus.COMPLETED, 'SUCCESSFUL')
      );

      const response = await request(app)
        .post('/momoWebhook')
        .query({ token: 'test-webhook-token' })
        .set('Content-Type', 'application/json')
        .send(body);

      expect(response.status).toBe(200);
      expect(response.text).toBe('MoMo transaction completed');
      expect(await balanceOf(h.store, USER)).toBe(16000);
    });

    it('should reject callbacks without the token', async () => {
      const response = await request(app)
        .post('/momoWebhook')
        .set('Content-Type', 'application/json')
        .send(body);

      expect(response.status).toBe(403);
      expect(response.text).toBe('Forbidden');
    });
  });
});
