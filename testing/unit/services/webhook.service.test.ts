/**
 * Webhook Service Unit Tests
 */

import { WebhookOptions, WebhookRequest, WebhookService } from '../../../backend/services/wallet/src/services/webhook.service';
import { TransactionStatus } from '../../../backend/services/wallet/src/types';
import { hmacHex } from '../../../backend/services/wallet/src/utils/crypto';
import { logger } from '../../../backend/services/wallet/src/utils/logger';
import { gatewayResult, momoStatus } from '../../utils/fake-gateways';
import { balanceOf, createTestHarness, TestHarness } from '../../utils/test-harness';

const USER = 'user-ada';
const PAYSTACK_SECRET = 'test-paystack-secret';
const WEBHOOK_TOKEN = 'test-webhook-token';

const paystackRequest = (body: unknown, overrides: Partial<WebhookRequest> = {}): WebhookRequest => {
  const rawBody = typeof body === 'string' ? body : JSON.stringify(body);
  return {
    method: 'POST',
    rawBody: Buffer.from(rawBody),
    headers: { 'x-paystack-signature': hmacHex('sha512', PAYSTACK_SECRET, rawBody) },
    query: {},
    ...overrides
  };
};

const momoRequest = (body: unknown, query: Record<string, unknown> = { token: WEBHOOK_TOKEN }): WebhookRequest => ({
  method: 'POST',
  rawBody: Buffer.from(typeof body === 'string' ? body : JSON.stringify(body)),
  headers: {},
  query
});

describe('WebhookService', () => {
  let h: TestHarness;

  beforeEach(() => {
    h = createTestHarness();
    h.seedAccount({ userId: USER, walletId: 'QRW-ADA1-2222-3333', balance: 10000 });
    h.seedRates();
  });

  describe('handlePaystackWebhook', () => {
    let reference: string;
    const chargeSuccess = () => ({
      event: 'charge.success',
      data: { reference, amount: 500000, currency: 'NGN', channel: 'card' }
    });

    beforeEach(async () => {
      ({ reference } = await h.container.deposits.initializeTransaction(h.ctx(USER), {
        email: 'ada@example.com',
        amount: 5000
      }));
    });

    it('should credit a verified charge once', async () => {
      const first = await h.container.webhooks.handlePaystackWebhook(paystackRequest(chargeSuccess()));
      const replay = await h.container.webhooks.handlePaystackWebhook(paystackRequest(chargeSuccess()));

      expect(first).toEqual({ kind: 'processed', httpStatus: 200, message: 'Credited 5000 NGN' });
      expect(replay).toEqual({ kind: 'ignored', httpStatus: 200, message: 'Payment already processed' });
      expect(h.paystack.verifyTransaction).toHaveBeenCalledWith(reference);
      expect(await balanceOf(h.store, USER)).toBe(15000);
    });

    it('should trust the gateway over the event body', async () => {
      h.paystack.verifyTransaction.mockResolvedValueOnce(
        gatewayResult(reference, TransactionStatus.FAILED, 'abandoned')
      );

      await expect(h.container.webhooks.handlePaystackWebhook(paystackRequest(chargeSuccess()))).resolves.toEqual({
        kind: 'ignored',
        httpStatus: 200,
        message: 'Charge not successful: abandoned'
      });
      expect(await balanceOf(h.store, USER)).toBe(10000);
    });

    it('should reject other methods', async () => {
      await expect(
        h.container.webhooks.handlePaystackWebhook(paystackRequest(chargeSuccess(), { method: 'GET' }))
      ).resolves.toMatchObject({ kind: 'rejected', httpStatus: 405 });
    });

    it('should reject missing and invalid signatures', async () => {
      await expect(
        h.container.webhooks.handlePaystackWebhook(paystackRequest(chargeSuccess(), { headers: {} }))
      ).resolves.toEqual({ kind: 'rejected', httpStatus: 401, message: 'Missing signature' });

      await expect(
        h.container.webhooks.handlePaystackWebhook(
          paystackRequest(chargeSuccess(), { headers: { 'x-paystack-signature': 'deadbeef' } })
        )
      ).resolves.toEqual({ kind: 'rejected', httpStatus: 401, message: 'Invalid signature' });
      expect(await balanceOf(h.store, USER)).toBe(10000);
    });

    it('should reject a signed body that is not an event', async () => {
      await expect(h.container.webhooks.handlePaystackWebhook(paystackRequest('not json'))).resolves.toEqual({
        kind: 'rejected',
        httpStatus: 400,
        message: 'Bad Request'
      });
    });

    it('should acknowledge events it does not handle', async () => {
      await expect(
        h.container.webhooks.handlePaystackWebhook(
          paystackRequest({ event: 'subscription.create', data: { reference: 'SUB_1' } })
        )
      ).resolves.toEqual({ kind: 'ignored', httpStatus: 200, message: 'Unhandled event subscription.create' });
    });

    it('should reject references it never created', async () => {
      await expect(
        h.container.webhooks.handlePaystackWebhook(
          paystackRequest({ event: 'charge.success', data: { reference: 'DEP_forged' } })
        )
      ).resolves.toEqual({ kind: 'rejected', httpStatus: 404, message: 'Transaction not found' });
      expect(h.paystack.verifyTransaction).not.toHaveBeenCalled();
    });

    it('should refuse to act when verification is required and unavailable', async () => {
      h.paystack.verifyTransaction.mockRejectedValueOnce(new Error('ETIMEDOUT'));

      await expect(h.container.webhooks.handlePaystackWebhook(paystackRequest(chargeSuccess()))).resolves.toEqual({
        kind: 'rejected',
        httpStatus: 502,
        message: 'Unable to verify transaction status'
      });
      expect(await balanceOf(h.store, USER)).toBe(10000);
    });

    it('should ask for a retry when settlement fails', async () => {
      h.paystack.verifyTransaction.mockResolvedValueOnce(
        gatewayResult(reference, TransactionStatus.COMPLETED, 'success', { amount: 10, currency: 'ZAR' })
      );

      await expect(h.container.webhooks.handlePaystackWebhook(paystackRequest(chargeSuccess()))).resolves.toEqual({
        kind: 'retry',
        httpStatus: 500,
        message: 'Error processing webhook'
      });
      expect((await h.store.get('payments', reference))?.processed).toBe(false);
    });

    it('should answer 503 without a secret key', async () => {
      const unconfigured = createTestHarness({ PAYSTACK_SECRET_KEY: undefined });

      await expect(
        unconfigured.container.webhooks.handlePaystackWebhook(paystackRequest(chargeSuccess()))
      ).resolves.toMatchObject({ kind: 'rejected', httpStatus: 503 });
    });
  });

  describe('transfer events', () => {
    let reference: string;
    const transferEvent = (event: string) => ({
      event,
      data: { reference, transfer_code: 'TRF_test_transfer', reason: 'Account closed' }
    });

    beforeEach(async () => {
      ({ reference } = await h.container.withdrawals.initiateWithdrawal(h.ctx(USER), {
        amount: 1000,
        bankCode: '058',
        accountNumber: '0123456789',
        accountName: 'Ada Obi',
        idempotencyKey: 'withdraw-key-000001'
      }));
    });

    it('should complete a verified transfer and ignore the replay', async () => {
      const first = await h.container.webhooks.handlePaystackWebhook(paystackRequest(transferEvent('transfer.success')));
      const replay = await h.container.webhooks.handlePaystackWebhook(paystackRequest(transferEvent('transfer.success')));

      expect(first).toEqual({ kind: 'processed', httpStatus: 200, message: 'Withdrawal completed' });
      expect(replay).toEqual({
        kind: 'ignored',
        httpStatus: 200,
        message: 'Completed transactions can only be refunded'
      });
      expect(h.paystack.fetchTransfer).toHaveBeenCalledWith(reference);
      expect(await balanceOf(h.store, USER)).toBe(9000);
    });

    it('should refund a failed transfer once', async () => {
      h.paystack.fetchTransfer.mockResolvedValue(gatewayResult(reference, TransactionStatus.FAILED, 'failed'));

      const first = await h.container.webhooks.handlePaystackWebhook(paystackRequest(transferEvent('transfer.failed')));
      const replay = await h.container.webhooks.handlePaystackWebhook(paystackRequest(transferEvent('transfer.failed')));

      expect(first).toEqual({ kind: 'processed', httpStatus: 200, message: 'Withdrawal failed and refunded' });
      expect(replay).toEqual({ kind: 'ignored', httpStatus: 200, message: 'Withdrawal already refunded' });
      expect(await balanceOf(h.store, USER)).toBe(10000);
      expect((await h.store.get('withdrawals', reference))?.failureReason).toBe('Account closed');
    });

    it('should follow the gateway when it contradicts the event', async () => {
      const warn = jest.spyOn(logger, 'warn');

      const result = await h.container.webhooks.handlePaystackWebhook(paystackRequest(transferEvent('transfer.failed')));

      expect(result).toEqual({ kind: 'processed', httpStatus: 200, message: 'Withdrawal completed' });
      expect(await balanceOf(h.store, USER)).toBe(9000);
      expect(warn).toHaveBeenCalledWith('Transfer event status differs from gateway', {
        reference,
        event: TransactionStatus.FAILED,
        gateway: 'success'
      });
      warn.mockRestore();
    });

    it('should fall back to the event when verification is optional', async () => {
      const relaxed = createTestHarness({ WEBHOOK_REQUIRE_CROSS_VERIFICATION: 'false' });
      relaxed.seedAccount({ userId: USER, walletId: 'QRW-ADA1-2222-3333', balance: 10000 });
      const withdrawal = await relaxed.container.withdrawals.initiateWithdrawal(relaxed.ctx(USER), {
        amount: 1000,
        bankCode: '058',
        accountNumber: '0123456789',
        accountName: 'Ada Obi',
        idempotencyKey: 'withdraw-key-000001'
      });
      relaxed.paystack.fetchTransfer.mockRejectedValueOnce(new Error('ETIMEDOUT'));

      const result = await relaxed.container.webhooks.handlePaystackWebhook(
        paystackRequest({ event: 'transfer.reversed', data: { reference: withdrawal.reference } })
      );

      expect(result).toEqual({ kind: 'processed', httpStatus: 200, message: 'Withdrawal failed and refunded' });
      expect((await relaxed.store.get('withdrawals', withdrawal.reference))?.failureReason).toBe('Transfer failed');
    });
  });

  describe('handleMomoWebhook', () => {
    let referenceId: string;
    const callback = () => ({ externalId: referenceId, status: 'SUCCESSFUL', financialTransactionId: '555001' });

    beforeEach(async () => {
      ({ referenceId } = await h.container.momo.momoRequestToPay(h.ctx(USER), {
        amount: 9,
        phoneNumber: '46733123453',
        idempotencyKey: 'momo-key-00000001'
      }));
    });

    it('should credit a collection the provider confirms', async () => {
      h.momoGateway.getRequestToPayStatus.mockResolvedValue(
        momoStatus(referenceId, TransactionStatus.COMPLETED, 'SUCCESSFUL')
      );

      const first = await h.container.webhooks.handleMomoWebhook(momoRequest(callback()));
      const replay = await h.container.webhooks.handleMomoWebhook(momoRequest(callback()));

      expect(first).toEqual({ kind: 'processed', httpStatus: 200, message: 'MoMo transaction completed' });
      expect(replay).toEqual({ kind: 'ignored', httpStatus: 200, message: 'No action for status SUCCESSFUL' });
      expect(await balanceOf(h.store, USER)).toBe(25000);
      expect(await h.store.get('momo_transactions', referenceId)).toMatchObject({
        callbackStatus: 'SUCCESSFUL',
        verifiedStatus: 'SUCCESSFUL',
        financialTransactionId: '555001'
      });
    });

    it('should record the provider\'s financial transaction id over the callback\'s', async () => {
      h.momoGateway.getRequestToPayStatus.mockResolvedValueOnce(
        momoStatus(referenceId, TransactionStatus.COMPLETED, 'SUCCESSFUL', { financialTransactionId: '777002' })
      );

      await h.container.webhooks.handleMomoWebhook(momoRequest(callback()));

      expect((await h.store.get('momo_transactions', referenceId))?.financialTransactionId).toBe('777002');
    });

    it('should not credit when the provider still reports pending', async () => {
      await expect(h.container.webhooks.handleMomoWebhook(momoRequest(callback()))).resolves.toEqual({
        kind: 'ignored',
        httpStatus: 200,
        message: 'No action for status PENDING'
      });
      expect(await balanceOf(h.store, USER)).toBe(10000);
    });

    it('should reject a missing or wrong token', async () => {
      await expect(h.container.webhooks.handleMomoWebhook(momoRequest(callback(), {}))).resolves.toEqual({
        kind: 'rejected',
        httpStatus: 403,
        message: 'Forbidden'
      });
      await expect(
        h.container.webhooks.handleMomoWebhook(momoRequest(callback(), { token: 'wrong-token' }))
      ).resolves.toMatchObject({ httpStatus: 403 });
    });

    it('should reject malformed and unknown callbacks', async () => {
      await expect(h.container.webhooks.handleMomoWebhook(momoRequest({ status: 'SUCCESSFUL' }))).resolves.toMatchObject({
        kind: 'rejected',
        httpStatus: 400
      });
      await expect(
        h.container.webhooks.handleMomoWebhook(momoRequest({ externalId: 'unknown-ref', status: 'SUCCESSFUL' }))
      ).resolves.toMatchObject({ kind: 'rejected', httpStatus: 404 });
    });

    describe('with explicit options', () => {
      const serviceWith = (options: Partial<WebhookOptions>) =>
        new WebhookService(h.store, h.paystack, h.container.deposits, h.container.withdrawals, h.container.momo, {
          momoEnvironment: 'sandbox',
          requireCrossVerification: true,
          ...options
        });

      it('should refuse callbacks in production without a token', async () => {
        const service = serviceWith({ momoEnvironment: 'production' });

        await expect(service.handleMomoWebhook(momoRequest(callback(), {}))).resolves.toEqual({
          kind: 'rejected',
          httpStatus: 503,
          message: 'Service misconfigured'
        });
      });

      it('should check the callback signature when a signing secret is set', async () => {
        const service = serviceWith({ momoSigningSecret: 'test-momo-signing', momoWebhookToken: WEBHOOK_TOKEN });
        const unsigned = momoRequest(callback());
        const rawBody = unsigned.rawBody.toString();

        await expect(service.handleMomoWebhook(unsigned)).resolves.toMatchObject({ httpStatus: 401 });
        await expect(
          service.handleMomoWebhook({
            ...unsigned,
            headers: { 'x-momo-signature': hmacHex('sha256', 'test-momo-signing', rawBody) }
          })
        ).resolves.toEqual({ kind: 'ignored', httpStatus: 200, message: 'No action for status PENDING' });
      });

      it('should refuse to settle when the provider cannot be reached', async () => {
        h.momoGateway.getRequestToPayStatus.mockRejectedValueOnce(new Error('ETIMEDOUT'));
        const service = serviceWith({ momoWebhookToken: WEBHOOK_TOKEN });

        await expect(service.handleMomoWebhook(momoRequest(callback()))).resolves.toMatchObject({
          kind: 'rejected',
          httpStatus: 502
        });
        expect(await balanceOf(h.store, USER)).toBe(10000);
      });
    });
  });
});
