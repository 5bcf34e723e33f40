/**
 * Transaction State Machine Unit Tests
 */

import {
  buildTransitionFields,
  canTransition,
  normalizeStatus,
  TransactionStateService
} from '../../../backend/services/wallet/src/services/transaction-state.service';
import { PaymentChannel, TransactionStatus } from '../../../backend/services/wallet/src/types';
import { AppError, ERROR_CODES } from '../../../backend/services/wallet/src/utils/errors';
import { MemoryDocumentStore } from '../../utils/memory-document-store';
import { START_TIME, TestClock } from '../../utils/test-harness';

describe('transaction state machine', () => {
  describe('canTransition', () => {
    it('should allow the documented edges', () => {
      expect(canTransition(TransactionStatus.CREATED, TransactionStatus.PENDING)).toBe(true);
      expect(canTransition(TransactionStatus.PENDING, TransactionStatus.PENDING_OTP)).toBe(true);
      expect(canTransition(TransactionStatus.PENDING_OTP, TransactionStatus.PROCESSING)).toBe(true);
      expect(canTransition(TransactionStatus.PROCESSING, TransactionStatus.COMPLETED)).toBe(true);
      expect(canTransition(TransactionStatus.COMPLETED, TransactionStatus.REFUNDED)).toBe(true);
      expect(canTransition(TransactionStatus.FAILED, TransactionStatus.PENDING)).toBe(true);
    });

    it('should reject everything else', () => {
      expect(canTransition(TransactionStatus.COMPLETED, TransactionStatus.FAILED)).toBe(false);
      expect(canTransition(TransactionStatus.PROCESSING, TransactionStatus.PENDING)).toBe(false);
      expect(canTransition(TransactionStatus.REFUNDED, TransactionStatus.PENDING)).toBe(false);
      expect(canTransition(TransactionStatus.CANCELLED, TransactionStatus.PENDING)).toBe(false);
    });
  });

  describe('normalizeStatus', () => {
    it('should treat a missing status as created', () => {
      expect(normalizeStatus(undefined)).toBe(TransactionStatus.CREATED);
      expect(normalizeStatus(null)).toBe(TransactionStatus.CREATED);
      expect(normalizeStatus('  ')).toBe(TransactionStatus.CREATED);
    });

    it('should map provider success words to completed', () => {
      expect(normalizeStatus('SUCCESSFUL')).toBe(TransactionStatus.COMPLETED);
      expect(normalizeStatus('success')).toBe(TransactionStatus.COMPLETED);
      expect(normalizeStatus('Pending')).toBe(TransactionStatus.PENDING);
      expect(normalizeStatus('bogus')).toBeUndefined();
    });
  });

  describe('buildTransitionFields', () => {
    it('should append to the history', () => {
      const at = new Date('2026-03-10T10:00:00.000Z');
      const fields = buildTransitionFields(
        TransactionStatus.PENDING,
        TransactionStatus.COMPLETED,
        'doc-1',
        [{ from: null, to: TransactionStatus.PENDING, timestamp: START_TIME }],
        at
      );

      expect(fields).toEqual({
        status: TransactionStatus.COMPLETED,
        previousStatus: TransactionStatus.PENDING,
        statusUpdatedAt: at,
        statusHistory: [
          { from: null, to: TransactionStatus.PENDING, timestamp: START_TIME },
          { from: TransactionStatus.PENDING, to: TransactionStatus.COMPLETED, timestamp: at }
        ]
      });
    });

    it('should explain why a terminal record cannot move', () => {
      expect(() =>
        buildTransitionFields(TransactionStatus.REFUNDED, TransactionStatus.COMPLETED, 'doc-1')
      ).toThrow('Transaction is in terminal state "refunded"');
      expect(() =>
        buildTransitionFields(TransactionStatus.COMPLETED, TransactionStatus.FAILED, 'doc-1')
      ).toThrow('Completed transactions can only be refunded');
    });
  });

  describe('TransactionStateService', () => {
    let store: MemoryDocumentStore;
    let service: TransactionStateService;

    beforeEach(() => {
      store = new MemoryDocumentStore();
      service = new TransactionStateService(store, new TestClock().now);
      store.seed('payments', {
        id: 'DEP_1',
        reference: 'DEP_1',
        userId: 'user-1',
        walletId: 'QRW-AAAA-BBBB-CCCC',
        amount: 100,
        currency: 'NGN',
        channel: PaymentChannel.CARD,
        processed: false,
        createdAt: START_TIME,
        updatedAt: START_TIME,
        status: TransactionStatus.PENDING,
        previousStatus: null,
        statusUpdatedAt: START_TIME,
        statusHistory: [{ from: null, to: TransactionStatus.PENDING, timestamp: START_TIME }]
      });
    });

    it('should persist a valid transition with extra fields', async () => {
      await service.updateTransactionState('payments', 'DEP_1', TransactionStatus.FAILED, { updatedAt: START_TIME });

      const payment = await store.get('payments', 'DEP_1');
      expect(payment?.status).toBe(TransactionStatus.FAILED);
      expect(payment?.previousStatus).toBe(TransactionStatus.PENDING);
      expect(payment?.statusHistory).toHaveLength(2);
    });

    it('should leave the record untouched on an invalid transition', async () => {
      await service.updateTransactionState('payments', 'DEP_1', TransactionStatus.COMPLETED);

      const attempt = service.updateTransactionState('payments', 'DEP_1', TransactionStatus.FAILED);
      await expect(attempt).rejects.toBeInstanceOf(AppError);
      await expect(attempt).rejects.toMatchObject({ code: ERROR_CODES.TXN_INVALID_STATE });

      const payment = await store.get('payments', 'DEP_1');
      expect(payment?.status).toBe(TransactionStatus.COMPLETED);
      expect(payment?.statusHistory).toHaveLength(2);
    });

    it('should report unknown records as not found', async () => {
      await expect(
        service.updateTransactionState('withdrawals', 'WD_missing', TransactionStatus.FAILED)
      ).rejects.toMatchObject({ code: ERROR_CODES.TXN_NOT_FOUND });
    });
  });
});
