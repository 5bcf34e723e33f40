/**
 * Idempotency Service Unit Tests
 */

import Joi from 'joi';
import { IdempotencyService } from '../../../backend/services/wallet/src/services/idempotency.service';
import { IdempotencyStatus } from '../../../backend/services/wallet/src/types';
import { ERROR_CODES } from '../../../backend/services/wallet/src/utils/errors';
import { MemoryDocumentStore } from '../../utils/memory-document-store';
import { TestClock } from '../../utils/test-harness';

interface Outcome {
  value: number;
}

const outcomeSchema = Joi.object<Outcome>({ value: Joi.number().required() });

const KEY = 'idem-key-0000000001';
const DAY = 24 * 60 * 60 * 1000;

describe('IdempotencyService', () => {
  let store: MemoryDocumentStore;
  let clock: TestClock;
  let service: IdempotencyService;

  beforeEach(() => {
    store = new MemoryDocumentStore();
    clock = new TestClock();
    service = new IdempotencyService(store, clock.now, DAY);
  });

  it('should reject missing or short keys', async () => {
    const operation = jest.fn(async () => ({ value: 1 }));

    await expect(
      service.withIdempotency(undefined, 'sendMoney', 'user-1', outcomeSchema, operation)
    ).rejects.toMatchObject({ code: ERROR_CODES.SYSTEM_VALIDATION_FAILED });
    await expect(
      service.withIdempotency('short-key', 'sendMoney', 'user-1', outcomeSchema, operation)
    ).rejects.toMatchObject({ code: ERROR_CODES.SYSTEM_VALIDATION_FAILED });
    expect(operation).not.toHaveBeenCalled();
  });

  it('should run once and replay the cached result', async () => {
    const operation = jest.fn(async () => ({ value: 7 }));

    const first = await service.withIdempotency(KEY, 'sendMoney', 'user-1', outcomeSchema, operation);
    const second = await service.withIdempotency(KEY, 'sendMoney', 'user-1', outcomeSchema, operation);

    expect(first).toEqual({ value: 7 });
    expect(second).toEqual({ value: 7, idempotentReplay: true });
    expect(operation).toHaveBeenCalledTimes(1);

    const record = await store.get('idempotency_keys', KEY);
    expect(record?.status).toBe(IdempotencyStatus.COMPLETED);
    expect(record?.expiresAt).toEqual(new Date(clock.now().getTime() + DAY));
  });

  it('should refuse a key owned by another user', async () => {
    await service.withIdempotency(KEY, 'sendMoney', 'user-1', outcomeSchema, async () => ({ value: 1 }));

    const operation = jest.fn(async () => ({ value: 2 }));
    await expect(
      service.withIdempotency(KEY, 'sendMoney', 'user-2', outcomeSchema, operation)
    ).rejects.toMatchObject({ code: ERROR_CODES.AUTH_PERMISSION_DENIED });
    expect(operation).not.toHaveBeenCalled();
  });

  it('should refuse a key reused for another operation', async () => {
    await service.withIdempotency(KEY, 'sendMoney', 'user-1', outcomeSchema, async () => ({ value: 1 }));

    await expect(
      service.withIdempotency(KEY, 'initiateWithdrawal', 'user-1', outcomeSchema, async () => ({ value: 2 }))
    ).rejects.toMatchObject({ code: ERROR_CODES.SYSTEM_VALIDATION_FAILED });
  });

  it('should reject a key whose first run is still in flight', async () => {
    store.seed('idempotency_keys', {
      id: KEY,
      userId: 'user-1',
      operation: 'sendMoney',
      status: IdempotencyStatus.PENDING,
      createdAt: clock.now(),
      expiresAt: new Date(clock.now().getTime() + DAY)
    });

    await expect(
      service.withIdempotency(KEY, 'sendMoney', 'user-1', outcomeSchema, async () => ({ value: 1 }))
    ).rejects.toMatchObject({ code: ERROR_CODES.TXN_DUPLICATE_REQUEST });
  });

  it('should allow a retry after a failure', async () => {
    await expect(
      service.withIdempotency(KEY, 'sendMoney', 'user-1', outcomeSchema, async () => {
        throw new Error('gateway down');
      })
    ).rejects.toThrow('gateway down');

    const failed = await store.get('idempotency_keys', KEY);
    expect(failed?.status).toBe(IdempotencyStatus.FAILED);
    expect(failed?.error).toBe('gateway down');

    const retried = await service.withIdempotency(KEY, 'sendMoney', 'user-1', outcomeSchema, async () => ({
      value: 3
    }));
    expect(retried).toEqual({ value: 3 });
    expect((await store.get('idempotency_keys', KEY))?.status).toBe(IdempotencyStatus.COMPLETED);
  });

  it('should treat an expired key as new', async () => {
    await service.withIdempotency(KEY, 'sendMoney', 'user-1', outcomeSchema, async () => ({ value: 1 }));
    clock.advance(DAY + 1);

    const operation = jest.fn(async () => ({ value: 9 }));
    const result = await service.withIdempotency(KEY, 'sendMoney', 'user-2', outcomeSchema, operation);

    expect(result).toEqual({ value: 9 });
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should return the result even when recording it fails', async () => {
    store.failNext('idempotency_keys', 'update');

    const result = await service.withIdempotency(KEY, 'sendMoney', 'user-1', outcomeSchema, async () => ({
      value: 5
    }));

    expect(result).toEqual({ value: 5 });
    expect((await store.get('idempotency_keys', KEY))?.status).toBe(IdempotencyStatus.PENDING);
  });

  it('should delete expired keys on cleanup', async () => {
    await service.withIdempotency(KEY, 'sendMoney', 'user-1', outcomeSchema, async () => ({ value: 1 }));
    expect(await service.cleanupExpired()).toBe(0);

    clock.advance(DAY + 1);
    expect(await service.cleanupExpired()).toBe(1);
    expect(await store.get('idempotency_keys', KEY)).toBeNull();
  });
});
