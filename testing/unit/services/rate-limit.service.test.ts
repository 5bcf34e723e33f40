/**
 * Rate Limit Service Unit Tests
 */

import { RATE_LIMITS, RateLimitService } from '../../../backend/services/wallet/src/services/rate-limit.service';
import { ERROR_CODES } from '../../../backend/services/wallet/src/utils/errors';
import { MemoryDocumentStore } from '../../utils/memory-document-store';
import { TestClock } from '../../utils/test-harness';

const HOUR = 60 * 60 * 1000;

describe('RateLimitService', () => {
  let store: MemoryDocumentStore;
  let clock: TestClock;
  let service: RateLimitService;

  beforeEach(() => {
    store = new MemoryDocumentStore();
    clock = new TestClock();
    service = new RateLimitService(store, clock.now);
  });

  it('should allow five withdrawals an hour and refuse the sixth', async () => {
    for (let i = 0; i < 5; i++) {
      await service.enforceRateLimit('user-1', 'initiateWithdrawal');
    }

    await expect(service.enforceRateLimit('user-1', 'initiateWithdrawal')).rejects.toMatchObject({
      code: ERROR_CODES.RATE_LIMIT_EXCEEDED,
      message: RATE_LIMITS.initiateWithdrawal.message
    });

    const window = await store.get('rate_limits', 'user-1_initiateWithdrawal');
    expect(window?.timestamps).toHaveLength(5);
  });

  it('should count users and operations separately', async () => {
    for (let i = 0; i < 5; i++) {
      await service.enforceRateLimit('user-1', 'initiateWithdrawal');
    }

    await expect(service.enforceRateLimit('user-2', 'initiateWithdrawal')).resolves.toBeUndefined();
    await expect(service.enforceRateLimit('user-1', 'sendMoney')).resolves.toBeUndefined();
  });

  it('should slide the window forward', async () => {
    for (let i = 0; i < 5; i++) {
      await service.enforceRateLimit('user-1', 'momoTransfer');
      clock.advance(10 * 60 * 1000);
    }

    // The first attempt is now 50 minutes old; ten more and it drops out.
    await expect(service.enforceRateLimit('user-1', 'momoTransfer')).rejects.toMatchObject({
      code: ERROR_CODES.RATE_LIMIT_EXCEEDED
    });
    clock.advance(10 * 60 * 1000 + 1);
    await expect(service.enforceRateLimit('user-1', 'momoTransfer')).resolves.toBeUndefined();
  });

  it('should let the request through when storage fails', async () => {
    store.failNext('rate_limits', 'set');

    await expect(service.enforceRateLimit('user-1', 'sendMoney')).resolves.toBeUndefined();
    expect(await store.get('rate_limits', 'user-1_sendMoney')).toBeNull();
  });

  it('should ignore operations without a policy', async () => {
    await expect(service.enforceRateLimit('user-1', 'unknownOperation')).resolves.toBeUndefined();
    expect(store.all('rate_limits')).toHaveLength(0);
  });

  it('should accept policy overrides', async () => {
    const strict = new RateLimitService(store, clock.now, { sendMoney: { maxRequests: 1 } });

    await strict.enforceRateLimit('user-1', 'sendMoney');
    await expect(strict.enforceRateLimit('user-1', 'sendMoney')).rejects.toMatchObject({
      code: ERROR_CODES.RATE_LIMIT_EXCEEDED
    });
    expect(strict.policyFor('sendMoney').windowMs).toBe(HOUR);
  });

  it('should remove windows older than the longest policy', async () => {
    await service.enforceRateLimit('user-1', 'sendMoney');
    clock.advance(30 * 60 * 1000);
    await service.enforceRateLimit('user-2', 'sendMoney');

    clock.advance(30 * 60 * 1000 + 1);
    expect(await service.cleanupStale()).toBe(1);
    expect(await store.get('rate_limits', 'user-1_sendMoney')).toBeNull();
    expect(await store.get('rate_limits', 'user-2_sendMoney')).not.toBeNull();
  });
});
