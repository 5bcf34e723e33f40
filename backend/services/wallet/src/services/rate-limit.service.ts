import { DocumentStore } from '../store/document-store';
import { Clock, systemClock } from '../utils/clock';
import { AppError, createAppError, ERROR_CODES, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface RateLimitPolicy {
  windowMs: number;
  maxRequests: number;
  message: string;
}

export type RateLimitedOperation =
  | 'sendMoney'
  | 'initiateWithdrawal'
  | 'momoRequestToPay'
  | 'momoTransfer'
  | 'lookupWallet';

const HOUR = 60 * 60 * 1000;

export const RATE_LIMITS: Record<RateLimitedOperation, RateLimitPolicy> = {
  sendMoney: {
    windowMs: HOUR,
    maxRequests: 20,
    message: 'Too many transfers. Please wait before sending more money.'
  },
  initiateWithdrawal: {
    windowMs: HOUR,
    maxRequests: 5,
    message: 'Too many withdrawal attempts. Please try again later.'
  },
  momoRequestToPay: {
    windowMs: HOUR,
    maxRequests: 10,
    message: 'Too many mobile money payment requests. Please try again later.'
  },
  momoTransfer: {
    windowMs: HOUR,
    maxRequests: 5,
    message: 'Too many mobile money transfers. Please try again later.'
  },
  lookupWallet: {
    windowMs: 5 * 60 * 1000,
    maxRequests: 30,
    message: 'Too many wallet lookups. Please wait a few minutes.'
  }
};

const isRateLimitedOperation = (operation: string): operation is RateLimitedOperation =>
  Object.prototype.hasOwnProperty.call(RATE_LIMITS, operation);

/**
 * Persistent sliding-window limiter keyed by (user, operation).
 * Storage failures let the request through.
 */
export class RateLimitService {
  private readonly policies: Record<RateLimitedOperation, RateLimitPolicy>;

  constructor(
    private readonly store: DocumentStore,
    private readonly clock: Clock = systemClock,
    overrides: Partial<Record<RateLimitedOperation, Partial<RateLimitPolicy>>> = {}
  ) {
    this.policies = {
      sendMoney: { ...RATE_LIMITS.sendMoney, ...overrides.sendMoney },
      initiateWithdrawal: { ...RATE_LIMITS.initiateWithdrawal, ...overrides.initiateWithdrawal },
      momoRequestToPay: { ...RATE_LIMITS.momoRequestToPay, ...overrides.momoRequestToPay },
      momoTransfer: { ...RATE_LIMITS.momoTransfer, ...overrides.momoTransfer },
      lookupWallet: { ...RATE_LIMITS.lookupWallet, ...overrides.lookupWallet }
    };
  }

  policyFor(operation: RateLimitedOperation): RateLimitPolicy {
    return this.policies[operation];
  }

  async enforceRateLimit(userId: string, operation: string): Promise<void> {
    if (!isRateLimitedOperation(operation)) {
      logger.warn(`No rate limit policy for operation ${operation}`);
      return;
    }

    const policy = this.policies[operation];
    const docId = `${userId}_${operation}`;

    try {
      await this.store.runTransaction(async (tx) => {
        const now = this.clock();
        const windowStart = now.getTime() - policy.windowMs;
        const existing = await tx.get('rate_limits', docId);
        const recent = (existing?.timestamps ?? []).filter((timestamp) => timestamp > windowStart);

        if (recent.length >= policy.maxRequests) {
          throw createAppError(ERROR_CODES.RATE_LIMIT_EXCEEDED, policy.message, {
            operation,
            userId
          });
        }

        await tx.set('rate_limits', {
          id: docId,
          userId,
          operation,
          timestamps: [...recent, now.getTime()],
          updatedAt: now
        });
      });
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      logger.error('Rate limit check failed, allowing request', {
        operation,
        userId,
        error: errorMessage(error)
      });
    }
  }

  /**
   * Drops windows untouched for longer than the longest policy window.
   */
  async cleanupStale(limit = 500): Promise<number> {
    const longest = Math.max(...Object.values(this.policies).map((policy) => policy.windowMs));
    const cutoff = new Date(this.clock().getTime() - longest);
    const deleted = await this.store.deleteOlderThan('rate_limits', 'updatedAt', cutoff, limit);
    if (deleted > 0) {
      logger.info(`Removed ${deleted} stale rate limit windows`);
    }
    return deleted;
  }
}
