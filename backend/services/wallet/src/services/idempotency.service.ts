import Joi from 'joi';
import { config } from '../config';
import { DocumentStore } from '../store/document-store';
import { IdempotencyStatus } from '../types';
import { Clock, systemClock } from '../utils/clock';
import { createAppError, ERROR_CODES, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export const IDEMPOTENCY_KEY_MIN_LENGTH = 16;

export type Replayable<T> = T & { idempotentReplay?: true };

type Claim = { kind: 'replay'; cached: unknown } | { kind: 'proceed' };

export class IdempotencyService {
  constructor(
    private readonly store: DocumentStore,
    private readonly clock: Clock = systemClock,
    private readonly ttlMs: number = config.idempotency.ttlMs
  ) {}

  /**
   * Runs `operation` at most once per key. A completed key returns its cached
   * result, decoded with `resultSchema` and flagged as a replay; a failed key
   * may be retried; a key still in flight is rejected.
   */
  async withIdempotency<T extends object>(
    key: string | undefined,
    operationName: string,
    userId: string,
    resultSchema: Joi.ObjectSchema<T>,
    operation: () => Promise<T>
  ): Promise<Replayable<T>> {
    if (!key || typeof key !== 'string' || key.length < IDEMPOTENCY_KEY_MIN_LENGTH) {
      throw createAppError(
        ERROR_CODES.SYSTEM_VALIDATION_FAILED,
        `A valid idempotency key (at least ${IDEMPOTENCY_KEY_MIN_LENGTH} characters) is required.`,
        { operation: operationName }
      );
    }

    const claim = await this.claim(key, operationName, userId);
    if (claim.kind === 'replay') {
      logger.info(`Idempotent replay for ${operationName}`, { userId, operation: operationName });
      return { ...this.decode(key, resultSchema, claim.cached), idempotentReplay: true as const };
    }

    let result: T;
    try {
      result = await operation();
    } catch (error) {
      await this.markFailed(key, error);
      throw error;
    }

    try {
      await this.store.update('idempotency_keys', key, {
        status: IdempotencyStatus.COMPLETED,
        result,
        completedAt: this.clock()
      });
    } catch (error) {
      // The operation already took effect; the key stays pending until it expires.
      logger.error('Failed to record idempotent result', {
        operation: operationName,
        userId,
        error: errorMessage(error)
      });
    }

    return result;
  }

  private async claim(key: string, operationName: string, userId: string): Promise<Claim> {
    return this.store.runTransaction(async (tx): Promise<Claim> => {
      const now = this.clock();
      const existing = await tx.get('idempotency_keys', key);

      if (existing && existing.expiresAt.getTime() > now.getTime()) {
        if (existing.userId !== userId) {
          throw createAppError(
            ERROR_CODES.AUTH_PERMISSION_DENIED,
            'This idempotency key belongs to another user.',
            { operation: operationName }
          );
        }
        if (existing.operation !== operationName) {
          throw createAppError(
            ERROR_CODES.SYSTEM_VALIDATION_FAILED,
            'This idempotency key was used for a different operation.',
            { operation: operationName, originalOperation: existing.operation }
          );
        }

        switch (existing.status) {
          case IdempotencyStatus.COMPLETED:
            return { kind: 'replay', cached: existing.result };
          case IdempotencyStatus.PENDING:
            throw createAppError(ERROR_CODES.TXN_DUPLICATE_REQUEST, undefined, {
              operation: operationName
            });
          case IdempotencyStatus.FAILED:
            await tx.update('idempotency_keys', key, {
              status: IdempotencyStatus.PENDING,
              retryAt: now
            });
            return { kind: 'proceed' };
        }
      }

      await tx.set('idempotency_keys', {
        id: key,
        userId,
        operation: operationName,
        status: IdempotencyStatus.PENDING,
        createdAt: now,
        expiresAt: new Date(now.getTime() + this.ttlMs)
      });
      return { kind: 'proceed' };
    });
  }

  private decode<T extends object>(key: string, schema: Joi.ObjectSchema<T>, cached: unknown): T {
    const { value, error } = schema.validate(cached, { stripUnknown: true });
    if (error || value === undefined) {
      logger.error('Cached idempotent result is unreadable', { key, error: error?.message });
      throw createAppError(ERROR_CODES.SYSTEM_INTERNAL_ERROR);
    }
    return value;
  }

  private async markFailed(key: string, cause: unknown): Promise<void> {
    try {
      await this.store.update('idempotency_keys', key, {
        status: IdempotencyStatus.FAILED,
        error: errorMessage(cause),
        failedAt: this.clock()
      });
    } catch (error) {
      logger.error('Failed to mark idempotency key as failed', { error: errorMessage(error) });
    }
  }

  async cleanupExpired(limit = 500): Promise<number> {
    const deleted = await this.store.deleteOlderThan('idempotency_keys', 'expiresAt', this.clock(), limit);
    if (deleted > 0) {
      logger.info(`Removed ${deleted} expired idempotency keys`);
    }
    return deleted;
  }
}
