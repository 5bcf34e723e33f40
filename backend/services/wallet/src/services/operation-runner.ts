import Joi from 'joi';
import { ExternalServiceName, ServiceReadiness } from '../config/service-readiness';
import { RequestContext, UserRecord } from '../types';
import { errorMessage, toClientError } from '../utils/errors';
import { logger } from '../utils/logger';
import { AuditService } from './audit.service';
import { IdempotencyService, Replayable } from './idempotency.service';
import { KycService } from './kyc.service';
import { RateLimitedOperation, RateLimitService } from './rate-limit.service';

export interface AuditFields {
  amount?: number;
  currency?: string;
  metadata?: Record<string, unknown>;
}

export interface GuardedOperation<T extends object> {
  name: string;
  ctx: RequestContext;
  /** External services that must be configured before anything else runs. */
  requires?: ExternalServiceName[];
  validate?: () => void;
  rateLimit?: RateLimitedOperation;
  idempotency?: {
    key: string | undefined;
    resultSchema: Joi.ObjectSchema<T>;
  };
  audit?: AuditFields;
  /** Extra audit fields derived from the result. */
  auditResult?: (result: T) => AuditFields;
  run: (user: UserRecord) => Promise<T>;
}

/**
 * Inbound pipeline for user-initiated financial operations.
 */
export class OperationRunner {
  constructor(
    private readonly readiness: ServiceReadiness,
    private readonly kyc: KycService,
    private readonly rateLimits: RateLimitService,
    private readonly idempotency: IdempotencyService,
    private readonly audit: AuditService
  ) {}

  async run<T extends object>(operation: GuardedOperation<T>): Promise<Replayable<T>> {
    const { name, ctx } = operation;

    try {
      if (operation.requires) {
        this.readiness.requireReady(...operation.requires);
      }
      operation.validate?.();

      const user = await this.kyc.enforceKyc(ctx.userId);

      if (operation.rateLimit) {
        await this.rateLimits.enforceRateLimit(ctx.userId, operation.rateLimit);
      }

      const audited = () => this.audited(operation, user);
      if (!operation.idempotency) {
        return await audited();
      }
      return await this.idempotency.withIdempotency(
        operation.idempotency.key,
        name,
        ctx.userId,
        operation.idempotency.resultSchema,
        audited
      );
    } catch (error) {
      throw toClientError(error);
    }
  }

  private async audited<T extends object>(operation: GuardedOperation<T>, user: UserRecord): Promise<T> {
    const { name, ctx } = operation;
    const base = { userId: ctx.userId, operation: name, ip: ctx.ip, ...operation.audit };

    let result: T;
    try {
      result = await operation.run(user);
    } catch (error) {
      logger.warn(`${name} failed`, { userId: ctx.userId, error: errorMessage(error) });
      await this.audit.failure(base, error);
      throw error;
    }

    const extra = operation.auditResult?.(result) ?? {};
    await this.audit.success({
      ...base,
      ...extra,
      metadata: { ...base.metadata, ...extra.metadata }
    });
    return result;
  }
}
