import Joi from 'joi';
import { config } from '../config';
import { ServiceReadiness } from '../config/service-readiness';
import { MobileMoneyGateway, MomoAccountBalance, MomoStatusResult } from '../gateways/momo.gateway';
import { DocumentStore, DocumentTransaction } from '../store/document-store';
import {
  MomoProduct,
  MomoTransaction,
  MomoTransactionType,
  ReceiptType,
  RequestContext,
  TransactionStatus
} from '../types';
import { Clock, systemClock } from '../utils/clock';
import { generateUuid } from '../utils/crypto';
import { createAppError, ERROR_CODES, errorMessage, serviceError, toClientError } from '../utils/errors';
import { logger } from '../utils/logger';
import { isValidAmount } from '../utils/money';
import { ExchangeRateService } from './exchange-rate.service';
import { Replayable } from './idempotency.service';
import { OperationRunner } from './operation-runner';
import { initialStateFields, TransactionStateService } from './transaction-state.service';
import { receiptId, WalletService } from './wallet.service';

export interface MomoPaymentDto {
  amount: number;
  currency?: string;
  phoneNumber: string;
  payerMessage?: string;
  payeeNote?: string;
  idempotencyKey?: string;
}

export interface MomoSubmissionResult {
  referenceId: string;
  status: TransactionStatus;
}

export interface MomoStatusView {
  referenceId: string;
  type: MomoTransactionType;
  status: TransactionStatus;
  providerStatus: string;
  refunded: boolean;
}

/** Provider fields recorded alongside a status change. */
export interface ProviderStatusFields {
  callbackStatus?: string | null;
  verifiedStatus?: string | null;
}

export interface MomoSettlement {
  referenceId: string;
  status: TransactionStatus;
  applied: boolean;
}

const submissionSchema = Joi.object<MomoSubmissionResult>({
  referenceId: Joi.string().required(),
  status: Joi.string().valid(...Object.values(TransactionStatus)).required()
});

const MOMO_PRODUCTS: readonly MomoProduct[] = ['collection', 'disbursement'];

const toMomoProduct = (value: string): MomoProduct => {
  const product = MOMO_PRODUCTS.find((candidate) => candidate === value);
  if (!product) {
    throw createAppError(ERROR_CODES.SYSTEM_VALIDATION_FAILED, 'Product must be collection or disbursement.', {
      product: value
    });
  }
  return product;
};

const METHOD = 'MTN MoMo';

// The sandbox only accepts EUR
const SANDBOX_CURRENCY = 'EUR';

export class MomoService {
  constructor(
    private readonly store: DocumentStore,
    private readonly runner: OperationRunner,
    private readonly wallets: WalletService,
    private readonly states: TransactionStateService,
    private readonly rates: ExchangeRateService,
    private readonly gateway: MobileMoneyGateway,
    private readonly readiness: ServiceReadiness,
    private readonly clock: Clock = systemClock,
    private readonly environment = config.momo.environment
  ) {}

  /**
   * Asks the payer to approve a collection on their phone. The wallet is
   * credited once the provider reports success.
   */
  async momoRequestToPay(ctx: RequestContext, dto: MomoPaymentDto): Promise<Replayable<MomoSubmissionResult>> {
    return this.runner.run({
      name: 'momoRequestToPay',
      ctx,
      requires: ['momo_collections'],
      validate: () => this.validatePayment(dto),
      rateLimit: 'momoRequestToPay',
      idempotency: { key: dto.idempotencyKey, resultSchema: submissionSchema },
      audit: { amount: dto.amount, currency: dto.currency, metadata: { phoneNumber: dto.phoneNumber } },
      auditResult: (result) => ({ metadata: { referenceId: result.referenceId } }),
      run: async () => {
        const record = await this.prepare(ctx.userId, dto, MomoTransactionType.COLLECTION);

        const submission = await this.gateway.requestToPay({
          referenceId: record.referenceId,
          amount: record.amount,
          currency: record.currency,
          phoneNumber: record.phoneNumber,
          payerMessage: dto.payerMessage ?? 'Add money to wallet',
          payeeNote: dto.payeeNote ?? 'Wallet deposit'
        });
        if (!submission.accepted) {
          throw serviceError('momo', new Error('Payment request was not accepted'), {
            referenceId: record.referenceId,
            httpStatus: submission.httpStatus
          });
        }

        await this.store.insert('momo_transactions', record);
        return { referenceId: record.referenceId, status: TransactionStatus.PENDING };
      }
    });
  }

  /**
   * Pays out from the wallet to a mobile-money account. The debit and the
   * pending record are written together before the provider is called.
   */
  async momoTransfer(ctx: RequestContext, dto: MomoPaymentDto): Promise<Replayable<MomoSubmissionResult>> {
    return this.runner.run({
      name: 'momoTransfer',
      ctx,
      requires: ['momo_disbursements'],
      validate: () => this.validatePayment(dto),
      rateLimit: 'momoTransfer',
      idempotency: { key: dto.idempotencyKey, resultSchema: submissionSchema },
      audit: { amount: dto.amount, currency: dto.currency, metadata: { phoneNumber: dto.phoneNumber } },
      auditResult: (result) => ({ metadata: { referenceId: result.referenceId } }),
      run: async () => {
        const record = await this.prepare(ctx.userId, dto, MomoTransactionType.DISBURSEMENT);
        const { referenceId } = record;

        await this.store.runTransaction(async (tx) => {
          await this.wallets.debitWallet(tx, ctx.userId, record.walletAmount);
          await tx.set('momo_transactions', record);
          await tx.set('transactions', {
            id: receiptId(ctx.userId, referenceId),
            transactionId: referenceId,
            ownerId: ctx.userId,
            type: ReceiptType.WITHDRAWAL,
            amount: record.walletAmount,
            fee: 0,
            currency: record.walletCurrency,
            senderCurrency: record.walletCurrency,
            receiverCurrency: record.currency,
            reference: referenceId,
            description: `Withdrawal to ${METHOD} - ${record.phoneNumber}`,
            method: METHOD,
            createdAt: record.createdAt,
            ...initialStateFields(TransactionStatus.PENDING, record.createdAt)
          });
        });

        let accepted = false;
        let failure: unknown = new Error('Transfer was not accepted');
        try {
          const submission = await this.gateway.transfer({
            referenceId,
            amount: record.amount,
            currency: record.currency,
            phoneNumber: record.phoneNumber,
            payerMessage: dto.payerMessage ?? 'Wallet withdrawal',
            payeeNote: dto.payeeNote ?? 'Withdrawal from wallet'
          });
          accepted = submission.accepted;
          failure = new Error(`Transfer was not accepted (HTTP ${submission.httpStatus})`);
        } catch (error) {
          failure = error;
        }

        if (!accepted) {
          await this.refundRejected(referenceId, errorMessage(failure));
          throw serviceError('momo', failure, { referenceId });
        }

        logger.info(`MoMo transfer ${referenceId} submitted`, { userId: ctx.userId, amount: record.amount });
        return { referenceId, status: TransactionStatus.PENDING };
      }
    });
  }

  /**
   * Owner-only status query. The queried status is applied the same way a
   * verified callback would be.
   */
  async momoCheckStatus(ctx: RequestContext, referenceId: string): Promise<MomoStatusView> {
    try {
      if (!referenceId || typeof referenceId !== 'string') {
        throw createAppError(ERROR_CODES.SYSTEM_VALIDATION_FAILED, 'Reference ID is required.');
      }

      const record = await this.store.get('momo_transactions', referenceId);
      if (!record) {
        throw createAppError(ERROR_CODES.TXN_NOT_FOUND, undefined, { referenceId });
      }
      if (record.userId !== ctx.userId) {
        throw createAppError(ERROR_CODES.AUTH_PERMISSION_DENIED, 'This transaction belongs to another user.');
      }

      const result = await this.queryProviderStatus(record);
      const settlement = await this.applyProviderStatus(referenceId, result, { verifiedStatus: result.providerStatus });
      const refreshed = await this.store.get('momo_transactions', referenceId);

      return {
        referenceId,
        type: record.type,
        status: settlement.status,
        providerStatus: result.providerStatus,
        refunded: refreshed?.refunded ?? record.refunded
      };
    } catch (error) {
      throw toClientError(error);
    }
  }

  /** Reads the merchant account balance of a provider product. */
  async momoGetBalance(ctx: RequestContext, product = 'collection'): Promise<MomoAccountBalance> {
    return this.runner.run({
      name: 'momoGetBalance',
      ctx,
      requires: [product === 'disbursement' ? 'momo_disbursements' : 'momo_collections'],
      validate: () => {
        toMomoProduct(product);
      },
      audit: { metadata: { product } },
      run: () => this.gateway.getBalance(toMomoProduct(product))
    });
  }

  async queryProviderStatus(record: MomoTransaction): Promise<MomoStatusResult> {
    if (record.type === MomoTransactionType.DISBURSEMENT) {
      this.readiness.requireReady('momo_disbursements');
      return this.gateway.getTransferStatus(record.referenceId);
    }
    this.readiness.requireReady('momo_collections');
    return this.gateway.getRequestToPayStatus(record.referenceId);
  }

  /**
   * Applies a provider status to a momo transaction. Completed collections
   * credit the wallet, failed disbursements refund it, each at most once.
   * Pending statuses change nothing.
   */
  async applyProviderStatus(
    referenceId: string,
    result: Pick<MomoStatusResult, 'status' | 'providerStatus' | 'financialTransactionId'>,
    fields: ProviderStatusFields = {}
  ): Promise<MomoSettlement> {
    if (result.status !== TransactionStatus.COMPLETED && result.status !== TransactionStatus.FAILED) {
      const record = await this.store.get('momo_transactions', referenceId);
      if (!record) {
        throw createAppError(ERROR_CODES.TXN_NOT_FOUND, undefined, { referenceId });
      }
      logger.debug(`No action for MoMo ${referenceId} with provider status ${result.providerStatus}`);
      return { referenceId, status: record.status, applied: false };
    }

    const settlement = await this.store.runTransaction(async (tx): Promise<MomoSettlement> => {
      const record = await tx.get('momo_transactions', referenceId);
      if (!record) {
        throw createAppError(ERROR_CODES.TXN_NOT_FOUND, undefined, { referenceId });
      }
      if (record.status === result.status) {
        return { referenceId, status: record.status, applied: false };
      }

      const provider = {
        providerStatus: result.providerStatus,
        ...(result.financialTransactionId ? { financialTransactionId: result.financialTransactionId } : {}),
        ...fields
      };
      return result.status === TransactionStatus.COMPLETED
        ? this.complete(tx, record, provider)
        : this.fail(tx, record, `Provider reported ${result.providerStatus}`, provider);
    });

    if (settlement.applied) {
      logger.info(`MoMo ${referenceId} settled as ${settlement.status}`);
    }
    return settlement;
  }

  private async complete(
    tx: DocumentTransaction,
    record: MomoTransaction,
    provider: Partial<MomoTransaction>
  ): Promise<MomoSettlement> {
    const { referenceId, userId } = record;
    const now = this.clock();

    if (record.type === MomoTransactionType.COLLECTION) {
      if (record.status === TransactionStatus.FAILED) {
        // Late approval of a request first reported as failed
        await this.states.transitionWithin(tx, 'momo_transactions', referenceId, TransactionStatus.PENDING);
      }
      await this.states.transitionWithin(tx, 'momo_transactions', referenceId, TransactionStatus.COMPLETED, {
        ...provider,
        completedAt: now,
        updatedAt: now
      });
      await this.wallets.creditWallet(tx, userId, record.walletAmount);

      const converted = record.currency !== record.walletCurrency;
      await tx.set('transactions', {
        id: receiptId(userId, referenceId),
        transactionId: referenceId,
        ownerId: userId,
        type: ReceiptType.DEPOSIT,
        amount: record.walletAmount,
        fee: 0,
        currency: record.walletCurrency,
        senderCurrency: record.currency,
        receiverCurrency: record.walletCurrency,
        exchangeRate: converted ? record.walletAmount / record.amount : null,
        convertedAmount: converted ? record.walletAmount : null,
        reference: referenceId,
        description: `Deposit via ${METHOD}`,
        method: METHOD,
        createdAt: record.createdAt,
        completedAt: now,
        ...initialStateFields(TransactionStatus.COMPLETED, now)
      });
      return { referenceId, status: TransactionStatus.COMPLETED, applied: true };
    }

    await this.states.transitionWithin(tx, 'momo_transactions', referenceId, TransactionStatus.COMPLETED, {
      ...provider,
      completedAt: now,
      updatedAt: now
    });
    const receiptKey = receiptId(userId, referenceId);
    if (await tx.get('transactions', receiptKey)) {
      await this.states.transitionWithin(tx, 'transactions', receiptKey, TransactionStatus.COMPLETED, {
        completedAt: now
      });
    }
    return { referenceId, status: TransactionStatus.COMPLETED, applied: true };
  }

  private async fail(
    tx: DocumentTransaction,
    record: MomoTransaction,
    reason: string,
    provider: Partial<MomoTransaction> = {}
  ): Promise<MomoSettlement> {
    const { referenceId, userId } = record;
    const now = this.clock();
    const refund = record.type === MomoTransactionType.DISBURSEMENT && !record.refunded;

    await this.states.transitionWithin(tx, 'momo_transactions', referenceId, TransactionStatus.FAILED, {
      ...provider,
      ...(refund ? { refunded: true } : {}),
      failureReason: reason,
      failedAt: now,
      updatedAt: now
    });

    if (refund) {
      await this.wallets.creditWallet(tx, userId, record.walletAmount);
      const receiptKey = receiptId(userId, referenceId);
      if (await tx.get('transactions', receiptKey)) {
        await this.states.transitionWithin(tx, 'transactions', receiptKey, TransactionStatus.FAILED, {
          failureReason: reason,
          failedAt: now
        });
      }
    }
    return { referenceId, status: TransactionStatus.FAILED, applied: true };
  }

  /**
   * Compensates a disbursement the provider never accepted. A failure here
   * leaves the debit in place and is logged for reconciliation.
   */
  private async refundRejected(referenceId: string, reason: string): Promise<void> {
    try {
      await this.store.runTransaction(async (tx) => {
        const record = await tx.get('momo_transactions', referenceId);
        if (record && !record.refunded) {
          await this.fail(tx, record, reason);
        }
      });
    } catch (error) {
      logger.error('MoMo refund failed, manual reconciliation required', {
        referenceId,
        reason,
        error: errorMessage(error)
      });
    }
  }

  private validatePayment(dto: MomoPaymentDto): void {
    if (!isValidAmount(dto.amount)) {
      throw createAppError(ERROR_CODES.TXN_AMOUNT_INVALID);
    }
    if (!dto.phoneNumber) {
      throw createAppError(ERROR_CODES.SYSTEM_VALIDATION_FAILED, 'Phone number is required.');
    }
  }

  /**
   * Builds the pending record, converting the provider amount into the
   * wallet currency at today's rate.
   */
  private async prepare(
    userId: string,
    dto: MomoPaymentDto,
    type: MomoTransactionType
  ): Promise<MomoTransaction> {
    const wallet = await this.store.get('wallets', userId);
    if (!wallet) {
      throw createAppError(ERROR_CODES.WALLET_NOT_FOUND, undefined, { userId });
    }

    const currency = (dto.currency ?? (this.environment === 'sandbox' ? SANDBOX_CURRENCY : wallet.currency))
      .toUpperCase();
    const snapshot = await this.rates.snapshot();
    const conversion = snapshot.convert(dto.amount, currency, wallet.currency);

    if (type === MomoTransactionType.DISBURSEMENT && wallet.balance < conversion.amount) {
      throw createAppError(ERROR_CODES.WALLET_INSUFFICIENT_FUNDS, undefined, {
        required: conversion.amount,
        currency: wallet.currency
      });
    }

    const now = this.clock();
    const referenceId = generateUuid();
    return {
      id: referenceId,
      referenceId,
      type,
      userId,
      amount: dto.amount,
      currency,
      phoneNumber: dto.phoneNumber,
      walletAmount: conversion.amount,
      walletCurrency: wallet.currency,
      refunded: false,
      createdAt: now,
      updatedAt: now,
      ...initialStateFields(TransactionStatus.PENDING, now)
    };
  }
}
