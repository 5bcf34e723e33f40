import Joi from 'joi';
import { PaymentGateway } from '../gateways/paystack.gateway';
import { DocumentStore } from '../store/document-store';
import {
  CheckoutSession,
  GatewayResult,
  Payment,
  PaymentChannel,
  ReceiptType,
  RequestContext,
  TransactionStatus
} from '../types';
import { Clock, systemClock } from '../utils/clock';
import { generateReference } from '../utils/crypto';
import { createAppError, ERROR_CODES, errorMessage, serviceError } from '../utils/errors';
import { logger } from '../utils/logger';
import { isValidAmount } from '../utils/money';
import { ExchangeRateService } from './exchange-rate.service';
import { Replayable } from './idempotency.service';
import { OperationRunner } from './operation-runner';
import { initialStateFields, TransactionStateService } from './transaction-state.service';
import { receiptId, WalletService } from './wallet.service';

export interface InitializeDepositDto {
  email: string;
  amount: number;
  currency?: string;
}

export interface MobileMoneyChargeDto extends InitializeDepositDto {
  provider: string;
  phoneNumber: string;
  idempotencyKey?: string;
}

export interface ChargeResult {
  reference: string;
  status: TransactionStatus;
  completed: boolean;
}

export interface VerifiedDeposit {
  amount: number;
  currency: string;
  channel?: string;
}

export interface DepositConfirmation {
  amount: number;
  currency: string;
  newBalance: number;
  alreadyProcessed: boolean;
}

const chargeResultSchema = Joi.object<ChargeResult>({
  reference: Joi.string().required(),
  status: Joi.string().valid(...Object.values(TransactionStatus)).required(),
  completed: Joi.boolean().required()
});

const CHANNEL_LABELS: Record<string, string> = {
  card: 'Card',
  bank: 'Bank transfer',
  bank_transfer: 'Bank transfer',
  mobile_money: 'Mobile Money',
  ussd: 'USSD'
};

const channelLabel = (channel: string): string => CHANNEL_LABELS[channel] ?? channel;

export class DepositService {
  constructor(
    private readonly store: DocumentStore,
    private readonly runner: OperationRunner,
    private readonly wallets: WalletService,
    private readonly states: TransactionStateService,
    private readonly rates: ExchangeRateService,
    private readonly gateway: PaymentGateway,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Starts a hosted checkout and records the pending payment it will settle.
   */
  async initializeTransaction(ctx: RequestContext, dto: InitializeDepositDto): Promise<CheckoutSession> {
    return this.runner.run({
      name: 'initializeTransaction',
      ctx,
      requires: ['paystack'],
      validate: () => this.validateDeposit(dto),
      audit: { amount: dto.amount, currency: dto.currency },
      auditResult: (session) => ({ metadata: { reference: session.reference } }),
      run: async () => {
        const payment = await this.recordPending(ctx.userId, dto, PaymentChannel.CARD);
        try {
          return await this.gateway.initializeTransaction({
            email: dto.email,
            amount: dto.amount,
            currency: payment.currency,
            reference: payment.reference,
            metadata: { userId: ctx.userId, type: 'deposit' }
          });
        } catch (error) {
          await this.markFailed(payment.id);
          throw error;
        }
      }
    });
  }

  /**
   * Charges a mobile-money account. The customer usually approves on their
   * phone and the webhook settles the payment; a charge that succeeds at
   * once is confirmed here.
   */
  async chargeMobileMoney(ctx: RequestContext, dto: MobileMoneyChargeDto): Promise<Replayable<ChargeResult>> {
    return this.runner.run({
      name: 'chargeMobileMoney',
      ctx,
      requires: ['paystack'],
      validate: () => {
        this.validateDeposit(dto);
        if (!dto.provider || !dto.phoneNumber) {
          throw createAppError(ERROR_CODES.SYSTEM_VALIDATION_FAILED, 'Provider and phone number are required.');
        }
      },
      idempotency: { key: dto.idempotencyKey, resultSchema: chargeResultSchema },
      audit: { amount: dto.amount, currency: dto.currency, metadata: { provider: dto.provider } },
      auditResult: (result) => ({ metadata: { reference: result.reference, status: result.status } }),
      run: async () => {
        const payment = await this.recordPending(ctx.userId, dto, PaymentChannel.MOBILE_MONEY);

        let result: GatewayResult;
        try {
          result = await this.gateway.charge({
            email: dto.email,
            amount: dto.amount,
            currency: payment.currency,
            reference: payment.reference,
            metadata: { userId: ctx.userId, type: 'deposit' },
            provider: dto.provider,
            phoneNumber: dto.phoneNumber
          });
        } catch (error) {
          await this.markFailed(payment.id);
          throw error;
        }

        if (result.status === TransactionStatus.COMPLETED) {
          // The customer has paid; an uncredited charge is left pending for
          // the webhook or verifyPayment to settle.
          try {
            await this.confirmDeposit(payment.reference, {
              amount: dto.amount,
              currency: payment.currency,
              channel: PaymentChannel.MOBILE_MONEY
            });
          } catch (error) {
            logger.error('Crediting a completed mobile money charge failed', {
              reference: payment.reference,
              error: errorMessage(error)
            });
            return { reference: payment.reference, status: TransactionStatus.PENDING, completed: false };
          }
          return { reference: payment.reference, status: TransactionStatus.COMPLETED, completed: true };
        }

        if (result.status === TransactionStatus.FAILED) {
          await this.markFailed(payment.id);
          throw serviceError('paystack', new Error('Mobile money charge was declined'), {
            reference: payment.reference,
            providerStatus: result.providerStatus
          });
        }

        return { reference: payment.reference, status: TransactionStatus.PENDING, completed: false };
      }
    });
  }

  /**
   * Asks the gateway whether the caller's payment succeeded and credits the
   * wallet if it has not been credited already.
   */
  async verifyPayment(ctx: RequestContext, reference: string): Promise<DepositConfirmation> {
    return this.runner.run({
      name: 'verifyPayment',
      ctx,
      requires: ['paystack'],
      validate: () => {
        if (!reference || typeof reference !== 'string') {
          throw createAppError(ERROR_CODES.SYSTEM_VALIDATION_FAILED, 'Payment reference is required.');
        }
      },
      audit: { metadata: { reference } },
      auditResult: (result) => ({ amount: result.amount, currency: result.currency }),
      run: async () => {
        const payment = await this.store.get('payments', reference);
        if (!payment) {
          throw createAppError(ERROR_CODES.TXN_NOT_FOUND, 'Payment not found.', { reference });
        }
        if (payment.userId !== ctx.userId) {
          throw createAppError(ERROR_CODES.AUTH_PERMISSION_DENIED, 'This payment belongs to another user.');
        }

        const verified = await this.gateway.verifyTransaction(reference);
        if (verified.status !== TransactionStatus.COMPLETED) {
          throw createAppError(ERROR_CODES.SERVICE_PAYSTACK_ERROR, 'Payment verification failed.', {
            reference,
            providerStatus: verified.providerStatus
          });
        }

        return this.confirmDeposit(reference, {
          amount: verified.amount ?? payment.amount,
          currency: verified.currency ?? payment.currency,
          channel: payment.channel
        });
      }
    });
  }

  /**
   * Credits a verified deposit exactly once per reference. Replays return
   * the original credit with `alreadyProcessed` set.
   */
  async confirmDeposit(reference: string, verified: VerifiedDeposit): Promise<DepositConfirmation> {
    const snapshot = await this.rates.snapshot();

    const confirmation = await this.store.runTransaction(async (tx): Promise<DepositConfirmation> => {
      const payment = await tx.get('payments', reference);
      if (!payment) {
        throw createAppError(ERROR_CODES.TXN_NOT_FOUND, 'Payment not found.', { reference });
      }

      const wallet = await tx.get('wallets', payment.userId);
      if (!wallet) {
        throw createAppError(ERROR_CODES.WALLET_NOT_FOUND, undefined, { userId: payment.userId });
      }

      if (payment.processed) {
        return {
          amount: payment.creditedAmount ?? payment.amount,
          currency: payment.creditedCurrency ?? payment.currency,
          newBalance: wallet.balance,
          alreadyProcessed: true
        };
      }

      if (verified.amount !== payment.amount || verified.currency !== payment.currency) {
        logger.warn('Verified deposit differs from the requested amount', {
          reference,
          requested: `${payment.amount} ${payment.currency}`,
          verified: `${verified.amount} ${verified.currency}`
        });
      }

      const conversion = snapshot.convert(verified.amount, verified.currency, wallet.currency);
      const converted = verified.currency !== wallet.currency;
      const credited = await this.wallets.creditWallet(tx, payment.userId, conversion.amount);
      const now = this.clock();

      if (payment.status === TransactionStatus.FAILED) {
        // A late success for a charge first reported as failed
        await this.states.transitionWithin(tx, 'payments', reference, TransactionStatus.PENDING);
      }
      await this.states.transitionWithin(tx, 'payments', reference, TransactionStatus.COMPLETED, {
        processed: true,
        creditedAmount: conversion.amount,
        creditedCurrency: wallet.currency,
        completedAt: now,
        updatedAt: now
      });

      const method = channelLabel(verified.channel ?? payment.channel);
      await tx.set('transactions', {
        id: receiptId(payment.userId, reference),
        transactionId: reference,
        ownerId: payment.userId,
        type: ReceiptType.DEPOSIT,
        amount: conversion.amount,
        fee: 0,
        currency: wallet.currency,
        senderCurrency: verified.currency,
        receiverCurrency: wallet.currency,
        exchangeRate: converted ? conversion.rate : null,
        convertedAmount: converted ? conversion.amount : null,
        reference,
        description: `Deposit via ${method}`,
        method,
        createdAt: now,
        completedAt: now,
        ...initialStateFields(TransactionStatus.COMPLETED, now)
      });

      return {
        amount: conversion.amount,
        currency: wallet.currency,
        newBalance: credited.balance,
        alreadyProcessed: false
      };
    });

    if (!confirmation.alreadyProcessed) {
      logger.info(`Deposit ${reference} credited`, { amount: confirmation.amount, currency: confirmation.currency });
    }
    return confirmation;
  }

  private async markFailed(reference: string): Promise<void> {
    try {
      await this.states.updateTransactionState('payments', reference, TransactionStatus.FAILED, {
        updatedAt: this.clock()
      });
    } catch (error) {
      logger.error('Could not mark payment failed', { reference, error: errorMessage(error) });
    }
  }

  private validateDeposit(dto: InitializeDepositDto): void {
    if (!isValidAmount(dto.amount)) {
      throw createAppError(ERROR_CODES.TXN_AMOUNT_INVALID);
    }
    if (!dto.email) {
      throw createAppError(ERROR_CODES.SYSTEM_VALIDATION_FAILED, 'Email is required.');
    }
  }

  private async recordPending(userId: string, dto: InitializeDepositDto, channel: PaymentChannel): Promise<Payment> {
    const wallet = await this.store.get('wallets', userId);
    if (!wallet) {
      throw createAppError(ERROR_CODES.WALLET_NOT_FOUND, undefined, { userId });
    }

    const now = this.clock();
    const reference = generateReference('DEP');
    const payment: Payment = {
      id: reference,
      reference,
      userId,
      walletId: wallet.walletId,
      amount: dto.amount,
      currency: (dto.currency ?? wallet.currency).toUpperCase(),
      channel,
      processed: false,
      createdAt: now,
      updatedAt: now,
      ...initialStateFields(TransactionStatus.PENDING, now)
    };
    await this.store.insert('payments', payment);
    return payment;
  }
}
