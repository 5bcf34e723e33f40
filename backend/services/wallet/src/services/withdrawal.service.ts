import Joi from 'joi';
import { AppConfig, config } from '../config';
import { ServiceReadiness } from '../config/service-readiness';
import { PaymentGateway } from '../gateways/paystack.gateway';
import { DocumentStore } from '../store/document-store';
import {
  Bank,
  ReceiptType,
  RequestContext,
  ResolvedAccount,
  TransactionStatus,
  TransferInitiation,
  Withdrawal,
  WithdrawalType
} from '../types';
import { Clock, systemClock } from '../utils/clock';
import { generateReference } from '../utils/crypto';
import { createAppError, ERROR_CODES, errorMessage, isAppError, serviceError } from '../utils/errors';
import { logger } from '../utils/logger';
import { isValidAmount } from '../utils/money';
import { Replayable } from './idempotency.service';
import { KycService } from './kyc.service';
import { OperationRunner } from './operation-runner';
import { initialStateFields, TransactionStateService } from './transaction-state.service';
import { receiptId, WalletService } from './wallet.service';

export interface InitiateWithdrawalDto {
  amount: number;
  type?: WithdrawalType;
  bankCode?: string;
  accountNumber?: string;
  accountName: string;
  mobileMoneyProvider?: string;
  phoneNumber?: string;
  idempotencyKey?: string;
}

export interface WithdrawalResult {
  reference: string;
  status: TransactionStatus;
  requiresOtp: boolean;
  transferCode?: string;
}

export interface FinalizeTransferDto {
  transferCode: string;
  otp: string;
  idempotencyKey?: string;
}

export interface TransferSettlement {
  reference: string;
  status: TransactionStatus;
  refunded: boolean;
}

const withdrawalResultSchema = Joi.object<WithdrawalResult>({
  reference: Joi.string().required(),
  status: Joi.string().valid(...Object.values(TransactionStatus)).required(),
  requiresOtp: Joi.boolean().required(),
  transferCode: Joi.string()
});

const finalizeResultSchema = Joi.object<{ reference: string }>({
  reference: Joi.string().required()
});

export class WithdrawalService {
  constructor(
    private readonly store: DocumentStore,
    private readonly runner: OperationRunner,
    private readonly kyc: KycService,
    private readonly wallets: WalletService,
    private readonly states: TransactionStateService,
    private readonly gateway: PaymentGateway,
    private readonly readiness: ServiceReadiness,
    private readonly clock: Clock = systemClock,
    private readonly limits: AppConfig['limits'] = config.limits
  ) {}

  async initiateWithdrawal(ctx: RequestContext, dto: InitiateWithdrawalDto): Promise<Replayable<WithdrawalResult>> {
    const type = dto.type ?? WithdrawalType.BANK;

    return this.runner.run({
      name: 'initiateWithdrawal',
      ctx,
      requires: ['paystack'],
      validate: () => {
        if (!isValidAmount(dto.amount)) {
          throw createAppError(ERROR_CODES.TXN_AMOUNT_INVALID);
        }
        if (dto.amount < this.limits.minWithdrawalAmount) {
          throw createAppError(
            ERROR_CODES.TXN_AMOUNT_TOO_SMALL,
            `Minimum withdrawal is ${this.limits.minWithdrawalAmount}.`,
            { min: this.limits.minWithdrawalAmount }
          );
        }
        const destination = type === WithdrawalType.MOBILE_MONEY
          ? dto.phoneNumber && dto.mobileMoneyProvider
          : dto.accountNumber && dto.bankCode;
        if (!destination || !dto.accountName) {
          throw createAppError(ERROR_CODES.SYSTEM_VALIDATION_FAILED, 'Withdrawal destination is incomplete.', {
            type
          });
        }
      },
      rateLimit: 'initiateWithdrawal',
      idempotency: { key: dto.idempotencyKey, resultSchema: withdrawalResultSchema },
      audit: { amount: dto.amount, metadata: { type } },
      auditResult: (result) => ({ metadata: { reference: result.reference, status: result.status } }),
      run: () => this.withdraw(ctx.userId, type, dto)
    });
  }

  private async withdraw(userId: string, type: WithdrawalType, dto: InitiateWithdrawalDto): Promise<WithdrawalResult> {
    const wallet = await this.store.get('wallets', userId);
    if (!wallet) {
      throw createAppError(ERROR_CODES.WALLET_NOT_FOUND, undefined, { userId });
    }
    if (wallet.balance < dto.amount) {
      throw createAppError(ERROR_CODES.WALLET_INSUFFICIENT_FUNDS, undefined, {
        required: dto.amount,
        currency: wallet.currency
      });
    }

    const isMobileMoney = type === WithdrawalType.MOBILE_MONEY;
    const accountNumber = (isMobileMoney ? dto.phoneNumber : dto.accountNumber) ?? '';
    const bankCode = (isMobileMoney ? dto.mobileMoneyProvider : dto.bankCode) ?? '';

    // Nothing has been debited yet, so a failure here needs no compensation.
    const recipient = await this.gateway.createTransferRecipient({
      type: isMobileMoney ? 'mobile_money' : 'nuban',
      name: dto.accountName,
      accountNumber,
      bankCode,
      currency: wallet.currency
    });

    const reference = generateReference('WD');
    const destinationLabel = isMobileMoney ? 'Mobile Money' : 'Bank';

    await this.store.runTransaction(async (tx) => {
      const now = this.clock();
      const debited = await this.wallets.debitWallet(tx, userId, dto.amount);
      const pending = initialStateFields(TransactionStatus.PENDING, now);

      const withdrawal: Withdrawal = {
        id: reference,
        reference,
        userId,
        walletId: debited.walletId,
        amount: dto.amount,
        currency: debited.currency,
        type,
        destination: {
          accountNumber,
          accountName: dto.accountName,
          ...(isMobileMoney ? { mobileMoneyProvider: bankCode } : { bankCode })
        },
        recipientCode: recipient.recipientCode,
        refunded: false,
        createdAt: now,
        updatedAt: now,
        ...pending
      };
      await tx.set('withdrawals', withdrawal);

      await tx.set('transactions', {
        id: receiptId(userId, reference),
        transactionId: reference,
        ownerId: userId,
        type: ReceiptType.WITHDRAWAL,
        amount: dto.amount,
        fee: 0,
        currency: debited.currency,
        reference,
        description: `Withdrawal to ${destinationLabel} - ${dto.accountName}`,
        method: destinationLabel,
        createdAt: now,
        ...pending
      });
    });

    let initiation: TransferInitiation;
    try {
      initiation = await this.gateway.initiateTransfer({
        amount: dto.amount,
        currency: wallet.currency,
        recipientCode: recipient.recipientCode,
        reference,
        reason: `Wallet withdrawal - ${reference}`
      });
    } catch (error) {
      await this.compensate(reference, 'Transfer initiation failed');
      throw isAppError(error) ? error : serviceError('paystack', error, { reference });
    }

    if (initiation.status === TransactionStatus.FAILED) {
      await this.compensate(reference, `Transfer rejected: ${initiation.providerStatus}`);
      throw serviceError('paystack', new Error('Transfer was not accepted'), {
        reference,
        providerStatus: initiation.providerStatus
      });
    }

    if (initiation.requiresOtp) {
      await this.recordAcceptedTransfer(reference, () =>
        this.states.updateTransactionState('withdrawals', reference, TransactionStatus.PENDING_OTP, {
          transferCode: initiation.transferCode,
          updatedAt: this.clock()
        })
      );
      return {
        reference,
        status: TransactionStatus.PENDING_OTP,
        requiresOtp: true,
        transferCode: initiation.transferCode
      };
    }

    const { transferCode } = initiation;
    if (transferCode) {
      await this.recordAcceptedTransfer(reference, () =>
        this.store.update('withdrawals', reference, { transferCode, updatedAt: this.clock() })
      );
    }

    logger.info(`Withdrawal ${reference} initiated`, { userId, amount: dto.amount });
    return { reference, status: TransactionStatus.PENDING, requiresOtp: false, transferCode: initiation.transferCode };
  }

  /**
   * Writes made after the gateway accepted the transfer. The money has left
   * and the operation must still succeed, so a failed write is logged and
   * left for the transfer webhook to reconcile.
   */
  private async recordAcceptedTransfer(reference: string, write: () => Promise<unknown>): Promise<void> {
    try {
      await write();
    } catch (error) {
      logger.error('Withdrawal record update failed after transfer was accepted', {
        reference,
        error: errorMessage(error)
      });
    }
  }

  /**
   * Refunds a withdrawal whose transfer never left. A failure here leaves
   * the debit in place and is logged for reconciliation.
   */
  private async compensate(reference: string, reason: string): Promise<void> {
    try {
      await this.failTransfer(reference, reason);
    } catch (error) {
      logger.error('Withdrawal refund failed, manual reconciliation required', {
        reference,
        reason,
        error: errorMessage(error)
      });
    }
  }

  async finalizeTransfer(ctx: RequestContext, dto: FinalizeTransferDto): Promise<Replayable<{ reference: string }>> {
    return this.runner.run({
      name: 'finalizeTransfer',
      ctx,
      requires: ['paystack'],
      validate: () => {
        if (!dto.transferCode || !dto.otp) {
          throw createAppError(ERROR_CODES.SYSTEM_VALIDATION_FAILED, 'Transfer code and OTP are required.');
        }
      },
      idempotency: { key: dto.idempotencyKey, resultSchema: finalizeResultSchema },
      run: async () => {
        const withdrawal = await this.store.findOne('withdrawals', {
          transferCode: dto.transferCode,
          userId: ctx.userId
        });
        if (!withdrawal) {
          throw createAppError(ERROR_CODES.TXN_NOT_FOUND, 'Withdrawal not found.');
        }

        const result = await this.gateway.finalizeTransfer(dto.transferCode, dto.otp);
        if (result.status === TransactionStatus.FAILED) {
          throw serviceError('paystack', new Error('OTP was rejected'), { reference: withdrawal.reference });
        }

        await this.states.updateTransactionState('withdrawals', withdrawal.id, TransactionStatus.PROCESSING, {
          updatedAt: this.clock()
        });
        return { reference: withdrawal.reference };
      }
    });
  }

  /**
   * Marks a withdrawal and its receipt completed.
   */
  async completeTransfer(reference: string, transferCode?: string): Promise<TransferSettlement> {
    await this.store.runTransaction(async (tx) => {
      const withdrawal = await tx.get('withdrawals', reference);
      if (!withdrawal) {
        throw createAppError(ERROR_CODES.TXN_NOT_FOUND, 'Withdrawal not found.', { reference });
      }
      const now = this.clock();
      await this.states.transitionWithin(tx, 'withdrawals', reference, TransactionStatus.COMPLETED, {
        completedAt: now,
        updatedAt: now,
        ...(transferCode ? { transferCode } : {})
      });
      await this.states.transitionWithin(
        tx,
        'transactions',
        receiptId(withdrawal.userId, reference),
        TransactionStatus.COMPLETED,
        { completedAt: now }
      );
    });

    logger.info(`Withdrawal ${reference} completed`);
    return { reference, status: TransactionStatus.COMPLETED, refunded: false };
  }

  /**
   * Returns the withdrawn amount to the wallet at most once. A transfer that
   * had already completed (a reversal) moves to refunded, anything else to
   * failed.
   */
  async failTransfer(reference: string, reason: string): Promise<TransferSettlement> {
    const settlement = await this.store.runTransaction(async (tx): Promise<TransferSettlement> => {
      const withdrawal = await tx.get('withdrawals', reference);
      if (!withdrawal) {
        throw createAppError(ERROR_CODES.TXN_NOT_FOUND, 'Withdrawal not found.', { reference });
      }
      if (withdrawal.refunded) {
        return { reference, status: withdrawal.status, refunded: false };
      }

      const now = this.clock();
      const next = withdrawal.status === TransactionStatus.COMPLETED
        ? TransactionStatus.REFUNDED
        : TransactionStatus.FAILED;

      await this.states.transitionWithin(tx, 'withdrawals', reference, next, {
        refunded: true,
        failureReason: reason,
        failedAt: now,
        updatedAt: now
      });
      await this.wallets.creditWallet(tx, withdrawal.userId, withdrawal.amount);

      const receiptKey = receiptId(withdrawal.userId, reference);
      const receipt = await tx.get('transactions', receiptKey);
      if (receipt) {
        await this.states.transitionWithin(tx, 'transactions', receiptKey, next, {
          failureReason: reason,
          failedAt: now
        });
      }
      return { reference, status: next, refunded: true };
    });

    if (settlement.refunded) {
      logger.info(`Withdrawal ${reference} ${settlement.status} and refunded`, { reason });
    }
    return settlement;
  }

  async getBanks(ctx: RequestContext, country = 'nigeria'): Promise<Bank[]> {
    this.readiness.requireReady('paystack');
    await this.kyc.enforceKyc(ctx.userId);
    return this.gateway.listBanks(country);
  }

  async verifyBankAccount(ctx: RequestContext, accountNumber: string, bankCode: string): Promise<ResolvedAccount> {
    this.readiness.requireReady('paystack');
    if (!accountNumber || !bankCode) {
      throw createAppError(ERROR_CODES.SYSTEM_VALIDATION_FAILED, 'Account number and bank code are required.');
    }
    await this.kyc.enforceKyc(ctx.userId);
    return this.gateway.resolveAccount(accountNumber, bankCode);
  }
}
