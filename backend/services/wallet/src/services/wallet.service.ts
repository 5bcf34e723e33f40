import Joi from 'joi';
import { AppConfig, config } from '../config';
import { DocumentStore, DocumentTransaction } from '../store/document-store';
import {
  CreateAccountDto,
  PlatformWallet,
  ReceiptType,
  RequestContext,
  SendMoneyDto,
  SendMoneyResult,
  TransactionReceipt,
  TransactionStatus,
  UserRecord,
  Wallet,
  WalletLookupResult,
  WalletStatus
} from '../types';
import { BoundedWindowCache } from '../utils/bounded-window-cache';
import { Clock, systemClock } from '../utils/clock';
import { generateTransactionId, generateWalletId, hashIp, WALLET_ID_PATTERN } from '../utils/crypto';
import { createAppError, ERROR_CODES } from '../utils/errors';
import { logger } from '../utils/logger';
import { computeTransferFee, dayKey, isValidAmount, monthKey, roundMoney } from '../utils/money';
import { ExchangeRateService, isSupportedCurrency, RateSnapshot } from './exchange-rate.service';
import { Replayable } from './idempotency.service';
import { KycService } from './kyc.service';
import { OperationRunner } from './operation-runner';
import { RateLimitService } from './rate-limit.service';
import { initialStateFields } from './transaction-state.service';

export const PLATFORM_WALLET_ID = 'platform';

const WALLET_ID_ATTEMPTS = 5;
export const DEFAULT_DISPLAY_NAME = 'Wallet User';

export interface WalletView {
  walletId: string;
  currency: string;
  balance: number;
  status: WalletStatus;
  dailyLimit: number;
  monthlyLimit: number;
  dailySpent: number;
  monthlySpent: number;
}

export interface TransactionQuery {
  limit?: number;
  type?: ReceiptType;
}

export const receiptId = (ownerId: string, transactionId: string): string => `${ownerId}:${transactionId}`;

export const sendMoneyResultSchema = Joi.object<SendMoneyResult>({
  transactionId: Joi.string().required(),
  amount: Joi.number().required(),
  fee: Joi.number().required(),
  currency: Joi.string().required(),
  recipientName: Joi.string().required(),
  newBalance: Joi.number().required()
});

const toView = (wallet: Wallet): WalletView => ({
  walletId: wallet.walletId,
  currency: wallet.currency,
  balance: wallet.balance,
  status: wallet.status,
  dailyLimit: wallet.dailyLimit,
  monthlyLimit: wallet.monthlyLimit,
  dailySpent: wallet.dailySpent,
  monthlySpent: wallet.monthlySpent
});

/**
 * Spend counters as of `now`, with windows from an earlier day or month
 * reset to zero.
 */
export const rolledSpending = (wallet: Wallet, now: Date) => {
  const today = dayKey(now);
  const month = monthKey(now);
  return {
    dailySpent: wallet.dailySpentDate === today ? wallet.dailySpent : 0,
    dailySpentDate: today,
    monthlySpent: wallet.monthlySpentMonth === month ? wallet.monthlySpent : 0,
    monthlySpentMonth: month
  };
};

export interface DebitOptions {
  /** Count the debit against the daily and monthly spending limits. */
  trackSpending?: boolean;
}

export class WalletService {
  private readonly ipBurst: BoundedWindowCache;
  private readonly failedLookups: BoundedWindowCache;

  constructor(
    private readonly store: DocumentStore,
    private readonly runner: OperationRunner,
    private readonly kyc: KycService,
    private readonly rateLimits: RateLimitService,
    private readonly rates: ExchangeRateService,
    private readonly clock: Clock = systemClock,
    private readonly limits: AppConfig['limits'] = config.limits
  ) {
    this.ipBurst = new BoundedWindowCache({ windowMs: 60 * 1000, maxEvents: 100, maxKeys: 10_000, clock });
    this.failedLookups = new BoundedWindowCache({ windowMs: 5 * 60 * 1000, maxEvents: 10, maxKeys: 10_000, clock });
  }

  /**
   * Creates the user profile and wallet together. Calling it again for a
   * user who already has a wallet returns that wallet unchanged.
   */
  async createAccount(userId: string, dto: CreateAccountDto): Promise<{ created: boolean; wallet: WalletView }> {
    const currency = (dto.currency ?? this.limits.defaultCurrency).toUpperCase();
    if (!isSupportedCurrency(currency)) {
      throw createAppError(ERROR_CODES.SYSTEM_VALIDATION_FAILED, `Unsupported currency ${currency}.`, { currency });
    }

    const outcome = await this.store.runTransaction(async (tx) => {
      const existing = await tx.get('wallets', userId);
      if (existing) {
        return { created: false, wallet: existing };
      }

      const walletId = await this.uniqueWalletId(tx);
      const now = this.clock();
      const user = await tx.get('users', userId);
      if (!user) {
        await tx.set('users', {
          id: userId,
          fullName: dto.fullName,
          email: dto.email,
          phoneNumber: dto.phoneNumber,
          profilePhotoUrl: dto.profilePhotoUrl,
          currency,
          createdAt: now,
          updatedAt: now
        });
      }

      const wallet: Wallet = {
        id: userId,
        userId,
        walletId,
        currency,
        balance: 0,
        dailySpent: 0,
        dailySpentDate: dayKey(now),
        monthlySpent: 0,
        monthlySpentMonth: monthKey(now),
        dailyLimit: this.limits.dailyLimit,
        monthlyLimit: this.limits.monthlyLimit,
        status: WalletStatus.ACTIVE,
        createdAt: now,
        updatedAt: now
      };
      await tx.set('wallets', wallet);
      return { created: true, wallet };
    });

    if (outcome.created) {
      logger.info(`Wallet ${outcome.wallet.walletId} created for user ${userId}`);
    }
    return { created: outcome.created, wallet: toView(outcome.wallet) };
  }

  private async uniqueWalletId(tx: DocumentTransaction): Promise<string> {
    for (let attempt = 0; attempt < WALLET_ID_ATTEMPTS; attempt++) {
      const candidate = generateWalletId();
      const clash = await tx.findOne('wallets', { walletId: candidate });
      if (!clash) {
        return candidate;
      }
    }
    throw createAppError(ERROR_CODES.SYSTEM_INTERNAL_ERROR, 'Could not allocate a wallet ID.');
  }

  async getWallet(ctx: RequestContext): Promise<WalletView> {
    await this.kyc.enforceKyc(ctx.userId);
    const wallet = await this.store.get('wallets', ctx.userId);
    if (!wallet) {
      throw createAppError(ERROR_CODES.WALLET_NOT_FOUND, undefined, { userId: ctx.userId });
    }
    return toView(wallet);
  }

  async listTransactions(ctx: RequestContext, query: TransactionQuery = {}): Promise<TransactionReceipt[]> {
    await this.kyc.enforceKyc(ctx.userId);
    const limit = Math.min(Math.max(query.limit ?? 20, 1), 100);
    return this.store.find(
      'transactions',
      query.type ? { ownerId: ctx.userId, type: query.type } : { ownerId: ctx.userId },
      { sortBy: 'createdAt', descending: true, limit }
    );
  }

  async sendMoney(ctx: RequestContext, dto: SendMoneyDto): Promise<Replayable<SendMoneyResult>> {
    return this.runner.run({
      name: 'sendMoney',
      ctx,
      validate: () => {
        if (!dto.recipientWalletId || typeof dto.recipientWalletId !== 'string') {
          throw createAppError(ERROR_CODES.TXN_RECIPIENT_NOT_FOUND, 'Invalid recipient wallet ID.');
        }
        if (!isValidAmount(dto.amount)) {
          throw createAppError(ERROR_CODES.TXN_AMOUNT_INVALID, 'Amount must be positive.');
        }
        if (dto.amount > this.limits.maxTransferAmount) {
          throw createAppError(ERROR_CODES.TXN_AMOUNT_TOO_LARGE, undefined, {
            max: this.limits.maxTransferAmount
          });
        }
      },
      rateLimit: 'sendMoney',
      idempotency: { key: dto.idempotencyKey, resultSchema: sendMoneyResultSchema },
      audit: { amount: dto.amount, metadata: { recipientWalletId: dto.recipientWalletId } },
      auditResult: (result) => ({
        currency: result.currency,
        metadata: { transactionId: result.transactionId, fee: result.fee }
      }),
      run: (sender) => this.transfer(sender, dto)
    });
  }

  /**
   * Moves `amount` plus fee out of the sender's wallet and the converted
   * amount into the recipient's, with both receipts and the fee booking,
   * as one unit.
   */
  private async transfer(sender: UserRecord, dto: SendMoneyDto): Promise<SendMoneyResult> {
    const snapshot = await this.rates.snapshot();
    const { amount, recipientWalletId } = dto;

    const result = await this.store.runTransaction(async (tx) => {
      const now = this.clock();
      const senderWallet = await tx.get('wallets', sender.id);
      if (!senderWallet) {
        throw createAppError(ERROR_CODES.WALLET_NOT_FOUND, 'Sender wallet not found.', { userId: sender.id });
      }
      if (senderWallet.status === WalletStatus.SUSPENDED) {
        throw createAppError(ERROR_CODES.WALLET_SUSPENDED, undefined, { walletId: senderWallet.walletId });
      }
      if (senderWallet.walletId === recipientWalletId) {
        throw createAppError(ERROR_CODES.TXN_SELF_TRANSFER);
      }

      const fee = computeTransferFee(amount);
      const totalDebit = roundMoney(amount + fee);
      if (senderWallet.balance < totalDebit) {
        throw createAppError(ERROR_CODES.WALLET_INSUFFICIENT_FUNDS, undefined, {
          required: totalDebit,
          currency: senderWallet.currency
        });
      }
      this.assertWithinLimits(senderWallet, totalDebit, now);

      const recipientWallet = await tx.findOne('wallets', { walletId: recipientWalletId });
      if (!recipientWallet) {
        throw createAppError(ERROR_CODES.TXN_RECIPIENT_NOT_FOUND, undefined, { recipientWalletId });
      }
      if (recipientWallet.status === WalletStatus.SUSPENDED) {
        throw createAppError(ERROR_CODES.WALLET_SUSPENDED, 'The recipient wallet is suspended.', {
          walletId: recipientWalletId
        });
      }

      const conversion = snapshot.convert(amount, senderWallet.currency, recipientWallet.currency);
      const converted = senderWallet.currency !== recipientWallet.currency;
      const recipientUser = await tx.get('users', recipientWallet.userId);
      const senderName = sender.fullName || DEFAULT_DISPLAY_NAME;
      const recipientName = recipientUser?.fullName || DEFAULT_DISPLAY_NAME;

      const debited = await this.debitWallet(tx, sender.id, totalDebit, { trackSpending: true });
      await this.creditWallet(tx, recipientWallet.userId, conversion.amount);

      const transactionId = generateTransactionId();
      const shared = {
        transactionId,
        senderWalletId: senderWallet.walletId,
        receiverWalletId: recipientWallet.walletId,
        senderName,
        receiverName: recipientName,
        senderCurrency: senderWallet.currency,
        receiverCurrency: recipientWallet.currency,
        exchangeRate: converted ? conversion.rate : null,
        convertedAmount: converted ? conversion.amount : null,
        note: dto.note ?? '',
        reference: `TXN-${now.getTime()}`,
        createdAt: now,
        completedAt: now,
        ...initialStateFields(TransactionStatus.COMPLETED, now)
      };
      await tx.set('transactions', {
        ...shared,
        id: receiptId(sender.id, transactionId),
        ownerId: sender.id,
        type: ReceiptType.SEND,
        amount,
        fee,
        currency: senderWallet.currency
      });
      await tx.set('transactions', {
        ...shared,
        id: receiptId(recipientWallet.userId, transactionId),
        ownerId: recipientWallet.userId,
        type: ReceiptType.RECEIVE,
        amount: conversion.amount,
        fee: 0,
        currency: recipientWallet.currency
      });

      await this.collectFee(tx, snapshot, {
        transactionId,
        fee,
        currency: senderWallet.currency,
        senderId: sender.id,
        senderName,
        transferAmount: amount,
        now
      });

      return {
        transactionId,
        amount,
        fee,
        currency: senderWallet.currency,
        recipientName,
        newBalance: debited.balance
      };
    });

    logger.info(`Transfer ${result.transactionId} completed`, { userId: sender.id, amount, fee: result.fee });
    return result;
  }

  private assertWithinLimits(wallet: Wallet, total: number, now: Date): void {
    const spending = rolledSpending(wallet, now);
    if (spending.dailySpent + total > wallet.dailyLimit) {
      throw createAppError(ERROR_CODES.WALLET_LIMIT_EXCEEDED, 'This transfer exceeds your daily limit.', {
        limit: 'daily',
        dailyLimit: wallet.dailyLimit,
        dailySpent: spending.dailySpent
      });
    }
    if (spending.monthlySpent + total > wallet.monthlyLimit) {
      throw createAppError(ERROR_CODES.WALLET_LIMIT_EXCEEDED, 'This transfer exceeds your monthly limit.', {
        limit: 'monthly',
        monthlyLimit: wallet.monthlyLimit,
        monthlySpent: spending.monthlySpent
      });
    }
  }

  private async collectFee(
    tx: DocumentTransaction,
    snapshot: RateSnapshot,
    entry: {
      transactionId: string;
      fee: number;
      currency: string;
      senderId: string;
      senderName: string;
      transferAmount: number;
      now: Date;
    }
  ): Promise<void> {
    const { fee, currency, now } = entry;
    const valuation = snapshot.toUsd(fee, currency);
    const platform = await tx.get('platform_wallet', PLATFORM_WALLET_ID);
    const current = platform?.balances[currency];

    const updated: PlatformWallet = {
      id: PLATFORM_WALLET_ID,
      walletId: platform?.walletId ?? 'PLATFORM',
      totalBalanceUSD: roundMoney((platform?.totalBalanceUSD ?? 0) + valuation.usdAmount),
      totalTransactions: (platform?.totalTransactions ?? 0) + 1,
      totalFeesCollected: (platform?.totalFeesCollected ?? 0) + 1,
      balances: {
        ...platform?.balances,
        [currency]: {
          amount: roundMoney((current?.amount ?? 0) + fee),
          usdEquivalent: roundMoney((current?.usdEquivalent ?? 0) + valuation.usdAmount),
          txCount: (current?.txCount ?? 0) + 1,
          lastTransactionAt: now
        }
      },
      createdAt: platform?.createdAt ?? now,
      updatedAt: now
    };
    await tx.set('platform_wallet', updated);

    await tx.set('platform_fees', {
      id: entry.transactionId,
      transactionId: entry.transactionId,
      fee,
      currency,
      usdAmount: roundMoney(valuation.usdAmount),
      exchangeRate: valuation.rate,
      rateAgeMs: valuation.rateAgeMs,
      senderId: entry.senderId,
      senderName: entry.senderName,
      transferAmount: entry.transferAmount,
      createdAt: now
    });
  }

  /**
   * Resolves a public wallet id to a display name. Guarded by a per-IP burst
   * limit, a per-IP cooldown after repeated misses and the persistent
   * per-user limit.
   */
  async lookupWallet(ctx: RequestContext, walletId: unknown): Promise<WalletLookupResult> {
    const ipKey = hashIp(ctx.ip);

    if (!this.ipBurst.tryConsume(ipKey)) {
      throw createAppError(ERROR_CODES.RATE_LIMIT_EXCEEDED, 'Too many requests from this location.');
    }
    if (this.failedLookups.isBlocked(ipKey)) {
      throw createAppError(ERROR_CODES.RATE_COOLDOWN_ACTIVE, 'Too many failed attempts. Please wait 5 minutes.');
    }

    await this.rateLimits.enforceRateLimit(ctx.userId, 'lookupWallet');

    if (typeof walletId !== 'string' || !walletId) {
      throw createAppError(ERROR_CODES.SYSTEM_VALIDATION_FAILED, 'Invalid wallet ID.');
    }

    const normalized = walletId.trim().toUpperCase();
    const wallet = WALLET_ID_PATTERN.test(normalized)
      ? await this.store.findOne('wallets', { walletId: normalized })
      : null;

    if (!wallet) {
      this.failedLookups.record(ipKey);
      return { found: false, walletId: normalized, displayName: null, photoUrl: null };
    }

    const user = await this.store.get('users', wallet.userId);
    return {
      found: true,
      walletId: wallet.walletId,
      displayName: user?.fullName || DEFAULT_DISPLAY_NAME,
      photoUrl: user?.profilePhotoUrl ?? null
    };
  }

  /**
   * Removes `amount` from the user's wallet inside a caller-owned unit.
   */
  async debitWallet(
    tx: DocumentTransaction,
    userId: string,
    amount: number,
    options: DebitOptions = {}
  ): Promise<Wallet> {
    const wallet = await tx.get('wallets', userId);
    if (!wallet) {
      throw createAppError(ERROR_CODES.WALLET_NOT_FOUND, undefined, { userId });
    }
    if (wallet.balance < amount) {
      throw createAppError(ERROR_CODES.WALLET_INSUFFICIENT_FUNDS, undefined, {
        required: amount,
        currency: wallet.currency
      });
    }

    const now = this.clock();
    let spending: Partial<Wallet> = {};
    if (options.trackSpending) {
      const rolled = rolledSpending(wallet, now);
      spending = {
        ...rolled,
        dailySpent: roundMoney(rolled.dailySpent + amount),
        monthlySpent: roundMoney(rolled.monthlySpent + amount)
      };
    }

    const patch = { balance: roundMoney(wallet.balance - amount), ...spending, updatedAt: now };
    await tx.update('wallets', userId, patch);
    return { ...wallet, ...patch };
  }

  /**
   * Adds `amount` to the user's wallet inside a caller-owned unit.
   */
  async creditWallet(tx: DocumentTransaction, userId: string, amount: number): Promise<Wallet> {
    const wallet = await tx.get('wallets', userId);
    if (!wallet) {
      throw createAppError(ERROR_CODES.WALLET_NOT_FOUND, undefined, { userId });
    }
    const patch = { balance: roundMoney(wallet.balance + amount), updatedAt: this.clock() };
    await tx.update('wallets', userId, patch);
    return { ...wallet, ...patch };
  }
}
