import Joi from 'joi';
import { normalizeStatus } from '../services/transaction-state.service';
import {
  IdempotencyStatus,
  KycStatus,
  MomoTransactionType,
  PaymentChannel,
  ReceiptType,
  TransactionStatus,
  WalletStatus,
  WithdrawalType
} from '../types';
import { CollectionName, Collections } from './document-store';

// Stored statuses may predate the current vocabulary ('SUCCESSFUL', 'PENDING').
const status = Joi.string().custom((value: string, helpers) => {
  const normalized = normalizeStatus(value);
  return normalized ?? helpers.error('any.invalid');
});

const historyEntry = Joi.object({
  from: Joi.string().valid(...Object.values(TransactionStatus)).allow(null),
  to: Joi.string().valid(...Object.values(TransactionStatus)).required(),
  timestamp: Joi.date().required()
});

const stateful = {
  id: Joi.string().required(),
  status: status.required(),
  previousStatus: status.allow(null),
  statusUpdatedAt: Joi.date(),
  statusHistory: Joi.array().items(historyEntry).default([])
};

const money = Joi.number().min(0);
const currency = Joi.string().length(3).uppercase();

const users = Joi.object({
  id: Joi.string().required(),
  fullName: Joi.string().allow('').default('Unknown'),
  email: Joi.string().allow(''),
  phoneNumber: Joi.string().allow(''),
  profilePhotoUrl: Joi.string().allow(''),
  currency: currency.default('NGN'),
  // Older profiles carry null or an empty string
  kycStatus: Joi.string().valid(...Object.values(KycStatus)).empty(Joi.valid('', null)),
  kycCompleted: Joi.boolean(),
  kycVerified: Joi.boolean(),
  kycVerifiedAt: Joi.date(),
  createdAt: Joi.date().required(),
  updatedAt: Joi.date().required()
});

const kycDocuments = Joi.object({
  id: Joi.string().required(),
  userId: Joi.string().required(),
  status: Joi.string().valid('pending', 'approved', 'verified', 'rejected').required(),
  updatedAt: Joi.date().required()
});

const wallets = Joi.object({
  id: Joi.string().required(),
  userId: Joi.string().required(),
  walletId: Joi.string().required(),
  currency: currency.required(),
  balance: Joi.number().required(),
  dailySpent: money.default(0),
  dailySpentDate: Joi.string().allow('').default(''),
  monthlySpent: money.default(0),
  monthlySpentMonth: Joi.string().allow('').default(''),
  dailyLimit: money.required(),
  monthlyLimit: money.required(),
  status: Joi.string().valid(...Object.values(WalletStatus)).default(WalletStatus.ACTIVE),
  createdAt: Joi.date().required(),
  updatedAt: Joi.date().required()
});

const transactions = Joi.object({
  ...stateful,
  transactionId: Joi.string().required(),
  ownerId: Joi.string().required(),
  type: Joi.string().valid(...Object.values(ReceiptType)).required(),
  senderWalletId: Joi.string(),
  receiverWalletId: Joi.string(),
  senderName: Joi.string().allow(''),
  receiverName: Joi.string().allow(''),
  amount: money.required(),
  fee: money.default(0),
  currency: currency.required(),
  senderCurrency: currency,
  receiverCurrency: currency,
  exchangeRate: Joi.number().allow(null),
  convertedAmount: Joi.number().allow(null),
  note: Joi.string().allow(''),
  reference: Joi.string().required(),
  description: Joi.string().allow(''),
  method: Joi.string(),
  failureReason: Joi.string().allow(''),
  createdAt: Joi.date().required(),
  completedAt: Joi.date(),
  failedAt: Joi.date()
});

const payments = Joi.object({
  ...stateful,
  reference: Joi.string().required(),
  userId: Joi.string().required(),
  walletId: Joi.string().required(),
  amount: money.required(),
  currency: currency.required(),
  channel: Joi.string().valid(...Object.values(PaymentChannel)).required(),
  processed: Joi.boolean().default(false),
  creditedAmount: money,
  creditedCurrency: currency,
  createdAt: Joi.date().required(),
  updatedAt: Joi.date().required(),
  completedAt: Joi.date()
});

const withdrawals = Joi.object({
  ...stateful,
  reference: Joi.string().required(),
  userId: Joi.string().required(),
  walletId: Joi.string().required(),
  amount: money.required(),
  currency: currency.required(),
  type: Joi.string().valid(...Object.values(WithdrawalType)).required(),
  destination: Joi.object({
    bankCode: Joi.string(),
    accountNumber: Joi.string().required(),
    accountName: Joi.string().allow('').required(),
    mobileMoneyProvider: Joi.string()
  }).required(),
  recipientCode: Joi.string().required(),
  transferCode: Joi.string(),
  refunded: Joi.boolean().default(false),
  failureReason: Joi.string().allow(''),
  createdAt: Joi.date().required(),
  updatedAt: Joi.date().required(),
  completedAt: Joi.date(),
  failedAt: Joi.date()
});

const momoTransactions = Joi.object({
  ...stateful,
  referenceId: Joi.string().required(),
  type: Joi.string().valid(...Object.values(MomoTransactionType)).required(),
  userId: Joi.string().required(),
  amount: money.required(),
  currency: currency.required(),
  phoneNumber: Joi.string().required(),
  walletAmount: money.required(),
  walletCurrency: currency.required(),
  providerStatus: Joi.string(),
  callbackStatus: Joi.string().allow(null),
  verifiedStatus: Joi.string().allow(null),
  financialTransactionId: Joi.string(),
  refunded: Joi.boolean().default(false),
  failureReason: Joi.string().allow(''),
  createdAt: Joi.date().required(),
  updatedAt: Joi.date().required(),
  completedAt: Joi.date(),
  failedAt: Joi.date()
});

const idempotencyKeys = Joi.object({
  id: Joi.string().required(),
  userId: Joi.string().required(),
  operation: Joi.string().required(),
  status: Joi.string().valid(...Object.values(IdempotencyStatus)).required(),
  result: Joi.any(),
  error: Joi.string().allow(''),
  createdAt: Joi.date().required(),
  expiresAt: Joi.date().required(),
  completedAt: Joi.date(),
  failedAt: Joi.date(),
  retryAt: Joi.date()
});

const rateLimits = Joi.object({
  id: Joi.string().required(),
  userId: Joi.string().required(),
  operation: Joi.string().required(),
  timestamps: Joi.array().items(Joi.number()).default([]),
  updatedAt: Joi.date().required()
});

const auditLogs = Joi.object({
  id: Joi.string().required(),
  userId: Joi.string().required(),
  operation: Joi.string().required(),
  result: Joi.string().valid('success', 'failure').required(),
  amount: Joi.number(),
  currency: Joi.string(),
  error: Joi.string().allow(''),
  metadata: Joi.object().unknown(true),
  ipHash: Joi.string().required(),
  timestamp: Joi.date().required()
});

const currencyBalance = Joi.object({
  amount: Joi.number().required(),
  usdEquivalent: Joi.number().required(),
  txCount: Joi.number().integer().min(0).required(),
  lastTransactionAt: Joi.date().required()
});

const platformWallet = Joi.object({
  id: Joi.string().required(),
  walletId: Joi.string().required(),
  totalBalanceUSD: Joi.number().default(0),
  totalTransactions: Joi.number().integer().min(0).default(0),
  totalFeesCollected: Joi.number().integer().min(0).default(0),
  balances: Joi.object().pattern(Joi.string(), currencyBalance).default({}),
  createdAt: Joi.date().required(),
  updatedAt: Joi.date().required()
});

const platformFees = Joi.object({
  id: Joi.string().required(),
  transactionId: Joi.string().required(),
  fee: Joi.number().required(),
  currency: currency.required(),
  usdAmount: Joi.number().required(),
  exchangeRate: Joi.number().positive().required(),
  rateAgeMs: Joi.number().allow(null).required(),
  senderId: Joi.string().required(),
  senderName: Joi.string().allow('').required(),
  transferAmount: Joi.number().required(),
  createdAt: Joi.date().required()
});

const exchangeRates = Joi.object({
  id: Joi.string().required(),
  base: currency.default('USD'),
  rates: Joi.object().pattern(Joi.string(), Joi.number().positive()).required(),
  source: Joi.string().default('unknown'),
  updatedAt: Joi.date().required()
});

type RecordSchemas = { [C in CollectionName]: Joi.ObjectSchema<Collections[C]> };

export const RECORD_SCHEMAS: RecordSchemas = {
  users,
  kyc_documents: kycDocuments,
  wallets,
  transactions,
  payments,
  withdrawals,
  momo_transactions: momoTransactions,
  idempotency_keys: idempotencyKeys,
  rate_limits: rateLimits,
  audit_logs: auditLogs,
  platform_wallet: platformWallet,
  platform_fees: platformFees,
  app_config: exchangeRates
};

export class RecordDecodeError extends Error {
  constructor(collection: CollectionName, id: unknown, detail: string) {
    super(`Malformed ${collection} record ${String(id)}: ${detail}`);
    this.name = 'RecordDecodeError';
  }
}

/**
 * Validates a raw stored document into its record type. Unknown fields are
 * dropped.
 */
export const decodeRecord = <C extends CollectionName>(
  collection: C,
  raw: Record<string, unknown>
): Collections[C] => {
  const { value, error } = RECORD_SCHEMAS[collection].validate(raw, {
    stripUnknown: true,
    convert: true
  });
  if (error || value === undefined) {
    throw new RecordDecodeError(collection, raw.id, error ? error.message : 'empty document');
  }
  return value;
};
