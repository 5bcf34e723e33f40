export enum WalletStatus {
  ACTIVE = 'active',
  SUSPENDED = 'suspended'
}

export enum KycStatus {
  PENDING = 'pending',
  VERIFIED = 'verified',
  REJECTED = 'rejected'
}

export interface UserRecord {
  id: string;
  fullName: string;
  email?: string;
  phoneNumber?: string;
  profilePhotoUrl?: string;
  currency: string;
  kycStatus?: KycStatus;
  // Legacy completion flags, superseded by kycStatus
  kycCompleted?: boolean;
  kycVerified?: boolean;
  kycVerifiedAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

export type KycDocumentStatus = 'pending' | 'approved' | 'verified' | 'rejected';

export interface KycDocuments {
  id: string;
  userId: string;
  status: KycDocumentStatus;
  updatedAt: Date;
}

export interface Wallet {
  id: string;
  userId: string;
  walletId: string;
  currency: string;
  balance: number;
  dailySpent: number;
  dailySpentDate: string;
  monthlySpent: number;
  monthlySpentMonth: string;
  dailyLimit: number;
  monthlyLimit: number;
  status: WalletStatus;
  createdAt: Date;
  updatedAt: Date;
}

export interface PlatformCurrencyBalance {
  amount: number;
  usdEquivalent: number;
  txCount: number;
  lastTransactionAt: Date;
}

export interface PlatformWallet {
  id: string;
  walletId: string;
  totalBalanceUSD: number;
  totalTransactions: number;
  totalFeesCollected: number;
  balances: Record<string, PlatformCurrencyBalance>;
  createdAt: Date;
  updatedAt: Date;
}

export interface PlatformFee {
  id: string;
  transactionId: string;
  fee: number;
  currency: string;
  usdAmount: number;
  exchangeRate: number;
  rateAgeMs: number | null;
  senderId: string;
  senderName: string;
  transferAmount: number;
  createdAt: Date;
}

export interface ExchangeRateTable {
  id: string;
  base: string;
  rates: Record<string, number>;
  source: string;
  updatedAt: Date;
}

export interface CreateAccountDto {
  fullName: string;
  email?: string;
  phoneNumber?: string;
  profilePhotoUrl?: string;
  currency?: string;
}

export interface SendMoneyDto {
  recipientWalletId: string;
  amount: number;
  note?: string;
  idempotencyKey?: string;
}

export interface SendMoneyResult {
  transactionId: string;
  amount: number;
  fee: number;
  currency: string;
  recipientName: string;
  newBalance: number;
}

export interface WalletLookupResult {
  found: boolean;
  walletId: string;
  displayName: string | null;
  photoUrl: string | null;
}
