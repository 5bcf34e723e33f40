export enum TransactionStatus {
  CREATED = 'created',
  PENDING = 'pending',
  PENDING_OTP = 'pending_otp',
  PROCESSING = 'processing',
  COMPLETED = 'completed',
  FAILED = 'failed',
  REFUNDED = 'refunded',
  CANCELLED = 'cancelled'
}

export interface StatusHistoryEntry {
  from: TransactionStatus | null;
  to: TransactionStatus;
  timestamp: Date;
}

/**
 * Any financial record whose status is owned by the state machine.
 */
export interface StatefulRecord {
  id: string;
  status: TransactionStatus;
  previousStatus?: TransactionStatus | null;
  statusUpdatedAt?: Date;
  statusHistory: StatusHistoryEntry[];
}

export enum ReceiptType {
  SEND = 'send',
  RECEIVE = 'receive',
  DEPOSIT = 'deposit',
  WITHDRAWAL = 'withdrawal'
}

export interface TransactionReceipt extends StatefulRecord {
  transactionId: string;
  ownerId: string;
  type: ReceiptType;
  senderWalletId?: string;
  receiverWalletId?: string;
  senderName?: string;
  receiverName?: string;
  amount: number;
  fee: number;
  currency: string;
  senderCurrency?: string;
  receiverCurrency?: string;
  exchangeRate?: number | null;
  convertedAmount?: number | null;
  note?: string;
  reference: string;
  description?: string;
  method?: string;
  failureReason?: string;
  createdAt: Date;
  completedAt?: Date;
  failedAt?: Date;
}

export enum WithdrawalType {
  BANK = 'bank',
  MOBILE_MONEY = 'mobile_money'
}

export interface WithdrawalDestination {
  bankCode?: string;
  accountNumber: string;
  accountName: string;
  mobileMoneyProvider?: string;
}

export interface Withdrawal extends StatefulRecord {
  reference: string;
  userId: string;
  walletId: string;
  amount: number;
  currency: string;
  type: WithdrawalType;
  destination: WithdrawalDestination;
  recipientCode: string;
  transferCode?: string;
  refunded: boolean;
  failureReason?: string;
  createdAt: Date;
  updatedAt: Date;
  completedAt?: Date;
  failedAt?: Date;
}

export enum MomoTransactionType {
  COLLECTION = 'collection',
  DISBURSEMENT = 'disbursement'
}

export interface MomoTransaction extends StatefulRecord {
  referenceId: string;
  type: MomoTransactionType;
  userId: string;
  amount: number;
  currency: string;
  phoneNumber: string;
  /** Amount debited from or credited to the wallet, in the wallet currency. */
  walletAmount: number;
  walletCurrency: string;
  providerStatus?: string;
  callbackStatus?: string | null;
  verifiedStatus?: string | null;
  financialTransactionId?: string;
  refunded: boolean;
  failureReason?: string;
  createdAt: Date;
  updatedAt: Date;
  completedAt?: Date;
  failedAt?: Date;
}

export enum PaymentChannel {
  CARD = 'card',
  MOBILE_MONEY = 'mobile_money',
  BANK = 'bank'
}

export interface Payment extends StatefulRecord {
  reference: string;
  userId: string;
  walletId: string;
  amount: number;
  currency: string;
  channel: PaymentChannel;
  processed: boolean;
  creditedAmount?: number;
  creditedCurrency?: string;
  createdAt: Date;
  updatedAt: Date;
  completedAt?: Date;
}
