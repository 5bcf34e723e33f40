import {
  AuditLogEntry,
  ExchangeRateTable,
  IdempotencyRecord,
  KycDocuments,
  MomoTransaction,
  Payment,
  PlatformFee,
  PlatformWallet,
  RateLimitWindow,
  TransactionReceipt,
  UserRecord,
  Wallet,
  Withdrawal
} from '../types';

/**
 * Collection name to record type. Every record carries its document id as `id`.
 */
export interface Collections {
  users: UserRecord;
  kyc_documents: KycDocuments;
  wallets: Wallet;
  transactions: TransactionReceipt;
  payments: Payment;
  withdrawals: Withdrawal;
  momo_transactions: MomoTransaction;
  idempotency_keys: IdempotencyRecord;
  rate_limits: RateLimitWindow;
  audit_logs: AuditLogEntry;
  platform_wallet: PlatformWallet;
  platform_fees: PlatformFee;
  app_config: ExchangeRateTable;
}

export type CollectionName = keyof Collections;

export const COLLECTION_NAMES: CollectionName[] = [
  'users',
  'kyc_documents',
  'wallets',
  'transactions',
  'payments',
  'withdrawals',
  'momo_transactions',
  'idempotency_keys',
  'rate_limits',
  'audit_logs',
  'platform_wallet',
  'platform_fees',
  'app_config'
];

/** Equality match on every given field. */
export type DocumentFilter<C extends CollectionName> = Partial<Collections[C]>;

export type DocumentField<C extends CollectionName> = keyof Collections[C] & string;

export interface FindOptions<C extends CollectionName> {
  sortBy?: DocumentField<C>;
  descending?: boolean;
  limit?: number;
}

export interface DocumentReader {
  get<C extends CollectionName>(collection: C, id: string): Promise<Collections[C] | null>;
  findOne<C extends CollectionName>(
    collection: C,
    filter: DocumentFilter<C>
  ): Promise<Collections[C] | null>;
}

/**
 * Handle passed to a unit of work. Reads see the unit's own writes; all
 * writes land together or not at all.
 */
export interface DocumentTransaction extends DocumentReader {
  set<C extends CollectionName>(collection: C, doc: Collections[C]): Promise<void>;
  update<C extends CollectionName>(
    collection: C,
    id: string,
    patch: Partial<Collections[C]>
  ): Promise<void>;
}

export interface DocumentStore extends DocumentReader {
  /**
   * Runs `work` as one atomic read-modify-write unit. The store may retry
   * `work` on write conflicts, so it must not call external services.
   */
  runTransaction<T>(work: (tx: DocumentTransaction) => Promise<T>): Promise<T>;
  find<C extends CollectionName>(
    collection: C,
    filter: DocumentFilter<C>,
    options?: FindOptions<C>
  ): Promise<Collections[C][]>;
  insert<C extends CollectionName>(collection: C, doc: Collections[C]): Promise<void>;
  update<C extends CollectionName>(
    collection: C,
    id: string,
    patch: Partial<Collections[C]>
  ): Promise<void>;
  /** Deletes up to `limit` documents whose `field` is before `cutoff`. */
  deleteOlderThan<C extends CollectionName>(
    collection: C,
    field: DocumentField<C>,
    cutoff: Date,
    limit: number
  ): Promise<number>;
}

export class DocumentNotFoundError extends Error {
  constructor(collection: CollectionName, id: string) {
    super(`Document ${collection}/${id} does not exist`);
    this.name = 'DocumentNotFoundError';
  }
}

/** Removes undefined fields so they are not persisted as nulls. */
export const compact = (fields: object): Record<string, unknown> => {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
};
