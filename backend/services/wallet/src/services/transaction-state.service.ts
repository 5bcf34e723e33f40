import { Collections, DocumentStore, DocumentTransaction } from '../store/document-store';
import { StatusHistoryEntry, TransactionStatus } from '../types';
import { Clock, systemClock } from '../utils/clock';
import { createAppError, ERROR_CODES } from '../utils/errors';
import { logger } from '../utils/logger';

export const TERMINAL_STATES: ReadonlySet<TransactionStatus> = new Set([
  TransactionStatus.REFUNDED,
  TransactionStatus.CANCELLED
]);

export const VALID_TRANSITIONS: Record<TransactionStatus, readonly TransactionStatus[]> = {
  [TransactionStatus.CREATED]: [
    TransactionStatus.PENDING,
    TransactionStatus.COMPLETED,
    TransactionStatus.CANCELLED
  ],
  [TransactionStatus.PENDING]: [
    TransactionStatus.PROCESSING,
    TransactionStatus.PENDING_OTP,
    TransactionStatus.COMPLETED,
    TransactionStatus.FAILED,
    TransactionStatus.CANCELLED
  ],
  [TransactionStatus.PENDING_OTP]: [
    TransactionStatus.PROCESSING,
    TransactionStatus.FAILED,
    TransactionStatus.CANCELLED
  ],
  [TransactionStatus.PROCESSING]: [TransactionStatus.COMPLETED, TransactionStatus.FAILED],
  [TransactionStatus.COMPLETED]: [TransactionStatus.REFUNDED],
  [TransactionStatus.FAILED]: [TransactionStatus.REFUNDED, TransactionStatus.PENDING],
  [TransactionStatus.REFUNDED]: [],
  [TransactionStatus.CANCELLED]: []
};

const KNOWN_STATES: ReadonlySet<string> = new Set(Object.values(TransactionStatus));

const isTransactionStatus = (value: string): value is TransactionStatus => KNOWN_STATES.has(value);

/**
 * Maps a stored or gateway status onto the internal vocabulary.
 * Missing values mean the record was never started. Returns undefined for
 * values outside the vocabulary.
 */
export const normalizeStatus = (raw: string | null | undefined): TransactionStatus | undefined => {
  if (raw === null || raw === undefined || raw.trim() === '') {
    return TransactionStatus.CREATED;
  }
  const value = raw.trim().toLowerCase();
  if (value === 'successful' || value === 'success') {
    return TransactionStatus.COMPLETED;
  }
  return isTransactionStatus(value) ? value : undefined;
};

export const isTerminal = (status: TransactionStatus): boolean => TERMINAL_STATES.has(status);

export const canTransition = (from: TransactionStatus, to: TransactionStatus): boolean =>
  !isTerminal(from) && VALID_TRANSITIONS[from].includes(to);

/**
 * Throws TXN_INVALID_STATE unless `from -> to` is an allowed edge.
 */
export const validateTransition = (
  from: TransactionStatus,
  to: TransactionStatus,
  documentId: string
): void => {
  if (canTransition(from, to)) {
    return;
  }

  let reason: string;
  if (isTerminal(from)) {
    reason = `Transaction is in terminal state "${from}"`;
  } else if (from === TransactionStatus.COMPLETED) {
    reason = 'Completed transactions can only be refunded';
  } else {
    reason = `Cannot move from "${from}" to "${to}"`;
  }

  throw createAppError(ERROR_CODES.TXN_INVALID_STATE, reason, {
    transactionId: documentId,
    from,
    to
  });
};

export interface TransitionFields {
  status: TransactionStatus;
  previousStatus: TransactionStatus | null;
  statusUpdatedAt: Date;
  statusHistory: StatusHistoryEntry[];
}

/**
 * Computes the fields to merge for a transition inside a caller-owned unit.
 */
export const buildTransitionFields = (
  current: TransactionStatus | undefined,
  next: TransactionStatus,
  documentId: string,
  history: StatusHistoryEntry[] = [],
  at: Date = new Date()
): TransitionFields => {
  const from = current ?? TransactionStatus.CREATED;
  validateTransition(from, next, documentId);

  return {
    status: next,
    previousStatus: from,
    statusUpdatedAt: at,
    statusHistory: [...history, { from, to: next, timestamp: at }]
  };
};

/**
 * Fields for a record entering its first state.
 */
export const initialStateFields = (status: TransactionStatus, at: Date): TransitionFields => ({
  status,
  previousStatus: null,
  statusUpdatedAt: at,
  statusHistory: [{ from: null, to: status, timestamp: at }]
});

export type StatefulCollection = 'transactions' | 'withdrawals' | 'momo_transactions' | 'payments';

export type StatefulPatch = Partial<Collections[StatefulCollection]>;

export class TransactionStateService {
  constructor(
    private readonly store: DocumentStore,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Applies a transition inside an existing unit of work.
   */
  async transitionWithin(
    tx: DocumentTransaction,
    collection: StatefulCollection,
    id: string,
    next: TransactionStatus,
    extra: StatefulPatch = {}
  ): Promise<TransitionFields> {
    const record = await tx.get(collection, id);
    if (!record) {
      throw createAppError(ERROR_CODES.TXN_NOT_FOUND, undefined, { transactionId: id });
    }

    const fields = buildTransitionFields(record.status, next, id, record.statusHistory, this.clock());
    await tx.update(collection, id, { ...extra, ...fields });
    return fields;
  }

  /**
   * Standalone read-validate-write.
   */
  async updateTransactionState(
    collection: StatefulCollection,
    id: string,
    next: TransactionStatus,
    extra: StatefulPatch = {}
  ): Promise<TransitionFields> {
    const fields = await this.store.runTransaction((tx) =>
      this.transitionWithin(tx, collection, id, next, extra)
    );

    logger.info(`State transition ${collection}/${id}: ${fields.previousStatus} -> ${fields.status}`);
    return fields;
  }
}
