import { DocumentStore } from '../store/document-store';
import { AuditLogEntry, AuditResult } from '../types';
import { Clock, systemClock } from '../utils/clock';
import { generateUuid, hashIp } from '../utils/crypto';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface AuditEvent {
  userId: string;
  operation: string;
  result: AuditResult;
  amount?: number;
  currency?: string;
  error?: string;
  metadata?: Record<string, unknown>;
  ip?: string;
}

export class AuditService {
  constructor(
    private readonly store: DocumentStore,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Appends an entry to the audit trail. Never throws: a failed write is
   * logged with the entry and the caller carries on.
   */
  async record(event: AuditEvent): Promise<void> {
    const { ip, ...fields } = event;
    const entry: AuditLogEntry = {
      ...fields,
      id: generateUuid(),
      ipHash: hashIp(ip),
      timestamp: this.clock()
    };

    try {
      await this.store.insert('audit_logs', entry);
    } catch (error) {
      logger.error('Audit log write failed', { error: errorMessage(error), entry });
    }
  }

  async success(event: Omit<AuditEvent, 'result'>): Promise<void> {
    await this.record({ ...event, result: 'success' });
  }

  async failure(event: Omit<AuditEvent, 'result'>, cause: unknown): Promise<void> {
    await this.record({ ...event, result: 'failure', error: errorMessage(cause) });
  }
}
