export enum IdempotencyStatus {
  PENDING = 'pending',
  COMPLETED = 'completed',
  FAILED = 'failed'
}

export interface IdempotencyRecord {
  id: string;
  userId: string;
  operation: string;
  status: IdempotencyStatus;
  result?: unknown;
  error?: string;
  createdAt: Date;
  expiresAt: Date;
  completedAt?: Date;
  failedAt?: Date;
  retryAt?: Date;
}

export interface RateLimitWindow {
  id: string;
  userId: string;
  operation: string;
  timestamps: number[];
  updatedAt: Date;
}

export type AuditResult = 'success' | 'failure';

export interface AuditLogEntry {
  id: string;
  userId: string;
  operation: string;
  result: AuditResult;
  amount?: number;
  currency?: string;
  error?: string;
  metadata?: Record<string, unknown>;
  ipHash: string;
  timestamp: Date;
}

/**
 * Identity and origin of an authenticated request.
 */
export interface RequestContext {
  userId: string;
  role: string;
  ip?: string;
}
