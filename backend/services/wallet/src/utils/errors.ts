import { logger } from './logger';

export const ERROR_CODES = {
  // Authentication
  AUTH_UNAUTHENTICATED: 'AUTH_UNAUTHENTICATED',
  AUTH_PERMISSION_DENIED: 'AUTH_PERMISSION_DENIED',
  AUTH_SESSION_EXPIRED: 'AUTH_SESSION_EXPIRED',

  // KYC
  KYC_REQUIRED: 'KYC_REQUIRED',
  KYC_INCOMPLETE: 'KYC_INCOMPLETE',
  KYC_VERIFICATION_FAILED: 'KYC_VERIFICATION_FAILED',

  // Wallet
  WALLET_NOT_FOUND: 'WALLET_NOT_FOUND',
  WALLET_INSUFFICIENT_FUNDS: 'WALLET_INSUFFICIENT_FUNDS',
  WALLET_LIMIT_EXCEEDED: 'WALLET_LIMIT_EXCEEDED',
  WALLET_SUSPENDED: 'WALLET_SUSPENDED',

  // Transactions
  TXN_INVALID_STATE: 'TXN_INVALID_STATE',
  TXN_DUPLICATE_REQUEST: 'TXN_DUPLICATE_REQUEST',
  TXN_SELF_TRANSFER: 'TXN_SELF_TRANSFER',
  TXN_RECIPIENT_NOT_FOUND: 'TXN_RECIPIENT_NOT_FOUND',
  TXN_NOT_FOUND: 'TXN_NOT_FOUND',
  TXN_AMOUNT_INVALID: 'TXN_AMOUNT_INVALID',
  TXN_AMOUNT_TOO_SMALL: 'TXN_AMOUNT_TOO_SMALL',
  TXN_AMOUNT_TOO_LARGE: 'TXN_AMOUNT_TOO_LARGE',

  // Rate limiting
  RATE_LIMIT_EXCEEDED: 'RATE_LIMIT_EXCEEDED',
  RATE_COOLDOWN_ACTIVE: 'RATE_COOLDOWN_ACTIVE',

  // External services
  SERVICE_PAYSTACK_ERROR: 'SERVICE_PAYSTACK_ERROR',
  SERVICE_MOMO_ERROR: 'SERVICE_MOMO_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',

  // Configuration
  CONFIG_MISSING: 'CONFIG_MISSING',
  CONFIG_INVALID: 'CONFIG_INVALID',

  // System
  SYSTEM_INTERNAL_ERROR: 'SYSTEM_INTERNAL_ERROR',
  SYSTEM_VALIDATION_FAILED: 'SYSTEM_VALIDATION_FAILED'
} as const;

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];

export type TransportStatus =
  | 'unauthenticated'
  | 'permission-denied'
  | 'failed-precondition'
  | 'not-found'
  | 'already-exists'
  | 'invalid-argument'
  | 'resource-exhausted'
  | 'unavailable'
  | 'internal';

export const TRANSPORT_STATUS: Record<ErrorCode, TransportStatus> = {
  AUTH_UNAUTHENTICATED: 'unauthenticated',
  AUTH_PERMISSION_DENIED: 'permission-denied',
  AUTH_SESSION_EXPIRED: 'unauthenticated',
  KYC_REQUIRED: 'failed-precondition',
  KYC_INCOMPLETE: 'failed-precondition',
  KYC_VERIFICATION_FAILED: 'failed-precondition',
  WALLET_NOT_FOUND: 'not-found',
  WALLET_INSUFFICIENT_FUNDS: 'failed-precondition',
  WALLET_LIMIT_EXCEEDED: 'failed-precondition',
  WALLET_SUSPENDED: 'failed-precondition',
  TXN_INVALID_STATE: 'failed-precondition',
  TXN_DUPLICATE_REQUEST: 'already-exists',
  TXN_SELF_TRANSFER: 'invalid-argument',
  TXN_RECIPIENT_NOT_FOUND: 'not-found',
  TXN_NOT_FOUND: 'not-found',
  TXN_AMOUNT_INVALID: 'invalid-argument',
  TXN_AMOUNT_TOO_SMALL: 'invalid-argument',
  TXN_AMOUNT_TOO_LARGE: 'invalid-argument',
  RATE_LIMIT_EXCEEDED: 'resource-exhausted',
  RATE_COOLDOWN_ACTIVE: 'resource-exhausted',
  SERVICE_PAYSTACK_ERROR: 'unavailable',
  SERVICE_MOMO_ERROR: 'unavailable',
  SERVICE_UNAVAILABLE: 'unavailable',
  CONFIG_MISSING: 'failed-precondition',
  CONFIG_INVALID: 'failed-precondition',
  SYSTEM_INTERNAL_ERROR: 'internal',
  SYSTEM_VALIDATION_FAILED: 'invalid-argument'
};

export const HTTP_STATUS: Record<TransportStatus, number> = {
  'unauthenticated': 401,
  'permission-denied': 403,
  'failed-precondition': 400,
  'not-found': 404,
  'already-exists': 409,
  'invalid-argument': 400,
  'resource-exhausted': 429,
  'unavailable': 503,
  'internal': 500
};

/**
 * Messages safe to show directly to end users.
 */
export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  AUTH_UNAUTHENTICATED: 'Please sign in to continue.',
  AUTH_PERMISSION_DENIED: 'You do not have permission to perform this action.',
  AUTH_SESSION_EXPIRED: 'Your session has expired. Please sign in again.',
  KYC_REQUIRED: 'Please complete identity verification to continue.',
  KYC_INCOMPLETE: 'Your verification is incomplete. Please finish all steps.',
  KYC_VERIFICATION_FAILED: 'Identity verification failed. Please try again.',
  WALLET_NOT_FOUND: 'Wallet not found. Please contact support.',
  WALLET_INSUFFICIENT_FUNDS: 'Insufficient balance for this transaction.',
  WALLET_LIMIT_EXCEEDED: 'Transaction exceeds your spending limit.',
  WALLET_SUSPENDED: 'This wallet is suspended. Please contact support.',
  TXN_INVALID_STATE: 'This transaction cannot be modified.',
  TXN_DUPLICATE_REQUEST: 'This request is already being processed.',
  TXN_SELF_TRANSFER: 'You cannot transfer to your own wallet.',
  TXN_RECIPIENT_NOT_FOUND: 'Recipient wallet not found. Please check the ID.',
  TXN_NOT_FOUND: 'Transaction not found.',
  TXN_AMOUNT_INVALID: 'Please enter a valid amount.',
  TXN_AMOUNT_TOO_SMALL: 'Amount is below the minimum allowed.',
  TXN_AMOUNT_TOO_LARGE: 'Amount exceeds the maximum allowed.',
  RATE_LIMIT_EXCEEDED: 'Too many requests. Please wait before trying again.',
  RATE_COOLDOWN_ACTIVE: 'Please wait before retrying this action.',
  SERVICE_PAYSTACK_ERROR: 'Payment service error. Please try again.',
  SERVICE_MOMO_ERROR: 'Mobile money service error. Please try again.',
  SERVICE_UNAVAILABLE: 'Service temporarily unavailable. Please try again.',
  CONFIG_MISSING: 'Service is not configured. Contact support.',
  CONFIG_INVALID: 'Service configuration error. Contact support.',
  SYSTEM_INTERNAL_ERROR: 'Something went wrong. Please try again later.',
  SYSTEM_VALIDATION_FAILED: 'Invalid data provided.'
};

export type ErrorDetails = Record<string, unknown>;

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly transportStatus: TransportStatus;
  public readonly statusCode: number;
  public readonly details: ErrorDetails;
  public readonly retryable: boolean;

  constructor(code: ErrorCode, message?: string, details: ErrorDetails = {}, retryable = false) {
    super(message || ERROR_MESSAGES[code]);
    this.name = 'AppError';
    this.code = code;
    this.transportStatus = TRANSPORT_STATUS[code];
    this.statusCode = HTTP_STATUS[this.transportStatus];
    this.details = details;
    this.retryable = retryable;

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      code: this.code,
      status: this.transportStatus,
      message: this.message,
      details: this.details,
      ...(this.retryable ? { retryable: true } : {})
    };
  }
}

/**
 * Creates an application error and logs it as a structured record so that
 * operational logs can be searched by code.
 */
export const createAppError = (
  code: ErrorCode,
  message?: string,
  details: ErrorDetails = {}
): AppError => {
  const error = new AppError(code, message, details);
  logger.error('Application error', {
    errorCode: code,
    message: error.message,
    details,
    timestamp: new Date().toISOString()
  });
  return error;
};

export type ExternalService = 'paystack' | 'momo';

const SERVICE_ERROR_CODES: Record<ExternalService, ErrorCode> = {
  paystack: ERROR_CODES.SERVICE_PAYSTACK_ERROR,
  momo: ERROR_CODES.SERVICE_MOMO_ERROR
};

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Wraps a failure talking to an external gateway. Always retryable.
 */
export const serviceError = (
  service: ExternalService,
  cause: unknown,
  context: ErrorDetails = {}
): AppError => {
  const code = SERVICE_ERROR_CODES[service] ?? ERROR_CODES.SERVICE_UNAVAILABLE;
  logger.error('External service error', {
    errorCode: code,
    service,
    originalError: errorMessage(cause),
    context,
    timestamp: new Date().toISOString()
  });
  return new AppError(code, undefined, { service, ...context }, true);
};

/**
 * Boundary translation: structured errors pass through, anything else
 * becomes a generic internal error with no internals exposed.
 */
export const toClientError = (error: unknown): AppError => {
  if (error instanceof AppError) {
    return error;
  }
  logger.error('Unexpected error', { error: errorMessage(error) });
  return new AppError(ERROR_CODES.SYSTEM_INTERNAL_ERROR);
};

export const isAppError = (error: unknown, code?: ErrorCode): error is AppError =>
  error instanceof AppError && (code === undefined || error.code === code);
