/**
 * Error Model Unit Tests
 */

import {
  AppError,
  createAppError,
  ERROR_CODES,
  ERROR_MESSAGES,
  isAppError,
  serviceError,
  toClientError
} from '../../../backend/services/wallet/src/utils/errors';
import { hashIp, safeCompare, WALLET_ID_PATTERN, generateWalletId } from '../../../backend/services/wallet/src/utils/crypto';

describe('errors', () => {
  it('should map codes to transport status and HTTP status', () => {
    const error = createAppError(ERROR_CODES.WALLET_INSUFFICIENT_FUNDS, undefined, { required: 110 });

    expect(error.message).toBe(ERROR_MESSAGES.WALLET_INSUFFICIENT_FUNDS);
    expect(error.transportStatus).toBe('failed-precondition');
    expect(error.statusCode).toBe(400);
    expect(error.toJSON()).toEqual({
      code: 'WALLET_INSUFFICIENT_FUNDS',
      status: 'failed-precondition',
      message: 'Insufficient balance for this transaction.',
      details: { required: 110 }
    });
  });

  it('should mark gateway failures retryable and hide the cause', () => {
    const error = serviceError('momo', new Error('socket hang up'), { referenceId: 'ref-1' });

    expect(error.code).toBe(ERROR_CODES.SERVICE_MOMO_ERROR);
    expect(error.statusCode).toBe(503);
    expect(error.toJSON()).toEqual({
      code: 'SERVICE_MOMO_ERROR',
      status: 'unavailable',
      message: 'Mobile money service error. Please try again.',
      details: { service: 'momo', referenceId: 'ref-1' },
      retryable: true
    });
  });

  it('should turn unknown errors into a generic internal error', () => {
    const error = toClientError(new TypeError('cannot read properties of undefined'));

    expect(error.code).toBe(ERROR_CODES.SYSTEM_INTERNAL_ERROR);
    expect(error.message).toBe('Something went wrong. Please try again later.');
    expect(error.statusCode).toBe(500);
  });

  it('should pass application errors through unchanged', () => {
    const original = new AppError(ERROR_CODES.TXN_SELF_TRANSFER);
    expect(toClientError(original)).toBe(original);
    expect(isAppError(original, ERROR_CODES.TXN_SELF_TRANSFER)).toBe(true);
    expect(isAppError(original, ERROR_CODES.TXN_NOT_FOUND)).toBe(false);
  });
});

describe('crypto helpers', () => {
  it('should compare strings of different lengths as unequal', () => {
    expect(safeCompare('abc', 'abcd')).toBe(false);
    expect(safeCompare('abcd', 'abcd')).toBe(true);
  });

  it('should hash IPs to a short stable digest', () => {
    expect(hashIp('198.51.100.7')).toHaveLength(16);
    expect(hashIp('198.51.100.7')).toBe(hashIp('198.51.100.7'));
    expect(hashIp(undefined)).toBe(hashIp('unknown'));
  });

  it('should generate wallet ids in the public format', () => {
    expect(generateWalletId()).toMatch(WALLET_ID_PATTERN);
  });
});
