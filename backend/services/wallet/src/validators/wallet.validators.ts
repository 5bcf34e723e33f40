import { body, query } from 'express-validator';
import { ReceiptType } from '../types';

export const createAccountValidator = [
  body('fullName')
    .notEmpty().withMessage('Full name is required')
    .isString().withMessage('Full name must be a string')
    .trim()
    .isLength({ max: 120 }).withMessage('Full name must not exceed 120 characters'),

  body('email')
    .optional()
    .isEmail().withMessage('Email must be valid'),

  body('phoneNumber')
    .optional()
    .isString().withMessage('Phone number must be a string'),

  body('profilePhotoUrl')
    .optional()
    .isURL().withMessage('Profile photo must be a URL'),

  body('currency')
    .optional()
    .isString().withMessage('Currency must be a string')
    .isLength({ min: 3, max: 3 }).withMessage('Currency must be a 3-letter code')
    .toUpperCase()
];

export const listTransactionsValidator = [
  query('limit')
    .optional()
    .isInt({ min: 1, max: 100 }).withMessage('Limit must be between 1 and 100')
    .toInt(),

  query('type')
    .optional()
    .isIn(Object.values(ReceiptType)).withMessage('Invalid transaction type')
];

export const sendMoneyValidator = [
  body('recipientWalletId')
    .optional()
    .isString().withMessage('Recipient wallet ID must be a string'),

  body('amount')
    .isFloat().withMessage('Amount must be a number')
    .toFloat(),

  body('note')
    .optional()
    .isString().withMessage('Note must be a string')
    .isLength({ max: 200 }).withMessage('Note must not exceed 200 characters'),

  body('idempotencyKey')
    .optional()
    .isString().withMessage('Idempotency key must be a string')
];

export const lookupWalletValidator = [
  body('walletId')
    .optional()
    .isString().withMessage('Wallet ID must be a string')
];

export const updateKycStatusValidator = [
  body('status')
    .notEmpty().withMessage('Status is required')
    .isString().withMessage('Status must be a string')
];
