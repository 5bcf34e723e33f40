import { body, query } from 'express-validator';
import { WithdrawalType } from '../types';

const amount = () =>
  body('amount')
    .isFloat().withMessage('Amount must be a number')
    .toFloat();

const idempotencyKey = () =>
  body('idempotencyKey')
    .optional()
    .isString().withMessage('Idempotency key must be a string');

export const initiateWithdrawalValidator = [
  amount(),

  body('type')
    .optional()
    .isIn(Object.values(WithdrawalType)).withMessage('Invalid withdrawal type'),

  body('accountName')
    .notEmpty().withMessage('Account name is required')
    .isString().withMessage('Account name must be a string'),

  body(['bankCode', 'accountNumber', 'mobileMoneyProvider', 'phoneNumber'])
    .optional()
    .isString().withMessage('Destination fields must be strings'),

  idempotencyKey()
];

export const finalizeTransferValidator = [
  body('transferCode')
    .notEmpty().withMessage('Transfer code is required')
    .isString().withMessage('Transfer code must be a string'),

  body('otp')
    .notEmpty().withMessage('OTP is required')
    .isString().withMessage('OTP must be a string'),

  idempotencyKey()
];

export const listBanksValidator = [
  query('country')
    .optional()
    .isString().withMessage('Country must be a string')
    .isLength({ max: 40 }).withMessage('Country must not exceed 40 characters')
];

export const verifyAccountValidator = [
  body('accountNumber')
    .notEmpty().withMessage('Account number is required')
    .isString().withMessage('Account number must be a string'),

  body('bankCode')
    .notEmpty().withMessage('Bank code is required')
    .isString().withMessage('Bank code must be a string')
];

export const initializeDepositValidator = [
  body('email')
    .isEmail().withMessage('Email must be valid'),

  amount(),

  body('currency')
    .optional()
    .isString().withMessage('Currency must be a string')
    .isLength({ min: 3, max: 3 }).withMessage('Currency must be a 3-letter code')
];

export const mobileMoneyChargeValidator = [
  ...initializeDepositValidator,

  body('provider')
    .notEmpty().withMessage('Provider is required')
    .isString().withMessage('Provider must be a string'),

  body('phoneNumber')
    .notEmpty().withMessage('Phone number is required')
    .isString().withMessage('Phone number must be a string'),

  idempotencyKey()
];

export const verifyPaymentValidator = [
  body('reference')
    .notEmpty().withMessage('Payment reference is required')
    .isString().withMessage('Payment reference must be a string')
];
