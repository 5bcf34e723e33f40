import { body, param, query } from 'express-validator';

export const momoPaymentValidator = [
  body('amount')
    .isFloat().withMessage('Amount must be a number')
    .toFloat(),

  body('currency')
    .optional()
    .isString().withMessage('Currency must be a string')
    .isLength({ min: 3, max: 3 }).withMessage('Currency must be a 3-letter code'),

  body('phoneNumber')
    .notEmpty().withMessage('Phone number is required')
    .isString().withMessage('Phone number must be a string'),

  body(['payerMessage', 'payeeNote'])
    .optional()
    .isString().withMessage('Messages must be strings')
    .isLength({ max: 160 }).withMessage('Messages must not exceed 160 characters'),

  body('idempotencyKey')
    .optional()
    .isString().withMessage('Idempotency key must be a string')
];

export const momoStatusValidator = [
  param('referenceId')
    .isUUID().withMessage('Reference ID must be a UUID')
];

export const momoBalanceValidator = [
  query('product')
    .optional()
    .isIn(['collection', 'disbursement']).withMessage('Product must be collection or disbursement')
];
