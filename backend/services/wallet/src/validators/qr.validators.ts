import { body } from 'express-validator';

export const signQrValidator = [
  body('walletId')
    .notEmpty().withMessage('Wallet ID is required')
    .isString().withMessage('Wallet ID must be a string'),

  body('amount')
    .optional()
    .isFloat({ min: 0 }).withMessage('Amount must be a non-negative number')
    .toFloat(),

  body('note')
    .optional()
    .isString().withMessage('Note must be a string')
    .isLength({ max: 140 }).withMessage('Note must not exceed 140 characters')
];

export const verifyQrValidator = [
  body('payload')
    .notEmpty().withMessage('Payload is required')
    .isString().withMessage('Payload must be a string'),

  body('signature')
    .notEmpty().withMessage('Signature is required')
    .isString().withMessage('Signature must be a string')
];
