import { NextFunction, Request, Response } from 'express';
import { validationResult } from 'express-validator';
import { AppError, ERROR_CODES } from '../utils/errors';

export const validateRequest = (req: Request, res: Response, next: NextFunction): void => {
  const result = validationResult(req);
  if (result.isEmpty()) {
    return next();
  }

  const errors = result.array();
  next(
    new AppError(ERROR_CODES.SYSTEM_VALIDATION_FAILED, String(errors[0].msg), {
      errors: errors.map((error) => ({
        field: error.type === 'field' ? error.path : error.type,
        message: String(error.msg)
      }))
    })
  );
};
