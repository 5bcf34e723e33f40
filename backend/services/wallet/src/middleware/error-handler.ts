import { NextFunction, Request, Response } from 'express';
import { AppError, ERROR_CODES, toClientError } from '../utils/errors';
import { logger } from '../utils/logger';

const isBodyParseError = (err: unknown): boolean =>
  err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  // Express recognises error handlers by arity
  next: NextFunction
): void => {
  const error = isBodyParseError(err)
    ? new AppError(ERROR_CODES.SYSTEM_VALIDATION_FAILED, 'Malformed JSON body')
    : toClientError(err);

  const meta = { code: error.code, path: req.path, method: req.method, userId: req.user?.id };
  if (error.statusCode >= 500) {
    logger.error(error.message, meta);
  } else {
    logger.warn(error.message, meta);
  }

  res.status(error.statusCode).json({
    success: false,
    error: error.toJSON()
  });
};
