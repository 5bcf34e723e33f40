import { NextFunction, Request, Response } from 'express';
import jwt from 'jsonwebtoken';
import { config } from '../config';
import { RequestContext } from '../types';
import { AppError, ERROR_CODES } from '../utils/errors';

export interface AuthUser {
  id: string;
  role: string;
}

declare global {
  namespace Express {
    interface Request {
      user?: AuthUser;
    }
  }
}

const claim = (payload: jwt.JwtPayload, name: string): string | undefined => {
  const value: unknown = payload[name];
  return typeof value === 'string' && value !== '' ? value : undefined;
};

export const authenticate = (req: Request, res: Response, next: NextFunction): void => {
  try {
    const token = req.headers.authorization?.replace('Bearer ', '');

    if (!token) {
      throw new AppError(ERROR_CODES.AUTH_UNAUTHENTICATED, 'Authentication token not provided');
    }

    const decoded = jwt.verify(token, config.jwt.secret);
    if (typeof decoded === 'string') {
      throw new AppError(ERROR_CODES.AUTH_UNAUTHENTICATED, 'Invalid authentication token');
    }

    const id = claim(decoded, 'userId') ?? claim(decoded, 'id');
    if (!id) {
      throw new AppError(ERROR_CODES.AUTH_UNAUTHENTICATED, 'Token carries no user');
    }

    req.user = {
      id,
      role: claim(decoded, 'role') ?? 'user'
    };

    next();
  } catch (error) {
    if (error instanceof jwt.JsonWebTokenError) {
      next(new AppError(ERROR_CODES.AUTH_UNAUTHENTICATED, 'Invalid authentication token'));
    } else {
      next(error);
    }
  }
};

export const authorize = (...roles: string[]) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!req.user) {
      return next(new AppError(ERROR_CODES.AUTH_UNAUTHENTICATED, 'Authentication required'));
    }

    if (!roles.includes(req.user.role)) {
      return next(new AppError(ERROR_CODES.AUTH_PERMISSION_DENIED, 'Insufficient permissions'));
    }

    next();
  };
};

/**
 * Caller identity for service calls. Only valid behind `authenticate`.
 */
export const requestContext = (req: Request): RequestContext => {
  if (!req.user) {
    throw new AppError(ERROR_CODES.AUTH_UNAUTHENTICATED);
  }
  return { userId: req.user.id, role: req.user.role, ip: req.ip };
};
