import { Request, Response, NextFunction } from 'express';
import { ApiError } from '../utils/ApiError';
import { UserRole } from '../types';
import logger from '../config/logger';

export const authorizeRoles = (...roles: UserRole[]) => {
  // Case-insensitive, so tokens issued with a differently-cased role still match.
  const normalize = (v: unknown) => (typeof v === 'string' ? v.trim().toLowerCase() : '');
  const allowed = roles.map((r) => normalize(r));

  return (req: Request, _res: Response, next: NextFunction) => {
    if (!req.user) {
      throw ApiError.unauthorized('Authentication required');
    }

    if (!allowed.includes(normalize(req.user.role))) {
      logger.warn('authorizeRoles rejected request', { allowedRoles: roles, currentRole: req.user.role, path: req.originalUrl });
      throw ApiError.forbidden('You do not have permission to access this resource');
    }

    next();
  };
};
