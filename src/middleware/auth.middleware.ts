import { Request, Response, NextFunction } from 'express';
import { JwtSettings, verifyAccessToken } from '../config/jwt';
import { ApiError } from '../utils/ApiError';

function getBearerToken(req: Request): string | null {
  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith('Bearer ')) return null;
  const token = authHeader.split(' ')[1];
  return token || null;
}

export const authenticate = (settings: JwtSettings) => (req: Request, _res: Response, next: NextFunction) => {
  const token = getBearerToken(req);
  if (!token) throw ApiError.unauthorized('No token provided');

  const decoded = verifyAccessToken(token, settings);
  req.user = { username: decoded.username, role: decoded.role };
  next();
};
