import jwt, { SignOptions } from 'jsonwebtoken';
import { ApiError } from '../utils/ApiError';
import { ALL_ROLES } from '../utils/constants';
import { UserRole } from '../types';

export interface TokenPayload {
  username: string;
  role: UserRole;
}

export interface JwtSettings {
  accessSecret: string;
  accessExpiry: string;
}

const signOpts = (exp: string | number): SignOptions => ({ expiresIn: exp as SignOptions['expiresIn'] });

const isRole = (value: unknown): value is UserRole =>
  ALL_ROLES.some((role) => role === value);

export const generateAccessToken = (payload: TokenPayload, settings: JwtSettings): string => {
  return jwt.sign(payload, settings.accessSecret, signOpts(settings.accessExpiry));
};

export const verifyAccessToken = (token: string, settings: JwtSettings): TokenPayload => {
  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, settings.accessSecret);
  } catch (error) {
    throw ApiError.unauthorized('Invalid or expired access token');
  }
  if (typeof decoded === 'string' || typeof decoded.username !== 'string' || !isRole(decoded.role)) {
    throw ApiError.unauthorized('Malformed access token');
  }
  return { username: decoded.username, role: decoded.role };
};
