import { Request, Response } from 'express';
import { z } from 'zod';
import { JwtSettings, generateAccessToken } from '../config/jwt';
import { AuthService } from '../services/auth.service';
import { ApiError } from '../utils/ApiError';
import { ApiResponse } from '../utils/ApiResponse';
import { asyncHandler } from '../utils/asyncHandler';
import { ALL_ROLES } from '../utils/constants';
import { parseRequest } from '../utils/validation';
import logger from '../config/logger';

const loginSchema = z.object({
  username: z.string().trim().min(1, 'Username is required'),
  password: z.string().min(1, 'Password is required'),
  role: z.enum(ALL_ROLES).optional(),
});

export const createAuthController = (auth: AuthService, jwtSettings: JwtSettings) => ({
  // @desc    Login; an optional role must match the account's role
  // @route   POST /api/v1/auth/login
  // @access  Public
  login: asyncHandler(async (req: Request, res: Response) => {
    const { username, password, role } = parseRequest(loginSchema, req.body);
    const result = await auth.authenticate(username, password);
    if (!result.valid || !result.role) {
      logger.warn(`Failed login for ${username}`);
      throw ApiError.unauthorized('Invalid username or password.');
    }
    if (role && role !== result.role) {
      throw ApiError.forbidden(`Role mismatch: your account role is '${result.role}', not '${role}'.`);
    }

    const accessToken = generateAccessToken({ username, role: result.role }, jwtSettings);
    logger.info(`User ${username} logged in as ${result.role}`);
    res.json(ApiResponse.success('Login successful', { accessToken, user: { username, role: result.role } }));
  }),

  // @desc    Current user
  // @route   GET /api/v1/auth/me
  // @access  Private
  me: (req: Request, res: Response) => {
    if (!req.user) throw ApiError.unauthorized('User not authenticated');
    res.json(ApiResponse.success('User retrieved successfully', req.user));
  },
});
