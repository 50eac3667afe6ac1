import { Request, Response } from 'express';
import { z } from 'zod';
import { AuthService } from '../services/auth.service';
import { ApiResponse } from '../utils/ApiResponse';
import { asyncHandler } from '../utils/asyncHandler';
import { ALL_ROLES } from '../utils/constants';
import { parseRequest } from '../utils/validation';

const saveUserSchema = z.object({
  username: z.string().trim().min(1, 'Username is required'),
  password: z.string().min(1, 'Password is required'),
  role: z.enum(ALL_ROLES),
});

export const createAdminController = (auth: AuthService) => ({
  // @desc    List users
  // @route   GET /api/v1/admin/users
  // @access  Private (Admin)
  listUsers: asyncHandler(async (_req: Request, res: Response) => {
    const users = await auth.listUsers();
    res.json(ApiResponse.success('Users retrieved successfully', users, { total: users.length }));
  }),

  // @desc    Add or update a user
  // @route   PUT /api/v1/admin/users
  // @access  Private (Admin)
  saveUser: asyncHandler(async (req: Request, res: Response) => {
    const { username, password, role } = parseRequest(saveUserSchema, req.body);
    const user = await auth.saveUser(username, password, role);
    res.json(ApiResponse.success('User saved', user));
  }),
});
