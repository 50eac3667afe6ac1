/// <reference types="multer" />
import { UserRole } from './index';

declare global {
  namespace Express {
    interface Request {
      user?: {
        username: string;
        role: UserRole;
      };
    }
  }
}

export {};
