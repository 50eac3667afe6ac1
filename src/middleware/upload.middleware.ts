import multer from 'multer';
import path from 'path';
import { Request } from 'express';
import { ApiError } from '../utils/ApiError';
import { MAX_ROSTER_UPLOAD_BYTES } from '../utils/constants';

// Rosters are validated before they touch disk, so uploads stay in memory.
const storage = multer.memoryStorage();

const createFileFilter = (allowedTypes: string[]) => {
  return (_req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback) => {
    const ext = path.extname(file.originalname).toLowerCase();
    if (allowedTypes.includes(ext)) {
      cb(null, true);
    } else {
      cb(new ApiError(400, `Only ${allowedTypes.join(', ')} files are allowed`));
    }
  };
};

/**
 * Middleware for uploading a roster CSV in the `file` field
 */
export const uploadRosterCsv = multer({
  storage,
  limits: { fileSize: MAX_ROSTER_UPLOAD_BYTES, files: 1 },
  fileFilter: createFileFilter(['.csv']),
}).single('file');
