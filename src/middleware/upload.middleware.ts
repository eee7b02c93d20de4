import multer from 'multer';
import path from 'path';
import fs from 'fs';
import { Request, Response, NextFunction } from 'express';
import { ApiError } from '../utils/ApiError';
import { sanitizeFilename } from '../utils/helpers';
import { PDF_IMPORT_DIR } from '../config/placement';

const storage = multer.diskStorage({
  destination: (_req, _file, cb) => {
    fs.mkdirSync(PDF_IMPORT_DIR, { recursive: true });
    cb(null, PDF_IMPORT_DIR);
  },
  filename: (_req, file, cb) => {
    const uniqueSuffix = Date.now() + '-' + Math.round(Math.random() * 1e9);
    const sanitizedName = sanitizeFilename(file.originalname);
    cb(null, `${uniqueSuffix}-${sanitizedName}`);
  },
});

const createFileFilter = (allowedTypes: string[]) => {
  return (_req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback) => {
    const ext = path.extname(file.originalname).toLowerCase();
    if (allowedTypes.includes(ext)) {
      cb(null, true);
    } else {
      cb(ApiError.badRequest(`Only ${allowedTypes.join(', ')} files are allowed`));
    }
  };
};

const FILE_SIZE_LIMITS = {
  DOCUMENT: 10 * 1024 * 1024, // 10MB
};

/**
 * Single result sheet PDF under the `file` field.
 */
export const uploadResultPdf = multer({
  storage,
  limits: { fileSize: FILE_SIZE_LIMITS.DOCUMENT },
  fileFilter: createFileFilter(['.pdf']),
}).single('file');

export const handleUploadError = (error: unknown, _req: Request, _res: Response, next: NextFunction) => {
  if (error instanceof multer.MulterError) {
    if (error.code === 'LIMIT_FILE_SIZE') {
      return next(ApiError.badRequest('File size is too large'));
    }
    if (error.code === 'LIMIT_UNEXPECTED_FILE') {
      return next(ApiError.badRequest('Unexpected field name'));
    }
    return next(ApiError.badRequest(error.message));
  }
  next(error);
};
