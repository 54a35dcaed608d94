import multer from 'multer';
import path from 'node:path';
import { Request } from 'express';
import { config } from '../config';
import { AppError } from '../errors/AppError';

const ACCEPTED_EXTENSIONS = new Set(['.png', '.jpg', '.jpeg']);

export const isAcceptedUpload = (filename: string): boolean =>
  ACCEPTED_EXTENSIONS.has(path.extname(filename).toLowerCase());

const fileFilter = (
  _req: Request,
  file: Express.Multer.File,
  callback: multer.FileFilterCallback
): void => {
  if (isAcceptedUpload(file.originalname)) {
    callback(null, true);
    return;
  }
  callback(new AppError(`Unsupported file type: ${file.originalname} (PNG, JPG, JPEG only)`, 400));
};

/**
 * Uploads stay in memory: images are decoded straight from their buffers
 */
export const upload = multer({
  storage: multer.memoryStorage(),
  fileFilter,
  limits: {
    fileSize: config.maxFileSize,
    files: config.maxFiles,
  },
});
