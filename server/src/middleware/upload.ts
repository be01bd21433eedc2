import fs from 'fs';
import path from 'path';
import multer, { type FileFilterCallback } from 'multer';
import { nanoid } from 'nanoid';
import type { Request } from 'express';
import config from '../config';
import { BadRequestError } from '../utils/errors';

const pad = (n: number) => String(n).padStart(2, '0');

// 20240131_235959 (UTC)
export const formatUploadTimestamp = (date: Date): string =>
  `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
  `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;

export const sanitizeFilename = (original: string): string => {
  const base = path.basename(original || '').replace(/[^A-Za-z0-9._-]/g, '_').replace(/^\.+/, '');
  return base || 'upload.wav';
};

// <userId>_<timestamp>_<random>_<name>; the random part keeps same-second uploads apart.
export const buildUploadFilename = (
  userId: string,
  originalName: string,
  now: Date = new Date(),
  unique: string = nanoid(8)
): string => `${userId}_${formatUploadTimestamp(now)}_${unique}_${sanitizeFilename(originalName)}`;

const voiceSampleStorage = multer.diskStorage({
  destination: (req, file, cb) => {
    fs.promises
      .mkdir(config.voices.uploadDir, { recursive: true })
      .then(() => cb(null, config.voices.uploadDir))
      .catch((err: Error) => cb(err, config.voices.uploadDir));
  },
  filename: (req, file, cb) => {
    cb(null, buildUploadFilename(req.user?.id ?? 'anonymous', file.originalname));
  },
});

const voiceSampleFileFilter = (req: Request, file: Express.Multer.File, cb: FileFilterCallback) => {
  if (config.voices.allowedMimeTypes.includes(file.mimetype)) {
    cb(null, true);
  } else {
    cb(new BadRequestError(`File type ${file.mimetype} not allowed. Must be WAV.`));
  }
};

// --- Voice samples (WAV, on local disk) ---
export const uploadVoiceSample = multer({
  storage: voiceSampleStorage,
  limits: { fileSize: config.voices.maxFileSize },
  fileFilter: voiceSampleFileFilter,
});

export const discardUpload = async (file: Express.Multer.File | undefined): Promise<void> => {
  if (!file?.path) return;
  await fs.promises.rm(file.path, { force: true });
};
