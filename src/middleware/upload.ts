import multer from 'multer';
import type { Request, Response, NextFunction } from 'express';
import * as path from 'path';
import * as fs from 'fs';
import type { SeederOptions } from '../types/schema';
import {
  parseBooleanFlag,
  parseDefaults,
  parseIntegerOption,
  parsePairs,
  parseTimestampPolicy,
  splitList,
} from '../config/seederConfig';
import { SeederConfigError } from '../seeder/errors';

export const STORAGE_DIR = process.env.STORAGE_DIR || path.join(process.cwd(), 'storage');
export const UPLOAD_PREFIX = 'seed-upload-';

const storage = multer.diskStorage({
  destination: (req, file, cb) => {
    fs.mkdir(STORAGE_DIR, { recursive: true }, (err) => cb(err, STORAGE_DIR));
  },
  filename: (req, file, cb) => {
    const uniqueSuffix = Date.now() + '-' + Math.round(Math.random() * 1e9);
    const ext = path.extname(file.originalname).toLowerCase() || '.csv';
    cb(null, UPLOAD_PREFIX + uniqueSuffix + ext);
  },
});

/**
 * File filter to accept CSV and TXT files
 */
const fileFilter = (
  req: Request,
  file: Express.Multer.File,
  cb: multer.FileFilterCallback
): void => {
  const allowedMimeTypes = [
    'text/csv',
    'text/plain',
    'application/csv',
    'application/vnd.ms-excel', // Some systems report CSV as this
  ];

  const allowedExtensions = ['.csv', '.txt'];
  const ext = path.extname(file.originalname).toLowerCase();

  if (allowedMimeTypes.includes(file.mimetype) || allowedExtensions.includes(ext)) {
    cb(null, true);
  } else {
    cb(new Error('Only CSV and TXT files are allowed'));
  }
};

export const upload = multer({
  storage: storage,
  fileFilter: fileFilter,
  limits: {
    fileSize: 100 * 1024 * 1024, // 100MB limit
  },
}).single('datafile');

/**
 * Express middleware for handling seed file uploads
 */
export const uploadMiddleware = (
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  upload(req, res, (err) => {
    if (err) {
      return next(err);
    }
    if (!req.file) {
      return next(new Error('No file uploaded'));
    }
    next();
  });
};

function formFields(body: unknown): Record<string, string> {
  const fields: Record<string, string> = {};
  if (typeof body !== 'object' || body === null) return fields;

  for (const [key, value] of Object.entries(body)) {
    if (typeof value === 'string') fields[key] = value;
  }

  return fields;
}

/**
 * Translate the multipart form fields of `POST /api/seed` into seeder options.
 * The uploaded file path is absolute, so the base path does not apply.
 */
export function parseSeedForm(body: unknown, filePath: string): SeederOptions {
  const fields = formFields(body);
  const table = fields.table?.trim();

  if (!table) {
    throw new SeederConfigError('invalid-option', 'Form field "table" is required');
  }

  const options: SeederOptions = { source: filePath, tableName: table };

  if (fields.delimiter) options.delimiter = fields.delimiter === 'tab' ? '\t' : fields.delimiter;
  if (fields.truncate) options.truncate = parseBooleanFlag(fields.truncate, 'truncate');
  if (fields.hasHeader) options.hasHeader = parseBooleanFlag(fields.hasHeader, 'hasHeader');
  if (fields.mapping) options.columnMapping = splitList(fields.mapping);
  if (fields.aliases) options.aliasMap = parsePairs(fields.aliases);
  if (fields.hash !== undefined) options.hashFields = splitList(fields.hash);
  if (fields.defaults) options.defaults = parseDefaults(fields.defaults);
  if (fields.skipPrefix !== undefined) options.skipPrefix = fields.skipPrefix;
  if (fields.timestamps) options.timestampPolicy = parseTimestampPolicy(fields.timestamps);
  if (fields.offset) options.rowOffset = parseIntegerOption(fields.offset, 'offset');
  if (fields.chunk) options.chunkSize = parseIntegerOption(fields.chunk, 'chunk');

  return options;
}
