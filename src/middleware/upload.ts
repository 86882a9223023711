import fs from 'fs';
import path from 'path';
import multer from 'multer';
import { v4 as uuidv4 } from 'uuid';
import { AppError } from './errorHandler';
import { envInt } from '../config/env';

const ALLOWED_AUDIO_TYPES = ['audio/mpeg', 'audio/mp3', 'audio/wav', 'audio/x-wav', 'audio/wave', 'audio/ogg', 'audio/flac'];

export const audioUploadDir = (): string => path.join(process.env.UPLOAD_DIR || './uploads', 'audio');

const storage = multer.diskStorage({
  destination: (req, file, cb) => {
    const dir = audioUploadDir();
    fs.mkdirSync(dir, { recursive: true });
    cb(null, dir);
  },
  filename: (req, file, cb) => {
    cb(null, `upload-${uuidv4()}${path.extname(file.originalname)}`);
  },
});

export const audioUpload = multer({
  storage,
  limits: {
    fileSize: envInt('MAX_FILE_SIZE', 52428800), // 50MB default
  },
  fileFilter: (req, file, cb) => {
    if (ALLOWED_AUDIO_TYPES.includes(file.mimetype)) {
      cb(null, true);
    } else {
      cb(new AppError('Invalid file type. Only audio files are allowed.', 415));
    }
  },
});
