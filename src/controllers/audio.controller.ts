import path from 'path';
import { Request, Response } from 'express';
import { AppError, asyncHandler } from '../middleware/errorHandler';
import { deduplicationQueue } from '../config/redis';
import { logger } from '../config/logger';
import {
  describeRepeatMatch,
  detectAdjacentRepeats,
  findOverlappingIntervals,
  sortIntervals,
} from '../utils/repeat-detector';
import { MAX_PHRASE_LEN_LIMIT, REPEAT_DETECTION_DEFAULTS } from '../config/constants';
import type { Word } from '../types/transcript.types';

interface DetectRepeatsBody {
  words: Word[];
  minWords: number;
  maxPhraseLen: number;
  maxGapMs: number;
}

const optionalInt = (value: unknown, fallback: number, max = Number.MAX_SAFE_INTEGER): number => {
  if (typeof value !== 'string' || value.trim() === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new AppError(`Expected a non-negative integer, got '${value}'`, 400);
  }
  if (parsed > max) {
    throw new AppError(`Expected an integer no greater than ${max}, got '${value}'`, 400);
  }
  return parsed;
};

/**
 * Find repeated words and phrases in a timed transcript
 */
export const detectRepeats = asyncHandler(async (req: Request, res: Response) => {
  const { words, minWords, maxPhraseLen, maxGapMs }: DetectRepeatsBody = req.body;

  const { intervals, matches } = detectAdjacentRepeats(words, { minWords, maxPhraseLen, maxGapMs });
  const sorted = sortIntervals(intervals);

  res.json({
    success: true,
    data: {
      intervals,
      sorted,
      overlaps: findOverlappingIntervals(sorted),
      matches: matches.map((match) => ({ ...match, description: describeRepeatMatch(match) })),
    },
  });
});

/**
 * Queue an uploaded recording for repeat removal
 */
export const dedupeAudio = asyncHandler(async (req: Request, res: Response) => {
  if (!req.file) {
    throw new AppError('No audio file uploaded (expected field "audio")', 400);
  }

  const job = await deduplicationQueue.add('dedupe', {
    inputPath: path.resolve(req.file.path),
    originalName: req.file.originalname,
    minWords: optionalInt(req.body.minWords, REPEAT_DETECTION_DEFAULTS.minWords),
    maxPhraseLen: optionalInt(req.body.maxPhraseLen, REPEAT_DETECTION_DEFAULTS.maxPhraseLen, MAX_PHRASE_LEN_LIMIT),
    maxGapMs: optionalInt(req.body.maxGapMs, REPEAT_DETECTION_DEFAULTS.maxGapMs),
  });

  logger.info(`Queued deduplication job ${job.id}`, {
    file: req.file.originalname,
    size: req.file.size,
  });

  res.status(202).json({
    success: true,
    data: {
      jobId: job.id,
      queue: deduplicationQueue.name,
    },
  });
});
