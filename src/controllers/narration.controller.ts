import path from 'path';
import { Request, Response } from 'express';
import { AppError, asyncHandler } from '../middleware/errorHandler';
import { narrationQueue } from '../config/redis';
import { logger } from '../config/logger';
import { assignVoicesToChunks } from '../services/narration/pipeline-chunker';
import type { VoiceInput } from '../services/voice/voice-binder';
import { catalogVoiceNames } from '../services/voice/voice-catalog';
import { listPromptKeys } from '../services/prompt.service';
import type { NarrationJobData } from '../types/job.types';

interface PreviewChunksBody {
  text: string;
  voice: string;
  voices?: VoiceInput[];
  maxLength: number;
}

const documentsDir = () => path.resolve(process.cwd(), process.env.DOCUMENTS_DIR || 'documents');

/** Resolve a client-supplied document path inside the documents directory. */
const resolveDocumentPath = (documentPath: string): string => {
  const root = documentsDir();
  const resolved = path.resolve(root, documentPath);
  if (!resolved.startsWith(root + path.sep)) {
    throw new AppError('documentPath must point inside the documents directory', 400);
  }
  return resolved;
};

/**
 * Split tagged text into voice-assigned TTS chunks without synthesizing
 */
export const previewChunks = asyncHandler(async (req: Request, res: Response) => {
  const { text, voice, voices, maxLength }: PreviewChunksBody = req.body;

  const pool = voices && voices.length > 0 ? voices : catalogVoiceNames();
  const chunks = assignVoicesToChunks(text, voice, pool, maxLength);

  res.json({
    success: true,
    data: {
      chunks,
      count: chunks.length,
    },
  });
});

/**
 * Queue a document narration job
 */
export const createNarration = asyncHandler(async (req: Request, res: Response) => {
  const body: NarrationJobData = req.body;
  const data: NarrationJobData = body.documentPath
    ? { ...body, documentPath: resolveDocumentPath(body.documentPath) }
    : body;

  const job = await narrationQueue.add('narrate', data);

  logger.info(`Queued narration job ${job.id}`, {
    model: data.model,
    promptKey: data.promptKey,
    skipTts: data.skipTts,
  });

  res.status(202).json({
    success: true,
    data: {
      jobId: job.id,
      queue: narrationQueue.name,
    },
  });
});

/**
 * List the prompt keys a narration request may use
 */
export const getPrompts = asyncHandler(async (req: Request, res: Response) => {
  res.json({
    success: true,
    data: listPromptKeys(),
  });
});
