import { Worker, Job } from 'bullmq';
import { QUEUE_NAMES } from '../config/redis';
import redisConnection from '../config/redis';
import { logger } from '../config/logger';
import { envInt } from '../config/env';
import narrationOrchestrator from '../services/narration/narration.orchestrator';
import type { NarrationResult } from '../services/narration/narration.orchestrator';
import type { NarrationJobData } from '../types/job.types';
import type { PipelineEvent } from '../types/narration.types';
import { JobReporter } from './job-reporter';

export type NarrationJobResult = NarrationResult & { events: PipelineEvent[] };

/**
 * Process narration jobs
 */
const processNarration = async (job: Job<NarrationJobData>): Promise<NarrationJobResult> => {
  logger.info(`Processing narration job ${job.id}`, {
    model: job.data.model,
    promptKey: job.data.promptKey,
    voice: job.data.voice,
    source: job.data.documentPath ?? 'inline text',
  });

  const reporter = new JobReporter(job);
  try {
    const { events, result } = await narrationOrchestrator.narrate(job.data, {
      onEvent: reporter.onEvent,
      onProgress: ({ progress }) => reporter.progress(progress),
    });
    return { ...result, events };
  } catch (error: unknown) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error(`Narration failed for job ${job.id}:`, {
      error: err.message,
      stack: err.stack,
    });
    throw err;
  } finally {
    await reporter.flush();
  }
};

/**
 * Create and start the narration worker
 */
export const createNarrationWorker = () => {
  const worker = new Worker<NarrationJobData, NarrationJobResult>(QUEUE_NAMES.NARRATION, processNarration, {
    connection: redisConnection,
    concurrency: envInt('NARRATION_CONCURRENCY', 1), // TTS server handles one request at a time
  });

  worker.on('completed', (job) => {
    logger.info(`Narration job ${job.id} completed successfully`, { audioPath: job.returnvalue.audioPath });
  });

  worker.on('failed', (job, err) => {
    logger.error(`Narration job ${job?.id} failed:`, {
      error: err.message,
      attempts: job?.attemptsMade,
    });
  });

  worker.on('error', (err) => {
    logger.error('Narration worker error:', err);
  });

  logger.info('Narration worker started');

  return worker;
};

export default createNarrationWorker;
