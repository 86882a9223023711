import { Worker, Job } from 'bullmq';
import { QUEUE_NAMES } from '../config/redis';
import redisConnection from '../config/redis';
import { logger } from '../config/logger';
import { envInt } from '../config/env';
import audioDeduplicationService from '../services/dedup/audio-deduplication.service';
import type { DeduplicationResult } from '../services/dedup/audio-deduplication.service';
import type { DeduplicationJobData } from '../types/job.types';
import type { PipelineEvent } from '../types/narration.types';
import { JobReporter } from './job-reporter';

export type DeduplicationJobResult = DeduplicationResult & { events: PipelineEvent[] };

/**
 * Process audio deduplication jobs
 */
const processDeduplication = async (job: Job<DeduplicationJobData>): Promise<DeduplicationJobResult> => {
  const { inputPath, originalName, minWords, maxPhraseLen, maxGapMs } = job.data;

  logger.info(`Processing deduplication job ${job.id}`, { inputPath, originalName });

  const reporter = new JobReporter(job);
  try {
    reporter.progress(10);
    const { events, result } = await audioDeduplicationService.cleanAudio(inputPath, {
      minWords,
      maxPhraseLen,
      maxGapMs,
      onEvent: reporter.onEvent,
    });
    reporter.progress(100);
    return { ...result, events };
  } catch (error: unknown) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error(`Deduplication failed for job ${job.id}:`, {
      error: err.message,
      stack: err.stack,
    });
    throw err;
  } finally {
    await reporter.flush();
  }
};

/**
 * Create and start the deduplication worker
 */
export const createDeduplicationWorker = () => {
  const worker = new Worker<DeduplicationJobData, DeduplicationJobResult>(
    QUEUE_NAMES.AUDIO_DEDUPLICATION,
    processDeduplication,
    {
      connection: redisConnection,
      concurrency: envInt('DEDUP_CONCURRENCY', 2),
    }
  );

  worker.on('completed', (job) => {
    logger.info(`Deduplication job ${job.id} completed`, {
      status: job.returnvalue.status,
      outputPath: job.returnvalue.outputPath,
    });
  });

  worker.on('failed', (job, err) => {
    logger.error(`Deduplication job ${job?.id} failed:`, {
      error: err.message,
      attempts: job?.attemptsMade,
    });
  });

  worker.on('error', (err) => {
    logger.error('Deduplication worker error:', err);
  });

  logger.info('Deduplication worker started');

  return worker;
};

export default createDeduplicationWorker;
