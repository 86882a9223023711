import { Queue, QueueEvents } from 'bullmq';
import type { DefaultJobOptions } from 'bullmq';
import Redis from 'ioredis';
import { logger } from './logger';
import type { DeduplicationJobData, NarrationJobData } from '../types/job.types';

// Redis connection configuration
const redisConnection = new Redis(process.env.REDIS_URL || 'redis://localhost:6379', {
  maxRetriesPerRequest: null,
  enableReadyCheck: false,
});

redisConnection.on('connect', () => {
  logger.info('Redis connected successfully');
});

redisConnection.on('error', (error) => {
  logger.error('Redis connection error:', error);
});

// Queue names
export const QUEUE_NAMES = {
  NARRATION: 'narration',
  AUDIO_DEDUPLICATION: 'audio-deduplication',
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

const defaultJobOptions: DefaultJobOptions = {
  attempts: 2,
  backoff: {
    type: 'exponential',
    delay: 2000,
  },
  removeOnComplete: {
    count: 100, // Keep last 100 completed jobs
    age: 24 * 3600, // Keep for 24 hours
  },
  removeOnFail: {
    count: 200, // Keep last 200 failed jobs
  },
};

// Create queues
export const narrationQueue = new Queue<NarrationJobData>(QUEUE_NAMES.NARRATION, {
  connection: redisConnection,
  defaultJobOptions,
});

export const deduplicationQueue = new Queue<DeduplicationJobData>(QUEUE_NAMES.AUDIO_DEDUPLICATION, {
  connection: redisConnection,
  defaultJobOptions: {
    ...defaultJobOptions,
    attempts: 1,
  },
});

export const queuesByName: Record<QueueName, Queue> = {
  [QUEUE_NAMES.NARRATION]: narrationQueue,
  [QUEUE_NAMES.AUDIO_DEDUPLICATION]: deduplicationQueue,
};

export function isQueueName(name: string): name is QueueName {
  return Object.values<string>(QUEUE_NAMES).includes(name);
}

// Queue events for monitoring
const setupQueueEvents = (queueName: string) => {
  const queueEvents = new QueueEvents(queueName, { connection: redisConnection });

  queueEvents.on('completed', ({ jobId }) => {
    logger.info(`Job ${jobId} in queue ${queueName} completed`);
  });

  queueEvents.on('failed', ({ jobId, failedReason }) => {
    logger.error(`Job ${jobId} in queue ${queueName} failed:`, { failedReason });
  });

  queueEvents.on('progress', ({ jobId, data }) => {
    logger.debug(`Job ${jobId} in queue ${queueName} progress:`, { data });
  });
};

// Setup events for all queues
Object.values(QUEUE_NAMES).forEach(setupQueueEvents);

export default redisConnection;
