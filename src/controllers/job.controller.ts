import { Request, Response } from 'express';
import { AppError, asyncHandler } from '../middleware/errorHandler';
import { isQueueName, queuesByName, QUEUE_NAMES } from '../config/redis';

/**
 * Get state, progress, result and logged events of a queued job
 */
export const getJobStatus = asyncHandler(async (req: Request, res: Response) => {
  const { queue: queueName, id } = req.params;

  if (!isQueueName(queueName)) {
    throw new AppError(
      `Unknown queue '${queueName}'. Available: ${Object.values(QUEUE_NAMES).join(', ')}`,
      404
    );
  }

  const queue = queuesByName[queueName];
  const job = await queue.getJob(id);
  if (!job) {
    throw new AppError('Job not found', 404);
  }

  const [state, { logs }] = await Promise.all([job.getState(), queue.getJobLogs(id)]);

  res.json({
    success: true,
    data: {
      id: job.id,
      queue: queueName,
      state,
      progress: job.progress,
      attemptsMade: job.attemptsMade,
      result: job.returnvalue ?? null,
      failedReason: job.failedReason ?? null,
      logs,
      createdAt: new Date(job.timestamp).toISOString(),
      finishedAt: job.finishedOn ? new Date(job.finishedOn).toISOString() : null,
    },
  });
});
