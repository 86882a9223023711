import type { Job } from 'bullmq';
import { logger } from '../config/logger';
import type { PipelineEvent } from '../types/narration.types';

/** The parts of a bullmq job the reporter writes to. */
export type ReportableJob = Pick<Job, 'id' | 'log' | 'updateProgress'>;

/**
 * Forwards workflow events and progress to a bullmq job. Calls are queued so
 * the workflow can report synchronously; `flush` waits for all of them.
 */
export class JobReporter {
  private pending: Promise<void>[] = [];

  constructor(private readonly job: ReportableJob) {}

  onEvent = (event: PipelineEvent): void => {
    this.track(this.job.log(`[${event.level}] ${event.message}`), 'log');
  };

  progress = (percent: number): void => {
    this.track(this.job.updateProgress(percent), 'progress');
  };

  async flush(): Promise<void> {
    const pending = this.pending;
    this.pending = [];
    await Promise.all(pending);
  }

  private track(call: Promise<unknown>, what: string): void {
    this.pending.push(
      call.then(
        () => undefined,
        (error: unknown) => {
          logger.warn(`Could not record job ${what} for job ${this.job.id}`, {
            error: error instanceof Error ? error.message : String(error),
          });
        }
      )
    );
  }
}
