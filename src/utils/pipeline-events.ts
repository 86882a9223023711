import { logger } from '../config/logger';
import type {
  PipelineEvent,
  PipelineEventLevel,
  PipelineEventListener,
} from '../types/narration.types';

/**
 * Collects the events of one workflow run, forwards each to an optional
 * listener and mirrors it to the logger.
 */
export class PipelineEventRecorder {
  readonly events: PipelineEvent[] = [];

  constructor(
    private readonly listener?: PipelineEventListener,
    private readonly meta: Record<string, unknown> = {}
  ) {}

  info(message: string): void {
    this.record('info', message);
  }

  warn(message: string): void {
    this.record('warn', message);
  }

  error(message: string): void {
    this.record('error', message);
  }

  private record(level: PipelineEventLevel, message: string): void {
    const event: PipelineEvent = { level, message };
    this.events.push(event);
    logger.log(level, message, this.meta);
    this.listener?.(event);
  }
}
