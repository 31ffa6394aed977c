/**
 * Notification Queue
 *
 * In-process queue for customer notifications. Jobs are fire-and-forget from
 * the caller's point of view: the quote mutation is already committed when a
 * job is enqueued, and a failed or undelivered notification is only logged.
 */

import PQueue from 'p-queue';
import { logger } from '../logger';

export interface NotificationJob {
  /** Short label for logs, e.g. "status_change" */
  kind: string;
  quoteId: string;
  /** Resolves to whether the message was delivered */
  run: () => Promise<boolean>;
  /** Called only after a delivered notification */
  onDelivered?: () => Promise<void>;
}

export interface NotificationQueueStatus {
  size: number;
  pending: number;
}

export class NotificationQueue {
  private readonly queue: PQueue;

  constructor(concurrency: number = 2) {
    this.queue = new PQueue({ concurrency });
  }

  /**
   * Schedules a job. Returns false only when the job could not be scheduled.
   */
  enqueue(job: NotificationJob): boolean {
    try {
      this.queue.add(() => this.process(job)).catch((error) => {
        logger.error(`[NotificationQueue] Queue error for ${job.kind}`, { quoteId: job.quoteId, error });
      });
      return true;
    } catch (error) {
      logger.error(`[NotificationQueue] Failed to schedule ${job.kind}`, { quoteId: job.quoteId, error });
      return false;
    }
  }

  private async process(job: NotificationJob): Promise<void> {
    try {
      const delivered = await job.run();
      if (!delivered) {
        logger.warn(`[NotificationQueue] ${job.kind} not delivered`, { quoteId: job.quoteId });
        return;
      }

      logger.info(`[NotificationQueue] ${job.kind} delivered`, { quoteId: job.quoteId });
      if (job.onDelivered) {
        await job.onDelivered();
      }
    } catch (error) {
      logger.error(`[NotificationQueue] ${job.kind} failed`, { quoteId: job.quoteId, error });
    }
  }

  /**
   * Resolves once every queued and running job has settled
   */
  async onIdle(): Promise<void> {
    await this.queue.onIdle();
  }

  getStatus(): NotificationQueueStatus {
    return {
      size: this.queue.size,
      pending: this.queue.pending,
    };
  }
}
