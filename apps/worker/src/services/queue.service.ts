import { Injectable, OnModuleInit, Logger } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { Queue } from 'bullmq';
import { AlertDispatchPayload, alertDispatchPayloadSchema, QUEUE_NAMES } from '../types/jobs';

/**
 * Queue service for job injection
 * Used by the host to enqueue alert jobs
 */
@Injectable()
export class QueueService implements OnModuleInit {
  private readonly logger = new Logger(QueueService.name);

  constructor(
    @InjectQueue(QUEUE_NAMES.ALERTS_DISPATCH)
    private alertsDispatchQueue: Queue<AlertDispatchPayload>,
  ) {}

  async onModuleInit() {
    this.logger.log(
      `Alerts dispatch queue connected: ${(await this.alertsDispatchQueue.isPaused()) ? 'PAUSED' : 'ACTIVE'}`,
    );
  }

  /**
   * Enqueue an alert dispatch job
   *
   * The job ID is derived from the alert ID, so enqueueing the same alert twice is a no-op.
   */
  async enqueueAlertDispatch(payload: AlertDispatchPayload, options?: { delay?: number }) {
    const validated = alertDispatchPayloadSchema.parse(payload);

    const job = await this.alertsDispatchQueue.add('dispatch', validated, {
      attempts: 1,
      delay: options?.delay,
      jobId: `alert-${validated.alertId}`,
    });

    this.logger.log(
      `Enqueued alert dispatch job ${job.id} for service ${validated.service.name} (alert types: ${validated.alertTypes.join(', ')})`,
    );
    return job;
  }

  /**
   * Get queue statistics
   */
  async getStats() {
    return {
      alertsDispatch: await this.alertsDispatchQueue.getJobCounts(),
    };
  }

  /**
   * Pause the queue (for maintenance)
   */
  async pause() {
    await this.alertsDispatchQueue.pause();
    this.logger.warn('Alerts dispatch queue paused');
  }

  async resume() {
    await this.alertsDispatchQueue.resume();
    this.logger.log('Alerts dispatch queue resumed');
  }
}
