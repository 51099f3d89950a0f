import { Processor, WorkerHost } from '@nestjs/bullmq';
import { Logger, OnApplicationBootstrap } from '@nestjs/common';
import { Job, UnrecoverableError } from 'bullmq';
import { getDispatchErrorInfo } from '@slack-alerts/shared';
import type { ServiceAlert } from '@slack-alerts/shared';
import { alertDispatchPayloadSchema, AlertDispatchPayload, QUEUE_NAMES } from '../types/jobs';
import { WorkerConfigService } from '../config/config.service';
import { AlertHistoryService } from '../services/alert-history.service';
import { AlertPluginRegistry } from '../plugins/alert-plugin.registry';
import type { PluginResult } from '../plugins/alert-plugin.interface';

type DispatchJob = Pick<Job<AlertDispatchPayload>, 'id' | 'data'>;

/**
 * Processor for alerts-dispatch queue
 *
 * Runs every alert plugin named in the job and records one history entry per
 * outcome. Failures are recorded, never rethrown: the queue runs one attempt.
 */
@Processor(QUEUE_NAMES.ALERTS_DISPATCH, {
  concurrency: 10, // overridden from config on bootstrap
})
export class AlertProcessor extends WorkerHost implements OnApplicationBootstrap {
  private readonly logger = new Logger(AlertProcessor.name);

  constructor(
    private config: WorkerConfigService,
    private registry: AlertPluginRegistry,
    private history: AlertHistoryService,
  ) {
    super();
  }

  onApplicationBootstrap() {
    this.worker.concurrency = this.config.concurrency.alertsDispatch;
  }

  async process(job: DispatchJob): Promise<PluginResult[]> {
    const parsed = alertDispatchPayloadSchema.safeParse(job.data);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      this.logger.error(`[Job ${job.id}] Invalid alert payload: ${issues}`);
      throw new UnrecoverableError(`Invalid alert payload: ${issues}`);
    }

    const { alertTypes, ...alert } = parsed.data;
    const serviceAlert: ServiceAlert = alert;

    this.logger.log(
      `[Job ${job.id}] Dispatching ${alert.service.overallStatus} alert ${alert.alertId} for ${alert.service.name} via ${alertTypes.join(', ')}`,
    );

    const results: PluginResult[] = [];
    for (const alertType of alertTypes) {
      const result = await this.runPlugin(job, alertType, serviceAlert);
      results.push(result);

      try {
        await this.history.record({
          alertId: alert.alertId,
          serviceId: alert.service.id,
          plugin: alertType,
          success: result.success,
          ...(result.skipped ? { skipped: true } : {}),
          ...(result.error ? { error: result.error } : {}),
          ...(result.errorCode ? { errorCode: result.errorCode } : {}),
          ...(result.messageTs ? { messageTs: result.messageTs } : {}),
        });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(`[Job ${job.id}] Failed to record ${alertType} outcome: ${message}`);
      }
    }

    const successCount = results.filter((r) => r.success).length;
    this.logger.log(
      `[Job ${job.id}] Alert dispatch completed: ${successCount}/${results.length} plugins successful`,
    );
    return results;
  }

  private async runPlugin(job: DispatchJob, alertType: string, alert: ServiceAlert): Promise<PluginResult> {
    const plugin = this.registry.get(alertType);
    if (!plugin) {
      this.logger.error(`[Job ${job.id}] Unknown alert type: ${alertType}`);
      return { success: false, error: `Unknown alert type: ${alertType}` };
    }

    try {
      const result = await plugin.sendAlert(alert);
      if (result.skipped) {
        this.logger.log(`[Job ${job.id}] ${plugin.name} skipped by status policy`);
      } else if (result.success) {
        this.logger.log(`[Job ${job.id}] ${plugin.name} alert sent (ts ${result.messageTs ?? '-'})`);
      } else {
        this.logger.error(`[Job ${job.id}] ${plugin.name} alert failed: ${result.error}`);
        const info = getDispatchErrorInfo(result.errorCode);
        if (info) {
          this.logger.warn(`[Job ${job.id}] ${info.title}: ${info.recommendation}`);
        }
      }
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`[Job ${job.id}] Exception in ${plugin.name} plugin: ${message}`);
      return { success: false, error: message };
    }
  }
}
