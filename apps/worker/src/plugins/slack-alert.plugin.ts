import { Injectable, Logger } from '@nestjs/common';
import { alertPolicy, dispatchSlackAlert, DEFAULT_STATUS_LINK_LABEL } from '@slack-alerts/notify';
import type { DispatchLogger } from '@slack-alerts/notify';
import type {
  AlertEvent,
  AlertRecipient,
  AlertUser,
  CheckSummary,
  ImageAttachment,
  ServiceAlert,
  ServiceCheckSnapshot,
} from '@slack-alerts/shared';
import { WorkerConfigService } from '../config/config.service';
import { SlackConfigService } from '../services/slack-config.service';
import type { AlertPlugin, PluginResult } from './alert-plugin.interface';

/**
 * Posts service alerts to the Slack channel bound to the service
 */
@Injectable()
export class SlackAlertPlugin implements AlertPlugin {
  readonly name = 'Slack';

  private readonly logger = new Logger(SlackAlertPlugin.name);

  /** Routes dispatcher logs through the Nest logger */
  private readonly dispatchLogger: DispatchLogger = {
    debug: (message) => this.logger.debug(message),
    info: (message) => this.logger.log(message),
    warn: (message) => this.logger.warn(message),
    error: (message, error) =>
      this.logger.error(message, error instanceof Error ? error.stack : undefined),
  };

  constructor(
    private config: WorkerConfigService,
    private slackConfig: SlackConfigService,
  ) {}

  async sendAlert(alert: ServiceAlert): Promise<PluginResult> {
    const { service } = alert;
    const policy = alertPolicy(service.overallStatus, service.oldOverallStatus);
    if (!policy.send) {
      this.logger.debug(
        `Skipping ${service.oldOverallStatus} -> ${service.overallStatus} alert for ${service.name}`,
      );
      return { success: true, skipped: true };
    }

    const binding = await this.slackConfig.getBinding(service.id);
    if (!binding) {
      return {
        success: false,
        errorCode: 'CONFIGURATION_ERROR',
        error: `No Slack channel binding for service ${service.name}`,
      };
    }

    const instance = await this.slackConfig.getInstance(binding.slackInstanceId);
    if (!instance) {
      return {
        success: false,
        errorCode: 'CONFIGURATION_ERROR',
        error: `Slack instance ${binding.slackInstanceId} not found`,
      };
    }

    const users = [...alert.users, ...alert.dutyOfficers];
    const overrides = await this.slackConfig.getUserOverrides(users.map((user) => user.id));
    const { maxImages, timeoutMs, retries } = this.config.slack;

    const event: AlertEvent = {
      serviceName: service.name,
      status: service.overallStatus,
      previousStatus: service.oldOverallStatus,
      checks: service.checks.map((check) => this.toCheckSummary(check)),
      images: this.collectImages(service.checks, maxImages),
      recipients: users.map((user) => this.toRecipient(user, overrides.get(user.id))),
      mentionRecipients: policy.mentionRecipients,
    };

    const result = await dispatchSlackAlert(instance, binding, event, {
      logger: this.dispatchLogger,
      timeoutMs,
      retries,
      maxImages,
    });

    if (!result.ok) {
      return { success: false, error: result.error.message, errorCode: result.error.code };
    }
    return { success: true, messageTs: result.messageTs };
  }

  private toCheckSummary(check: ServiceCheckSnapshot): CheckSummary {
    const { publicBaseUrl, jenkinsUrl } = this.config.links;
    const summary: CheckSummary = {
      name: check.name,
      url: check.url || new URL(`check/${check.id}/`, withTrailingSlash(publicBaseUrl)).toString(),
      error: check.lastError ?? null,
    };

    if (check.category === 'jenkins' && jenkinsUrl && check.jobNumber != null) {
      summary.statusLink = new URL(
        `job/${encodeURIComponent(check.name)}/${check.jobNumber}/console`,
        withTrailingSlash(jenkinsUrl),
      ).toString();
      summary.statusLinkLabel = 'Jenkins';
    } else if (check.statusLink) {
      summary.statusLink = check.statusLink;
      summary.statusLinkLabel = check.category === 'metrics' ? 'Grafana' : DEFAULT_STATUS_LINK_LABEL;
    }

    return summary;
  }

  private collectImages(checks: ServiceCheckSnapshot[], maxImages: number): ImageAttachment[] {
    const images: ImageAttachment[] = [];
    for (const check of checks.slice(0, maxImages)) {
      if (!check.image) continue;
      images.push({
        fileName: check.image.fileName ?? `${check.id}.png`,
        data: Buffer.from(check.image.contentBase64, 'base64'),
        title: check.name,
      });
    }
    return images;
  }

  private toRecipient(user: AlertUser, override: string | undefined): AlertRecipient {
    const { publicBaseUrl } = this.config.links;
    return {
      identifier: user.email || user.username,
      slackUserId: override ?? null,
      firstName: user.firstName ?? null,
      lastName: user.lastName ?? null,
      profileUrl: new URL(`user/${user.id}/profile/Slack/`, withTrailingSlash(publicBaseUrl)).toString(),
    };
  }
}

function withTrailingSlash(url: string): string {
  return url.endsWith('/') ? url : `${url}/`;
}
