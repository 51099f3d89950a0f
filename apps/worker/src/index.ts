/**
 * Public API for the alert worker
 * Lets the host enqueue alerts and manage Slack configuration
 */

export { WorkerModule } from './worker.module';
export { QueueService } from './services/queue.service';
export { SlackConfigService } from './services/slack-config.service';
export type { SlackInstanceInput, ChannelBindingInput } from './services/slack-config.service';
export { AlertHistoryService } from './services/alert-history.service';
export { WorkerConfigService } from './config/config.service';
export type { AlertPlugin, PluginResult } from './plugins/alert-plugin.interface';

export { QUEUE_NAMES, alertDispatchPayloadSchema } from './types/jobs';
export type { AlertDispatchPayload, ParsedAlertDispatch, QueueName } from './types/jobs';
