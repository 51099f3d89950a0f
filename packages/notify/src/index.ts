// @slack-alerts/notify - Slack alert dispatch

export { dispatchSlackAlert, MAX_IMAGES } from './slack/dispatcher';
export type { DispatchOptions } from './slack/dispatcher';
export { SlackApi, buildApiUrl, createWebClient } from './slack/api';
export { alertPolicy } from './slack/policy';
export type { AlertPolicy } from './slack/policy';
export {
  DEFAULT_STATUS_LINK_LABEL,
  STATUS_EMOJIS,
  buildAlertBlocks,
  buildFallbackText,
  formatMentionLine,
  formatMissingRecipientsNotice,
} from './slack/blocks';
export { resolveRecipients, looksLikeSlackUserId } from './slack/mentions';
export { DispatchError, SlackApiError, toSlackApiError } from './slack/errors';
export { createLogger, logger } from './utils/logger';
export type { DispatchLogger } from './utils/logger';
export * from './slack/types';
