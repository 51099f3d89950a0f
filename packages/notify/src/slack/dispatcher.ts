/**
 * Slack alert dispatcher
 *
 * Resolves recipients, makes sure the bot is in the alert channel, invites the
 * recipients, uploads images and posts the alert. Recipient lookups degrade to
 * plain text; every later step aborts the dispatch with a DispatchError.
 */

import type { AlertEvent, ChannelBinding, DispatchErrorCode, SlackInstance } from '@slack-alerts/shared';
import { SlackApi } from './api';
import { buildAlertBlocks, buildFallbackText } from './blocks';
import { DispatchError, isSlackErrorType, toSlackApiError } from './errors';
import { resolveRecipients, uniqueSlackUserIds } from './mentions';
import type { DispatchFailure, DispatchResult, SlackWebApi } from './types';
import { logger as defaultLogger } from '../utils/logger';
import type { DispatchLogger } from '../utils/logger';

export const MAX_IMAGES = 5;

const CHANNEL_ID_PATTERN = /^[CG][A-Z0-9]{6,}$/;

export interface DispatchOptions {
  /** Slack API to use; defaults to a WebClient-backed SlackApi for the instance */
  api?: SlackWebApi;
  logger?: DispatchLogger;
  timeoutMs?: number;
  retries?: number;
  maxImages?: number;
}

function failure(code: DispatchErrorCode, message: string, cause?: unknown): DispatchFailure {
  const detail = cause === undefined ? '' : `: ${toSlackApiError(cause).message}`;
  return { ok: false, error: new DispatchError(code, `${message}${detail}`, cause) };
}

/**
 * Resolve a channel reference to an ID and make sure the bot is a member
 */
async function ensureChannel(api: SlackWebApi, reference: string, log: DispatchLogger): Promise<string> {
  let channelId = reference;

  if (!CHANNEL_ID_PATTERN.test(reference)) {
    // channel names are always lowercase
    const name = reference.replace(/^#/, '').toLowerCase();
    const existing = await api.findChannelByName(name);
    if (!existing) {
      // the creator is already a member
      const created = await api.createChannel(name);
      log.info(`Created channel #${name} (${created})`);
      return created;
    }
    channelId = existing;
  }

  try {
    const outcome = await api.joinChannel(channelId);
    if (outcome === 'already_member') {
      log.debug(`Already a member of ${channelId}`);
    }
  } catch (error) {
    if (isSlackErrorType(error, 'method_not_supported_for_channel_type')) {
      // private channel; the integration has to be added by hand
      log.warn(`Cannot join private channel ${channelId}, posting anyway`);
    } else {
      throw error;
    }
  }

  return channelId;
}

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'https:' || protocol === 'http:';
  } catch {
    return false;
  }
}

async function inviteMissingMembers(api: SlackWebApi, channelId: string, userIds: string[]): Promise<string[]> {
  if (userIds.length === 0) {
    return [];
  }

  const members = await api.getChannelMembers(channelId);
  const missing = userIds.filter((id) => !members.has(id));
  if (missing.length === 0) {
    return [];
  }

  try {
    await api.inviteToChannel(channelId, missing);
  } catch (error) {
    if (!isSlackErrorType(error, 'already_in_channel')) {
      throw error;
    }
  }
  return missing;
}

/**
 * Dispatch a service alert to the channel bound to the service
 */
export async function dispatchSlackAlert(
  instance: SlackInstance,
  binding: ChannelBinding,
  event: AlertEvent,
  options: DispatchOptions = {},
): Promise<DispatchResult> {
  const log = options.logger ?? defaultLogger;
  const maxImages = options.maxImages ?? MAX_IMAGES;

  if (!instance.serverUrl.trim() || !instance.accessToken.trim()) {
    return failure('CONFIGURATION_ERROR', `Slack instance ${instance.name} has no server URL or access token`);
  }

  if (!isHttpUrl(instance.serverUrl.trim())) {
    return failure('CONFIGURATION_ERROR', `Slack instance ${instance.name} has an invalid server URL: ${instance.serverUrl}`);
  }

  const channelReference = binding.channel?.trim() || instance.defaultChannel?.trim();
  if (!channelReference) {
    return failure('CONFIGURATION_ERROR', `No Slack channel configured for service ${binding.serviceId}`);
  }

  const api = options.api ?? new SlackApi(instance, { timeoutMs: options.timeoutMs, retries: options.retries });

  // Step 1: map recipients to Slack users (non-fatal)
  const recipients = await resolveRecipients(api, event.recipients, log);
  const userIds = uniqueSlackUserIds(recipients);
  const unresolved = recipients.filter((r) => r.slackUserId === null).map((r) => r.recipient.identifier);
  if (unresolved.length > 0) {
    log.warn(`Could not resolve ${unresolved.length} recipient(s) for ${event.serviceName}: ${unresolved.join(', ')}`);
  }

  // Step 2: ensure the bot is in the channel
  let channelId: string;
  try {
    channelId = await ensureChannel(api, channelReference, log);
  } catch (error) {
    return failure('CHANNEL_JOIN_FAILURE', `Could not join channel ${channelReference}`, error);
  }

  // Step 3: invite recipients who are not members yet
  try {
    const invited = await inviteMissingMembers(api, channelId, userIds);
    if (invited.length > 0) {
      log.info(`Invited ${invited.join(', ')} to ${channelId}`);
    }
  } catch (error) {
    return failure('INVITE_FAILURE', `Failed to add users to channel ${channelId}`, error);
  }

  // Step 4: upload attached images
  const fileIds: string[] = [];
  for (const image of event.images.slice(0, maxImages)) {
    try {
      fileIds.push(await api.uploadFile(image.fileName, image.data, image.title));
    } catch (error) {
      return failure('UPLOAD_FAILURE', `Failed to upload ${image.fileName} for channel ${channelId}`, error);
    }
  }

  // Step 5: post the alert
  const blocks = buildAlertBlocks({ event, recipients, fileIds });
  let messageTs: string;
  try {
    messageTs = await api.postMessage(channelId, buildFallbackText(event.serviceName, event.status), blocks);
  } catch (error) {
    log.error(`Error posting message to Slack channel ${channelId}`, error);
    return failure('POST_FAILURE', `Error posting message to Slack channel ${channelId}`, error);
  }

  log.info(`Posted ${event.status} alert for ${event.serviceName} to ${channelId} (ts ${messageTs})`);

  return {
    ok: true,
    channelId,
    messageTs,
    resolved: userIds,
    unresolved,
    fileIds,
  };
}
