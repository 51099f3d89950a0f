import { IGNORE_SLACK_USER_ID } from '@slack-alerts/shared';
import type { AlertRecipient } from '@slack-alerts/shared';
import { isSlackErrorType } from './errors';
import type { ResolvedRecipient, SlackUserSummary, SlackWebApi } from './types';
import type { DispatchLogger } from '../utils/logger';

const SLACK_USER_ID_PATTERN = /^[UW][A-Z0-9]{2,}$/;

export function looksLikeSlackUserId(value: string): boolean {
  return SLACK_USER_ID_PATTERN.test(value);
}

function isEmail(identifier: string): boolean {
  const at = identifier.indexOf('@');
  return at > 0 && at < identifier.length - 1;
}

/**
 * Per-dispatch resolver; users.list is fetched at most once
 */
class RecipientResolver {
  private directory: Promise<SlackUserSummary[]> | null = null;

  constructor(
    private readonly api: SlackWebApi,
    private readonly log: DispatchLogger,
  ) {}

  async resolve(recipient: AlertRecipient): Promise<string | null> {
    const override = recipient.slackUserId?.trim();
    if (override) {
      return override;
    }

    const identifier = recipient.identifier.trim();
    if (looksLikeSlackUserId(identifier)) {
      return identifier;
    }

    try {
      if (isEmail(identifier)) {
        return await this.api.lookupUserByEmail(identifier);
      }
      return await this.lookupHandle(identifier.replace(/^@/, ''));
    } catch (error) {
      if (isSlackErrorType(error, 'users_not_found')) {
        this.log.debug(`No Slack user for ${identifier}`);
      } else {
        this.log.error(`Failed to find Slack user for ${identifier}`, error);
      }
      return null;
    }
  }

  private async lookupHandle(handle: string): Promise<string | null> {
    if (!this.directory) {
      this.directory = this.api.listUsers();
    }
    const users = await this.directory;
    const wanted = handle.toLowerCase();
    const match = users.find(
      (user) => user.name.toLowerCase() === wanted || user.displayName?.toLowerCase() === wanted,
    );
    if (!match) {
      this.log.debug(`No Slack user with handle ${handle}`);
      return null;
    }
    return match.id;
  }
}

/**
 * Map recipients to Slack user IDs. Misses are kept with a null ID so the
 * message can show them as plain text; ignored recipients are dropped.
 */
export async function resolveRecipients(
  api: SlackWebApi,
  recipients: AlertRecipient[],
  log: DispatchLogger,
): Promise<ResolvedRecipient[]> {
  const resolver = new RecipientResolver(api, log);
  const resolved: ResolvedRecipient[] = [];

  for (const recipient of recipients) {
    if (recipient.slackUserId?.trim() === IGNORE_SLACK_USER_ID) {
      continue;
    }
    const slackUserId = await resolver.resolve(recipient);
    resolved.push({ recipient, slackUserId });
  }

  return resolved;
}

export function uniqueSlackUserIds(recipients: ResolvedRecipient[]): string[] {
  const ids = new Set<string>();
  for (const { slackUserId } of recipients) {
    if (slackUserId) ids.add(slackUserId);
  }
  return [...ids];
}
