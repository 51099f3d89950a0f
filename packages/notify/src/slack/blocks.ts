/**
 * Slack block layout for service alerts
 */

import { IGNORE_SLACK_USER_ID } from '@slack-alerts/shared';
import type { AlertEvent, AlertRecipient, CheckSummary, ServiceStatus } from '@slack-alerts/shared';
import type { ContextBlock, ResolvedRecipient, SectionBlock, SlackBlock } from './types';

export const STATUS_EMOJIS: Record<ServiceStatus, string> = {
  WARNING: ':large_yellow_circle:',
  ERROR: ':red_circle:',
  CRITICAL: ':alert:',
  PASSING: ':large_green_circle:',
  ACKED: ':zipper_mouth_face:',
};

/** Button text for status links without a label; Slack rejects empty button text */
export const DEFAULT_STATUS_LINK_LABEL = 'Status';

/** Keeps a check section under Slack's 3000 character limit */
export const MAX_CHECK_ERROR_LENGTH = 2000;

export function buildFallbackText(serviceName: string, status: ServiceStatus): string {
  return `${serviceName} is ${status}`;
}

export function escapeLinkLabel(text: string): string {
  return text.replace(/>/g, '\\>');
}

export function escapeCodeSpan(text: string): string {
  return text.replace(/`/g, '\\`');
}

export function truncateError(text: string): string {
  return text.length > MAX_CHECK_ERROR_LENGTH ? `${text.slice(0, MAX_CHECK_ERROR_LENGTH)}...` : text;
}

function buildCheckSection(check: CheckSummary): SectionBlock {
  const error = check.error ? escapeCodeSpan(truncateError(check.error)) : '';
  const block: SectionBlock = {
    type: 'section',
    text: {
      type: 'mrkdwn',
      text: `*<${check.url}|${escapeLinkLabel(check.name)}>* - \`${error}\``,
    },
  };

  // button linking to the check's own dashboard (Grafana, Jenkins, ...)
  if (check.statusLink) {
    block.accessory = {
      type: 'button',
      text: {
        type: 'plain_text',
        text: check.statusLinkLabel || DEFAULT_STATUS_LINK_LABEL,
        emoji: false,
      },
      url: check.statusLink,
      action_id: 'button-status',
    };
  }

  return block;
}

/**
 * Every recipient in order: resolved ones as <@ID>, the rest as their raw identifier
 */
export function formatMentionLine(recipients: ResolvedRecipient[]): string {
  const mentions = recipients.map(({ recipient, slackUserId }) =>
    slackUserId ? `<@${slackUserId}>` : recipient.identifier,
  );
  return `${mentions.join(' ')} :point_up:`;
}

function describeMissingRecipient(recipient: AlertRecipient): string {
  let name = recipient.identifier;
  if (recipient.firstName && recipient.lastName) {
    name += ` (${recipient.firstName} ${recipient.lastName})`;
  }
  return recipient.profileUrl ? `${name} (<${recipient.profileUrl}|profile>)` : name;
}

export function formatMissingRecipientsNotice(missing: AlertRecipient[]): string {
  const names = missing.map(describeMissingRecipient).join(', ');
  return (
    `Could not find Slack account for some users: ${names}.\n` +
    'Please ensure they have a Slack account. ' +
    "If their Slack email doesn't match the email on file, set a Slack user ID override in their profile, " +
    `or enter an ID of '${IGNORE_SLACK_USER_ID}' to silence this warning.`
  );
}

function contextBlock(text: string): ContextBlock {
  return {
    type: 'context',
    elements: [{ type: 'mrkdwn', text }],
  };
}

export interface AlertLayoutInput {
  event: AlertEvent;
  recipients: ResolvedRecipient[];
  fileIds: string[];
}

export function buildAlertBlocks({ event, recipients, fileIds }: AlertLayoutInput): SlackBlock[] {
  const emoji = STATUS_EMOJIS[event.status];
  const blocks: SlackBlock[] = [
    {
      type: 'header',
      text: {
        type: 'plain_text',
        text: `${emoji} ${event.serviceName} status is ${event.status} ${emoji}`,
      },
    },
  ];

  if (event.messageBody) {
    blocks.push({
      type: 'section',
      text: { type: 'mrkdwn', text: event.messageBody },
    });
  }

  for (const check of event.checks) {
    blocks.push(buildCheckSection(check));
  }

  fileIds.forEach((fileId, index) => {
    const image = event.images[index];
    blocks.push({
      type: 'image',
      slack_file: { id: fileId },
      alt_text: image?.title ?? image?.fileName ?? 'alert image',
    });
  });

  if (event.mentionRecipients && recipients.length > 0) {
    blocks.push(contextBlock(formatMentionLine(recipients)));

    const missing = recipients.filter((r) => r.slackUserId === null).map((r) => r.recipient);
    if (missing.length > 0) {
      blocks.push(contextBlock(formatMissingRecipientsNotice(missing)));
    }
  }

  return blocks;
}
