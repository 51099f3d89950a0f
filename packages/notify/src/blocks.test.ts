/**
 * Unit tests for the alert block layout
 */

import {
  buildAlertBlocks,
  buildFallbackText,
  escapeCodeSpan,
  escapeLinkLabel,
  formatMentionLine,
  formatMissingRecipientsNotice,
} from './slack/blocks';
import type { AlertEvent } from '@slack-alerts/shared';

describe('Alert block layout', () => {
  const event: AlertEvent = {
    serviceName: 'Checkout',
    status: 'CRITICAL',
    checks: [],
    images: [],
    recipients: [],
    mentionRecipients: true,
  };

  describe('buildFallbackText', () => {
    it('should name the service and status', () => {
      expect(buildFallbackText('Checkout', 'ACKED')).toBe('Checkout is ACKED');
    });
  });

  describe('escaping', () => {
    it('should escape > in link labels', () => {
      expect(escapeLinkLabel('p99 > 2s')).toBe('p99 \\> 2s');
    });

    it('should escape backticks in code spans', () => {
      expect(escapeCodeSpan('timeout `db`')).toBe('timeout \\`db\\`');
    });
  });

  describe('buildAlertBlocks', () => {
    it('should start with a header carrying the status emoji', () => {
      const blocks = buildAlertBlocks({ event, recipients: [], fileIds: [] });

      expect(blocks).toEqual([
        {
          type: 'header',
          text: { type: 'plain_text', text: ':alert: Checkout status is CRITICAL :alert:' },
        },
      ]);
    });

    it('should add the message body as a section', () => {
      const blocks = buildAlertBlocks({
        event: { ...event, messageBody: 'Error rate above 5%' },
        recipients: [],
        fileIds: [],
      });

      expect(blocks[1]).toEqual({ type: 'section', text: { type: 'mrkdwn', text: 'Error rate above 5%' } });
    });

    it('should render a section per check with a status button', () => {
      const blocks = buildAlertBlocks({
        event: {
          ...event,
          checks: [
            {
              name: 'p99 > 2s',
              url: 'http://localhost/check/7/',
              error: 'timeout `db`',
              statusLink: 'https://grafana.example.com/d/1',
              statusLinkLabel: 'Grafana',
            },
            { name: 'ping', url: 'http://localhost/check/8/' },
          ],
        },
        recipients: [],
        fileIds: [],
      });

      expect(blocks[1]).toEqual({
        type: 'section',
        text: { type: 'mrkdwn', text: '*<http://localhost/check/7/|p99 \\> 2s>* - `timeout \\`db\\``' },
        accessory: {
          type: 'button',
          text: { type: 'plain_text', text: 'Grafana', emoji: false },
          url: 'https://grafana.example.com/d/1',
          action_id: 'button-status',
        },
      });
      expect(blocks[2]).toEqual({
        type: 'section',
        text: { type: 'mrkdwn', text: '*<http://localhost/check/8/|ping>* - ``' },
      });
    });

    it('should label status buttons that have no label', () => {
      const blocks = buildAlertBlocks({
        event: {
          ...event,
          checks: [{ name: 'ping', url: 'http://localhost/check/8/', statusLink: 'https://dash.example.com/8' }],
        },
        recipients: [],
        fileIds: [],
      });

      expect(blocks[1]).toMatchObject({
        accessory: { text: { type: 'plain_text', text: 'Status', emoji: false } },
      });
    });

    it('should truncate long check errors', () => {
      const blocks = buildAlertBlocks({
        event: {
          ...event,
          checks: [{ name: 'ping', url: 'http://localhost/check/8/', error: 'x'.repeat(5000) }],
        },
        recipients: [],
        fileIds: [],
      });

      expect(blocks[1]).toEqual({
        type: 'section',
        text: { type: 'mrkdwn', text: `*<http://localhost/check/8/|ping>* - \`${'x'.repeat(2000)}...\`` },
      });
    });

    it('should add the mention line and the missing users notice', () => {
      const blocks = buildAlertBlocks({
        event,
        recipients: [
          { recipient: { identifier: 'alice@example.com' }, slackUserId: 'U0ALICE' },
          {
            recipient: {
              identifier: 'carol@example.com',
              firstName: 'Carol',
              lastName: 'Jones',
              profileUrl: 'http://localhost/user/3/profile/Slack/',
            },
            slackUserId: null,
          },
        ],
        fileIds: [],
      });

      expect(blocks).toHaveLength(3);
      expect(blocks[1]).toEqual({
        type: 'context',
        elements: [{ type: 'mrkdwn', text: '<@U0ALICE> carol@example.com :point_up:' }],
      });
      expect(blocks[2]).toEqual({
        type: 'context',
        elements: [
          {
            type: 'mrkdwn',
            text:
              'Could not find Slack account for some users: ' +
              'carol@example.com (Carol Jones) (<http://localhost/user/3/profile/Slack/|profile>).\n' +
              'Please ensure they have a Slack account. ' +
              "If their Slack email doesn't match the email on file, set a Slack user ID override in their profile, " +
              "or enter an ID of 'ignore' to silence this warning.",
          },
        ],
      });
    });

    it('should leave out mentions when they are disabled', () => {
      const blocks = buildAlertBlocks({
        event: { ...event, mentionRecipients: false },
        recipients: [{ recipient: { identifier: 'carol@example.com' }, slackUserId: null }],
        fileIds: [],
      });

      expect(blocks.map((b) => b.type)).toEqual(['header']);
    });

    it('should reference uploaded files by ID', () => {
      const blocks = buildAlertBlocks({
        event: { ...event, images: [{ fileName: 'cpu.png', data: Buffer.from('x'), title: 'CPU usage' }] },
        recipients: [],
        fileIds: ['F0CPU'],
      });

      expect(blocks[1]).toEqual({ type: 'image', slack_file: { id: 'F0CPU' }, alt_text: 'CPU usage' });
    });
  });

  describe('formatMentionLine', () => {
    it('should keep recipient order', () => {
      expect(
        formatMentionLine([
          { recipient: { identifier: 'bob' }, slackUserId: null },
          { recipient: { identifier: 'alice@example.com' }, slackUserId: 'U0ALICE' },
        ]),
      ).toBe('bob <@U0ALICE> :point_up:');
    });
  });

  describe('formatMissingRecipientsNotice', () => {
    it('should skip the full name when only one part is known', () => {
      const notice = formatMissingRecipientsNotice([{ identifier: 'dan@example.com', firstName: 'Dan' }]);

      expect(notice.startsWith('Could not find Slack account for some users: dan@example.com.\n')).toBe(true);
    });
  });
});
