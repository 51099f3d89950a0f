/**
 * Slack Web API client for a configured Slack instance
 */

import { LogLevel, WebClient } from '@slack/web-api';
import type { SlackInstance } from '@slack-alerts/shared';
import { SlackApiError, toSlackApiError } from './errors';
import type { JoinOutcome, SlackApiOptions, SlackBlock, SlackUserSummary, SlackWebApi } from './types';

const DEFAULT_TIMEOUT = 30000;
const DEFAULT_RETRIES = 0;
const PAGE_SIZE = 200;

/**
 * Build the Web API base URL for a server URL (https://slack.com -> https://slack.com/api/)
 */
export function buildApiUrl(serverUrl: string): string {
  return new URL('api/', serverUrl).toString();
}

export function createWebClient(instance: SlackInstance, options: SlackApiOptions = {}): WebClient {
  const retries = options.retries ?? DEFAULT_RETRIES;
  return new WebClient(instance.accessToken, {
    slackApiUrl: buildApiUrl(instance.serverUrl),
    timeout: options.timeoutMs ?? DEFAULT_TIMEOUT,
    retryConfig: { retries },
    rejectRateLimitedCalls: retries === 0,
    logLevel: LogLevel.ERROR,
  });
}

export class SlackApi implements SlackWebApi {
  private readonly client: WebClient;

  constructor(instance: SlackInstance, options: SlackApiOptions = {}, client?: WebClient) {
    this.client = client ?? createWebClient(instance, options);
  }

  async lookupUserByEmail(email: string): Promise<string> {
    const response = await this.call(() => this.client.users.lookupByEmail({ email }));
    const id = response.user?.id;
    if (!id) {
      throw new SlackApiError('users_not_found');
    }
    return id;
  }

  async listUsers(): Promise<SlackUserSummary[]> {
    const users: SlackUserSummary[] = [];
    let cursor: string | undefined;

    do {
      const response = await this.call(() => this.client.users.list({ cursor, limit: PAGE_SIZE }));
      for (const member of response.members ?? []) {
        if (!member.id || !member.name || member.deleted) continue;
        users.push({
          id: member.id,
          name: member.name,
          displayName: member.profile?.display_name || undefined,
        });
      }
      cursor = response.response_metadata?.next_cursor || undefined;
    } while (cursor);

    return users;
  }

  async findChannelByName(name: string): Promise<string | null> {
    let cursor: string | undefined;

    do {
      const response = await this.call(() =>
        this.client.conversations.list({
          cursor,
          limit: PAGE_SIZE,
          exclude_archived: true,
          types: 'public_channel,private_channel',
        }),
      );
      const match = (response.channels ?? []).find((channel) => channel.name === name);
      if (match?.id) {
        return match.id;
      }
      cursor = response.response_metadata?.next_cursor || undefined;
    } while (cursor);

    return null;
  }

  async createChannel(name: string): Promise<string> {
    const response = await this.call(() => this.client.conversations.create({ name }));
    const id = response.channel?.id;
    if (!id) {
      throw new SlackApiError('channel_not_created');
    }
    return id;
  }

  async joinChannel(channelId: string): Promise<JoinOutcome> {
    // still ok when the bot is already a member, with a warning
    const response = await this.call(() => this.client.conversations.join({ channel: channelId }));
    const warnings = response.response_metadata?.warnings ?? [];
    if (response.warning === 'already_in_channel' || warnings.includes('already_in_channel')) {
      return 'already_member';
    }
    return 'joined';
  }

  async getChannelMembers(channelId: string): Promise<Set<string>> {
    const members = new Set<string>();
    let cursor: string | undefined;

    do {
      const response = await this.call(() =>
        this.client.conversations.members({ channel: channelId, cursor, limit: PAGE_SIZE }),
      );
      for (const member of response.members ?? []) {
        members.add(member);
      }
      cursor = response.response_metadata?.next_cursor || undefined;
    } while (cursor);

    return members;
  }

  async inviteToChannel(channelId: string, userIds: string[]): Promise<void> {
    await this.call(() => this.client.conversations.invite({ channel: channelId, users: userIds.join(',') }));
  }

  /**
   * Upload through the external upload flow without sharing the file to a channel;
   * the message references it by ID
   */
  async uploadFile(fileName: string, data: Buffer, title?: string): Promise<string> {
    const response = await this.call(() =>
      this.client.filesUploadV2({ file: data, filename: fileName, title: title ?? fileName }),
    );
    const fileId = response.files[0]?.files?.[0]?.id;
    if (!fileId) {
      throw new SlackApiError('file_id_missing');
    }
    return fileId;
  }

  async postMessage(channelId: string, text: string, blocks: SlackBlock[]): Promise<string> {
    const response = await this.call(() =>
      this.client.chat.postMessage({
        channel: channelId,
        // shown in notifications when blocks are present
        text,
        blocks,
      }),
    );
    if (!response.ts) {
      throw new SlackApiError('message_ts_missing');
    }
    return response.ts;
  }

  private async call<T>(request: () => Promise<T>): Promise<T> {
    try {
      return await request();
    } catch (error) {
      throw toSlackApiError(error);
    }
  }
}
