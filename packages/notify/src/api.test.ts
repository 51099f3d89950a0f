/**
 * Unit tests for the Slack Web API client
 */

import { ErrorCode, WebClient } from '@slack/web-api';
import { SlackApi, buildApiUrl } from './slack/api';
import { SlackApiError, toSlackApiError } from './slack/errors';
import type { SlackInstance } from '@slack-alerts/shared';

const mockClient = {
  users: { lookupByEmail: jest.fn(), list: jest.fn() },
  conversations: {
    list: jest.fn(),
    create: jest.fn(),
    join: jest.fn(),
    members: jest.fn(),
    invite: jest.fn(),
  },
  filesUploadV2: jest.fn(),
  chat: { postMessage: jest.fn() },
};

// Mock the WebClient, keep the real error codes
jest.mock('@slack/web-api', () => ({
  ...jest.requireActual('@slack/web-api'),
  WebClient: jest.fn().mockImplementation(() => mockClient),
}));

function platformError(error: string, errors?: string[]): Error {
  return Object.assign(new Error(`An API error occurred: ${error}`), {
    code: ErrorCode.PlatformError,
    data: { ok: false, error, errors },
  });
}

describe('SlackApi', () => {
  const instance: SlackInstance = {
    id: 'inst-1',
    name: 'Test Slack',
    serverUrl: 'https://slack.example.com',
    accessToken: 'test-token',
  };

  let api: SlackApi;

  beforeEach(() => {
    jest.clearAllMocks();
    api = new SlackApi(instance, { timeoutMs: 5000 });
  });

  describe('buildApiUrl', () => {
    it('should append api/ to the server URL', () => {
      expect(buildApiUrl('https://slack.com')).toBe('https://slack.com/api/');
      expect(buildApiUrl('https://slack.example.com/')).toBe('https://slack.example.com/api/');
    });
  });

  it('should create a WebClient for the instance without retries', () => {
    expect(WebClient).toHaveBeenCalledWith(
      'test-token',
      expect.objectContaining({
        slackApiUrl: 'https://slack.example.com/api/',
        timeout: 5000,
        retryConfig: { retries: 0 },
        rejectRateLimitedCalls: true,
      }),
    );
  });

  describe('lookupUserByEmail', () => {
    it('should return the user ID', async () => {
      mockClient.users.lookupByEmail.mockResolvedValue({ ok: true, user: { id: 'U0ALICE' } });

      await expect(api.lookupUserByEmail('alice@example.com')).resolves.toBe('U0ALICE');
      expect(mockClient.users.lookupByEmail).toHaveBeenCalledWith({ email: 'alice@example.com' });
    });

    it('should turn platform errors into SlackApiError', async () => {
      mockClient.users.lookupByEmail.mockRejectedValue(platformError('users_not_found'));

      const error = await api.lookupUserByEmail('nobody@example.com').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SlackApiError);
      expect(error).toMatchObject({ errorType: 'users_not_found' });
    });
  });

  describe('listUsers', () => {
    it('should page through the directory and skip deleted users', async () => {
      mockClient.users.list
        .mockResolvedValueOnce({
          ok: true,
          members: [
            { id: 'U0BOB', name: 'bob', profile: { display_name: 'Bobby' } },
            { id: 'U0OLD', name: 'old', deleted: true },
          ],
          response_metadata: { next_cursor: 'cursor-2' },
        })
        .mockResolvedValueOnce({
          ok: true,
          members: [{ id: 'U0ERIN', name: 'erin', profile: { display_name: '' } }],
          response_metadata: { next_cursor: '' },
        });

      const users = await api.listUsers();

      expect(users).toEqual([
        { id: 'U0BOB', name: 'bob', displayName: 'Bobby' },
        { id: 'U0ERIN', name: 'erin', displayName: undefined },
      ]);
      expect(mockClient.users.list).toHaveBeenLastCalledWith({ cursor: 'cursor-2', limit: 200 });
    });
  });

  describe('channels', () => {
    it('should find a channel by name', async () => {
      mockClient.conversations.list.mockResolvedValue({
        ok: true,
        channels: [
          { id: 'C0GENERAL', name: 'general' },
          { id: 'C0OPS0001', name: 'ops-alerts' },
        ],
      });

      await expect(api.findChannelByName('ops-alerts')).resolves.toBe('C0OPS0001');
      await expect(api.findChannelByName('missing')).resolves.toBeNull();
    });

    it('should report already_member when the join warns', async () => {
      mockClient.conversations.join.mockResolvedValue({
        ok: true,
        channel: { id: 'C0OPS0001' },
        warning: 'already_in_channel',
        response_metadata: { warnings: ['already_in_channel'] },
      });

      await expect(api.joinChannel('C0OPS0001')).resolves.toBe('already_member');
    });

    it('should report joined otherwise', async () => {
      mockClient.conversations.join.mockResolvedValue({ ok: true, channel: { id: 'C0OPS0001' } });

      await expect(api.joinChannel('C0OPS0001')).resolves.toBe('joined');
    });

    it('should collect members across pages', async () => {
      mockClient.conversations.members
        .mockResolvedValueOnce({ ok: true, members: ['U1', 'U2'], response_metadata: { next_cursor: 'next' } })
        .mockResolvedValueOnce({ ok: true, members: ['U3'], response_metadata: { next_cursor: '' } });

      const members = await api.getChannelMembers('C0OPS0001');

      expect([...members]).toEqual(['U1', 'U2', 'U3']);
      expect(mockClient.conversations.members).toHaveBeenCalledTimes(2);
    });

    it('should invite users as a comma separated list', async () => {
      mockClient.conversations.invite.mockResolvedValue({ ok: true });

      await api.inviteToChannel('C0OPS0001', ['U1', 'U2']);

      expect(mockClient.conversations.invite).toHaveBeenCalledWith({ channel: 'C0OPS0001', users: 'U1,U2' });
    });
  });

  describe('uploadFile', () => {
    it('should upload through the client and return the file ID', async () => {
      mockClient.filesUploadV2.mockResolvedValue({
        ok: true,
        files: [{ ok: true, files: [{ id: 'F0FILE1' }] }],
      });
      const data = Buffer.from('png-bytes');

      await expect(api.uploadFile('latency.png', data, 'Latency')).resolves.toBe('F0FILE1');

      expect(mockClient.filesUploadV2).toHaveBeenCalledWith({ file: data, filename: 'latency.png', title: 'Latency' });
    });

    it('should title the file with its name by default', async () => {
      mockClient.filesUploadV2.mockResolvedValue({ ok: true, files: [{ ok: true, files: [{ id: 'F0FILE2' }] }] });

      await api.uploadFile('latency.png', Buffer.from('x'));

      expect(mockClient.filesUploadV2).toHaveBeenCalledWith(expect.objectContaining({ title: 'latency.png' }));
    });

    it('should normalise upload errors', async () => {
      mockClient.filesUploadV2.mockRejectedValue(platformError('not_allowed_token_type'));

      const error = await api.uploadFile('latency.png', Buffer.from('x')).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SlackApiError);
      expect(error).toMatchObject({ errorType: 'not_allowed_token_type' });
    });

    it('should fail when no file ID comes back', async () => {
      mockClient.filesUploadV2.mockResolvedValue({ ok: true, files: [] });

      const error = await api.uploadFile('latency.png', Buffer.from('x')).catch((e: unknown) => e);

      expect(error).toMatchObject({ errorType: 'file_id_missing' });
    });
  });

  describe('postMessage', () => {
    it('should post text and blocks and return the ts', async () => {
      mockClient.chat.postMessage.mockResolvedValue({ ok: true, ts: '1700000000.000100' });
      const blocks = [{ type: 'header' as const, text: { type: 'plain_text' as const, text: 'hi' } }];

      await expect(api.postMessage('C0OPS0001', 'Checkout is ERROR', blocks)).resolves.toBe('1700000000.000100');
      expect(mockClient.chat.postMessage).toHaveBeenCalledWith({
        channel: 'C0OPS0001',
        text: 'Checkout is ERROR',
        blocks,
      });
    });
  });
});

describe('toSlackApiError', () => {
  it('should keep the error type and detail list of platform errors', () => {
    const error = toSlackApiError(platformError('invalid_blocks', ['must be a valid block']));

    expect(error.errorType).toBe('invalid_blocks');
    expect(error.errors).toEqual(['must be a valid block']);
    expect(error.message).toBe(
      'Slack API returned not ok, error type: invalid_blocks, errors: ["must be a valid block"]',
    );
  });

  it('should keep the status code of HTTP errors', () => {
    const httpError = Object.assign(new Error('An HTTP protocol error occurred: statusCode = 503'), {
      code: ErrorCode.HTTPError,
      statusCode: 503,
    });

    expect(toSlackApiError(httpError)).toMatchObject({ errorType: 'http_error', statusCode: 503 });
  });

  it('should map rate limiting and request errors', () => {
    const rateLimited = Object.assign(new Error('rate limited'), { code: ErrorCode.RateLimitedError });
    const requestError = Object.assign(new Error('socket hang up'), { code: ErrorCode.RequestError });

    expect(toSlackApiError(rateLimited).errorType).toBe('ratelimited');
    expect(toSlackApiError(requestError).errorType).toBe('request_error');
  });

  it('should wrap anything else as unknown_error', () => {
    expect(toSlackApiError('boom').errorType).toBe('unknown_error');
  });
});
