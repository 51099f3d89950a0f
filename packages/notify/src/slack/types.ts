/**
 * Slack message and dispatch types
 */

import type { AlertRecipient } from '@slack-alerts/shared';
import type { DispatchError } from './errors';

export interface PlainTextObject {
  type: 'plain_text';
  text: string;
  emoji?: boolean;
}

export interface MrkdwnObject {
  type: 'mrkdwn';
  text: string;
}

export interface HeaderBlock {
  type: 'header';
  text: PlainTextObject;
}

export interface ButtonElement {
  type: 'button';
  text: PlainTextObject;
  url: string;
  action_id: string;
}

export interface SectionBlock {
  type: 'section';
  text: MrkdwnObject;
  accessory?: ButtonElement;
}

export interface ContextBlock {
  type: 'context';
  elements: MrkdwnObject[];
}

export interface ImageBlock {
  type: 'image';
  slack_file: { id: string };
  alt_text: string;
  title?: PlainTextObject;
}

export type SlackBlock = HeaderBlock | SectionBlock | ContextBlock | ImageBlock;

export interface SlackUserSummary {
  id: string;
  name: string;
  displayName?: string;
}

/** Outcome of conversations.join */
export type JoinOutcome = 'joined' | 'already_member';

/**
 * The Slack Web API calls the dispatcher depends on
 */
export interface SlackWebApi {
  lookupUserByEmail(email: string): Promise<string>;
  listUsers(): Promise<SlackUserSummary[]>;
  findChannelByName(name: string): Promise<string | null>;
  createChannel(name: string): Promise<string>;
  joinChannel(channelId: string): Promise<JoinOutcome>;
  getChannelMembers(channelId: string): Promise<Set<string>>;
  inviteToChannel(channelId: string, userIds: string[]): Promise<void>;
  /** Uploads a file and returns its Slack file ID */
  uploadFile(fileName: string, data: Buffer, title?: string): Promise<string>;
  /** Posts a message and returns its ts */
  postMessage(channelId: string, text: string, blocks: SlackBlock[]): Promise<string>;
}

export interface ResolvedRecipient {
  recipient: AlertRecipient;
  /** null when the recipient could not be matched to a Slack user */
  slackUserId: string | null;
}

export interface SlackApiOptions {
  /** Request timeout in ms */
  timeoutMs?: number;
  /** Retries per call; 0 disables retrying and rejects rate-limited calls */
  retries?: number;
}

export interface DispatchSuccess {
  ok: true;
  channelId: string;
  messageTs: string;
  /** Slack user IDs that were resolved */
  resolved: string[];
  /** Identifiers that could not be resolved */
  unresolved: string[];
  fileIds: string[];
}

export interface DispatchFailure {
  ok: false;
  error: DispatchError;
}

export type DispatchResult = DispatchSuccess | DispatchFailure;
