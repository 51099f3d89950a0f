/**
 * Dispatch error taxonomy - human-readable messages and recommendations
 *
 * Maps dispatch error codes to user-friendly messages with actionable suggestions.
 */

import type { DispatchErrorCode } from './domain';

export interface DispatchErrorInfo {
  title: string;
  description: string;
  recommendation: string;
  /** Fatal errors abort the dispatch; non-fatal ones degrade the message */
  fatal: boolean;
}

export const DISPATCH_ERROR_TAXONOMY: Record<DispatchErrorCode, DispatchErrorInfo> = {
  USER_RESOLUTION_FAILURE: {
    title: 'User Not Found',
    description: 'A recipient could not be matched to a Slack account.',
    recommendation: 'Make sure the user has a Slack account, or set a Slack user ID override.',
    fatal: false,
  },
  CHANNEL_JOIN_FAILURE: {
    title: 'Channel Unavailable',
    description: 'The bot could not join or create the alert channel.',
    recommendation: 'Check the channel name and that the bot has the channels:join scope.',
    fatal: true,
  },
  INVITE_FAILURE: {
    title: 'Invite Failed',
    description: 'Recipients could not be invited to the alert channel.',
    recommendation: 'Check that the bot has the channels:manage scope.',
    fatal: true,
  },
  UPLOAD_FAILURE: {
    title: 'Upload Failed',
    description: 'An image attached to the alert could not be uploaded.',
    recommendation: 'Check that the bot has the files:write scope.',
    fatal: true,
  },
  POST_FAILURE: {
    title: 'Post Failed',
    description: 'The alert message could not be posted.',
    recommendation: 'Check that the bot is in the channel and has the chat:write scope.',
    fatal: true,
  },
  CONFIGURATION_ERROR: {
    title: 'Slack Not Configured',
    description: 'No Slack instance or channel is configured for this service.',
    recommendation: 'Bind the service to a Slack instance and set a channel or a default channel.',
    fatal: true,
  },
};

export function isDispatchErrorCode(code: string): code is DispatchErrorCode {
  return Object.prototype.hasOwnProperty.call(DISPATCH_ERROR_TAXONOMY, code);
}

/**
 * Get error info for an error code
 */
export function getDispatchErrorInfo(code: string | null | undefined): DispatchErrorInfo | null {
  if (!code) return null;
  if (isDispatchErrorCode(code)) {
    return DISPATCH_ERROR_TAXONOMY[code];
  }
  return {
    title: 'Unknown Error',
    description: `Error: ${code}`,
    recommendation: 'Please contact support if this persists.',
    fatal: true,
  };
}

/**
 * Get user-friendly error message
 */
export function getDispatchErrorMessage(code: string | null | undefined): string {
  const info = getDispatchErrorInfo(code);
  if (!info) return '';
  return `${info.title}: ${info.description}`;
}

export function isFatalDispatchError(code: DispatchErrorCode): boolean {
  return DISPATCH_ERROR_TAXONOMY[code].fatal;
}
