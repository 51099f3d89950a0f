import { ErrorCode } from '@slack/web-api';
import type { DispatchErrorCode } from '@slack-alerts/shared';

/**
 * A Slack API call that did not return ok
 */
export class SlackApiError extends Error {
  readonly errorType: string;
  readonly errors?: string[];
  readonly statusCode?: number;

  constructor(errorType: string, options: { errors?: string[]; statusCode?: number; cause?: unknown } = {}) {
    let message = `Slack API returned not ok, error type: ${errorType}`;
    if (options.errors?.length) {
      message += `, errors: ${JSON.stringify(options.errors)}`;
    }
    super(message, { cause: options.cause });
    this.name = 'SlackApiError';
    this.errorType = errorType;
    this.errors = options.errors;
    this.statusCode = options.statusCode;
  }
}

/**
 * A failed dispatch step, reported to the caller as a single error
 */
export class DispatchError extends Error {
  readonly code: DispatchErrorCode;
  /** Slack error type when the failure came from the API */
  readonly slackErrorType?: string;

  constructor(code: DispatchErrorCode, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'DispatchError';
    this.code = code;
    if (cause instanceof SlackApiError) {
      this.slackErrorType = cause.errorType;
    }
  }
}

function stringArray(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === 'string');
}

/**
 * Normalise anything thrown by WebClient into a SlackApiError
 */
export function toSlackApiError(error: unknown): SlackApiError {
  if (error instanceof SlackApiError) {
    return error;
  }

  if (error instanceof Error && 'code' in error) {
    switch (error.code) {
      case ErrorCode.PlatformError: {
        const data = 'data' in error ? error.data : undefined;
        if (typeof data === 'object' && data !== null) {
          const errorType = 'error' in data && typeof data.error === 'string' ? data.error : '<error field missing>';
          const errors = 'errors' in data ? stringArray(data.errors) : undefined;
          return new SlackApiError(errorType, { errors, cause: error });
        }
        return new SlackApiError('<error field missing>', { cause: error });
      }
      case ErrorCode.HTTPError: {
        const statusCode = 'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : undefined;
        return new SlackApiError('http_error', { statusCode, cause: error });
      }
      case ErrorCode.RateLimitedError:
        return new SlackApiError('ratelimited', { statusCode: 429, cause: error });
      case ErrorCode.RequestError:
        return new SlackApiError('request_error', { cause: error });
      default:
        break;
    }
  }

  return new SlackApiError('unknown_error', { cause: error });
}

export function isSlackErrorType(error: unknown, ...errorTypes: string[]): error is SlackApiError {
  return error instanceof SlackApiError && errorTypes.includes(error.errorType);
}
