type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerOptions {
  prefix?: string;
  enabled?: boolean;
}

class NotifyLogger {
  private prefix: string;
  private enabled: boolean;

  constructor(options: LoggerOptions = {}) {
    this.prefix = options.prefix || '[Notify]';
    this.enabled = options.enabled ?? process.env.NODE_ENV !== 'test';
  }

  private formatMessage(level: LogLevel, message: string): string {
    const timestamp = new Date().toISOString();
    return `${timestamp} ${this.prefix} [${level.toUpperCase()}] ${message}`;
  }

  debug(message: string): void {
    if (this.enabled && process.env.LOG_LEVEL === 'debug') {
      console.debug(this.formatMessage('debug', message));
    }
  }

  info(message: string): void {
    if (this.enabled) {
      console.info(this.formatMessage('info', message));
    }
  }

  warn(message: string): void {
    if (this.enabled) {
      console.warn(this.formatMessage('warn', message));
    }
  }

  error(message: string, error?: unknown): void {
    if (this.enabled) {
      const stack = error instanceof Error ? error.stack || error.message : '';
      console.error(this.formatMessage('error', message), stack);
    }
  }
}

export type DispatchLogger = Pick<NotifyLogger, 'debug' | 'info' | 'warn' | 'error'>;

export function createLogger(prefix: string): NotifyLogger {
  return new NotifyLogger({ prefix });
}

export const logger = createLogger('[SlackDispatch]');

export { NotifyLogger };
