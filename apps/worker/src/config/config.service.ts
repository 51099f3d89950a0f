import { Injectable } from '@nestjs/common';
import { ConfigService as NestConfigService } from '@nestjs/config';
import type { EnvConfig } from './env.validation';

/**
 * Configuration service for worker app
 * Centralizes access to the validated environment
 */
@Injectable()
export class WorkerConfigService {
  constructor(private configService: NestConfigService<EnvConfig, true>) {}

  /**
   * Redis connection configuration
   */
  get redis() {
    return {
      host: this.configService.get('REDIS_HOST', { infer: true }),
      port: this.configService.get('REDIS_PORT', { infer: true }),
      password: this.configService.get('REDIS_PASSWORD', { infer: true }),
      db: this.configService.get('REDIS_DB', { infer: true }),
    };
  }

  /**
   * Worker concurrency settings
   */
  get concurrency() {
    return {
      alertsDispatch: this.configService.get('WORKER_CONCURRENCY_ALERTS', { infer: true }),
    };
  }

  /**
   * Slack Web API client settings
   */
  get slack() {
    return {
      timeoutMs: this.configService.get('SLACK_REQUEST_TIMEOUT_MS', { infer: true }),
      retries: this.configService.get('SLACK_MAX_RETRIES', { infer: true }),
      maxImages: this.configService.get('SLACK_MAX_IMAGES', { infer: true }),
    };
  }

  /**
   * Base URLs for check, profile and Jenkins links
   */
  get links() {
    return {
      publicBaseUrl: this.configService.get('PUBLIC_BASE_URL', { infer: true }),
      jenkinsUrl: this.configService.get('JENKINS_URL', { infer: true }),
    };
  }

  get alertHistoryLimit(): number {
    return this.configService.get('ALERT_HISTORY_LIMIT', { infer: true });
  }

  /**
   * Environment info
   */
  get environment() {
    const nodeEnv = this.configService.get('NODE_ENV', { infer: true });
    return {
      nodeEnv,
      isDevelopment: nodeEnv !== 'production',
      isProduction: nodeEnv === 'production',
    };
  }
}
