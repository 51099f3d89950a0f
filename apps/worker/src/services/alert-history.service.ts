import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import Redis from 'ioredis';
import { z } from 'zod';
import { DISPATCH_ERROR_CODES } from '@slack-alerts/shared';
import type { AlertHistoryEntry } from '@slack-alerts/shared';
import { WorkerConfigService } from '../config/config.service';

const HISTORY_PREFIX = 'alert-history:';

const historyEntrySchema = z.object({
  alertId: z.string(),
  serviceId: z.string(),
  plugin: z.string(),
  success: z.boolean(),
  skipped: z.boolean().optional(),
  error: z.string().optional(),
  errorCode: z.enum(DISPATCH_ERROR_CODES).optional(),
  messageTs: z.string().optional(),
  recordedAt: z.string(),
});

/**
 * Alert history per service, newest first, capped at ALERT_HISTORY_LIMIT entries
 */
@Injectable()
export class AlertHistoryService implements OnModuleDestroy {
  private readonly logger = new Logger(AlertHistoryService.name);
  private readonly redis: Redis;

  constructor(private configService: WorkerConfigService) {
    const redisConfig = this.configService.redis;
    this.redis = new Redis({
      host: redisConfig.host,
      port: redisConfig.port,
      password: redisConfig.password,
      db: redisConfig.db,
      maxRetriesPerRequest: null,
    });

    this.redis.on('error', (error: Error) => {
      this.logger.error(`Redis connection error: ${error.message}`, error.stack);
    });
  }

  async onModuleDestroy() {
    await this.redis.quit();
  }

  async record(entry: Omit<AlertHistoryEntry, 'recordedAt'>): Promise<AlertHistoryEntry> {
    const stored: AlertHistoryEntry = { ...entry, recordedAt: new Date().toISOString() };
    const key = `${HISTORY_PREFIX}${entry.serviceId}`;
    const limit = this.configService.alertHistoryLimit;

    await this.redis
      .multi()
      .lpush(key, JSON.stringify(stored))
      .ltrim(key, 0, limit - 1)
      .exec();

    return stored;
  }

  async recent(serviceId: string, count = 20): Promise<AlertHistoryEntry[]> {
    const raw = await this.redis.lrange(`${HISTORY_PREFIX}${serviceId}`, 0, count - 1);
    const entries: AlertHistoryEntry[] = [];

    for (const item of raw) {
      try {
        const parsed = historyEntrySchema.safeParse(JSON.parse(item));
        if (parsed.success) {
          entries.push(parsed.data);
        } else {
          this.logger.warn(`Skipping malformed history entry for service ${serviceId}`);
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Skipping unreadable history entry for service ${serviceId}: ${message}`);
      }
    }

    return entries;
  }
}
