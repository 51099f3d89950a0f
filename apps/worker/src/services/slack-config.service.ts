import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { randomUUID } from 'crypto';
import Redis from 'ioredis';
import { z } from 'zod';
import { IGNORE_SLACK_USER_ID } from '@slack-alerts/shared';
import type { ChannelBinding, SlackInstance } from '@slack-alerts/shared';
import { WorkerConfigService } from '../config/config.service';

const INSTANCE_PREFIX = 'slack:instance:';
const BINDING_PREFIX = 'slack:binding:';
const OVERRIDE_PREFIX = 'slack:user-override:';

export const slackInstanceInputSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().trim().min(1, 'name is required'),
  serverUrl: z.string().trim().url('serverUrl must be a URL'),
  accessToken: z.string().trim().min(1, 'accessToken is required'),
  defaultChannel: z.string().trim().min(1).nullish(),
});

export const channelBindingInputSchema = z.object({
  serviceId: z.string().min(1),
  slackInstanceId: z.string().min(1),
  channel: z.string().trim().min(1, 'channel must not be empty').nullish(),
});

export const slackUserIdOverrideSchema = z
  .string()
  .trim()
  .refine(
    (value) => value === IGNORE_SLACK_USER_ID || value.startsWith('U') || value.startsWith('W'),
    { message: `Slack user ID should start with a U or W, or be '${IGNORE_SLACK_USER_ID}'` },
  );

export type SlackInstanceInput = z.input<typeof slackInstanceInputSchema>;
export type ChannelBindingInput = z.input<typeof channelBindingInputSchema>;

/**
 * Store for the Slack configuration records managed by the host's admin surface
 *
 * Layout:
 * - slack:instance:<id>          hash { name, serverUrl, accessToken, defaultChannel? }
 * - slack:binding:<serviceId>    hash { slackInstanceId, channel? }
 * - slack:user-override:<userId> string (Slack user ID or 'ignore')
 */
@Injectable()
export class SlackConfigService implements OnModuleDestroy {
  private readonly logger = new Logger(SlackConfigService.name);
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

  async saveInstance(input: SlackInstanceInput): Promise<SlackInstance> {
    const parsed = slackInstanceInputSchema.parse(input);
    const instance: SlackInstance = {
      id: parsed.id ?? randomUUID(),
      name: parsed.name,
      serverUrl: parsed.serverUrl,
      accessToken: parsed.accessToken,
      defaultChannel: parsed.defaultChannel ?? null,
    };

    const key = `${INSTANCE_PREFIX}${instance.id}`;
    await this.redis
      .multi()
      .del(key)
      .hset(key, {
        name: instance.name,
        serverUrl: instance.serverUrl,
        accessToken: instance.accessToken,
        ...(instance.defaultChannel ? { defaultChannel: instance.defaultChannel } : {}),
      })
      .exec();

    this.logger.log(`Saved Slack instance ${instance.name} (${instance.id})`);
    return instance;
  }

  async getInstance(id: string): Promise<SlackInstance | null> {
    const data = await this.redis.hgetall(`${INSTANCE_PREFIX}${id}`);
    if (!data.serverUrl || !data.accessToken) {
      return null;
    }
    return {
      id,
      name: data.name ?? id,
      serverUrl: data.serverUrl,
      accessToken: data.accessToken,
      defaultChannel: data.defaultChannel || null,
    };
  }

  async deleteInstance(id: string): Promise<boolean> {
    const removed = await this.redis.del(`${INSTANCE_PREFIX}${id}`);
    return removed > 0;
  }

  async saveBinding(input: ChannelBindingInput): Promise<ChannelBinding> {
    const parsed = channelBindingInputSchema.parse(input);
    if (!(await this.redis.exists(`${INSTANCE_PREFIX}${parsed.slackInstanceId}`))) {
      throw new Error(`Slack instance ${parsed.slackInstanceId} does not exist`);
    }

    const binding: ChannelBinding = {
      serviceId: parsed.serviceId,
      slackInstanceId: parsed.slackInstanceId,
      channel: parsed.channel ?? null,
    };

    const key = `${BINDING_PREFIX}${binding.serviceId}`;
    await this.redis
      .multi()
      .del(key)
      .hset(key, {
        slackInstanceId: binding.slackInstanceId,
        ...(binding.channel ? { channel: binding.channel } : {}),
      })
      .exec();

    return binding;
  }

  async getBinding(serviceId: string): Promise<ChannelBinding | null> {
    const data = await this.redis.hgetall(`${BINDING_PREFIX}${serviceId}`);
    if (!data.slackInstanceId) {
      return null;
    }
    return {
      serviceId,
      slackInstanceId: data.slackInstanceId,
      channel: data.channel || null,
    };
  }

  async setUserOverride(userId: string, slackUserId: string): Promise<void> {
    const value = slackUserIdOverrideSchema.parse(slackUserId);
    await this.redis.set(`${OVERRIDE_PREFIX}${userId}`, value);
  }

  async clearUserOverride(userId: string): Promise<void> {
    await this.redis.del(`${OVERRIDE_PREFIX}${userId}`);
  }

  /**
   * Overrides for the given users; users without one are absent from the map
   */
  async getUserOverrides(userIds: string[]): Promise<Map<string, string>> {
    const overrides = new Map<string, string>();
    if (userIds.length === 0) {
      return overrides;
    }

    const values = await this.redis.mget(userIds.map((id) => `${OVERRIDE_PREFIX}${id}`));
    userIds.forEach((userId, index) => {
      const value = values[index];
      if (value) overrides.set(userId, value);
    });
    return overrides;
  }
}
