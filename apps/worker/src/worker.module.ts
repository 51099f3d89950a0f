import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { ConfigModule } from './config/config.module';
import { WorkerConfigService } from './config/config.service';
import { QueueService } from './services/queue.service';
import { SlackConfigService } from './services/slack-config.service';
import { AlertHistoryService } from './services/alert-history.service';
import { SlackAlertPlugin } from './plugins/slack-alert.plugin';
import { AlertPluginRegistry } from './plugins/alert-plugin.registry';
import { AlertProcessor } from './processors/alert.processor';
import { QUEUE_NAMES } from './types/jobs';

/**
 * Main worker module
 * Configures the alerts-dispatch queue and its processor
 */
@Module({
  imports: [
    ConfigModule,

    // BullMQ root configuration with Redis connection
    BullModule.forRootAsync({
      imports: [ConfigModule],
      inject: [WorkerConfigService],
      useFactory: (config: WorkerConfigService) => ({
        connection: {
          host: config.redis.host,
          port: config.redis.port,
          password: config.redis.password,
          db: config.redis.db,
          maxRetriesPerRequest: null, // Required for BullMQ
        },
      }),
    }),

    // Register alerts-dispatch queue; a failed dispatch is not retried
    BullModule.registerQueue({
      name: QUEUE_NAMES.ALERTS_DISPATCH,
      defaultJobOptions: {
        attempts: 1,
        removeOnComplete: {
          age: 86400, // 24 hours
          count: 1000,
        },
        removeOnFail: {
          age: 604800, // 7 days
        },
      },
    }),
  ],
  providers: [
    QueueService,
    SlackConfigService,
    AlertHistoryService,
    SlackAlertPlugin,
    AlertPluginRegistry,
    AlertProcessor,
  ],
  exports: [QueueService, SlackConfigService, AlertHistoryService, AlertPluginRegistry],
})
export class WorkerModule {}
