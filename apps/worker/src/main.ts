import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { WorkerModule } from './worker.module';
import { WorkerConfigService } from './config/config.service';
import { QUEUE_NAMES } from './types/jobs';

/**
 * Bootstrap BullMQ worker application
 */
async function bootstrap() {
  const logger = new Logger('WorkerBootstrap');

  try {
    // Create NestJS application context (no HTTP server)
    const app = await NestFactory.createApplicationContext(WorkerModule, {
      logger: ['log', 'error', 'warn', 'debug', 'verbose'],
    });

    const config = app.get(WorkerConfigService);

    logger.log('Slack alert worker started');
    logger.log(`Processing ${QUEUE_NAMES.ALERTS_DISPATCH} (concurrency: ${config.concurrency.alertsDispatch})`);
    logger.log('Press Ctrl+C to stop gracefully');

    const shutdown = (signal: string) => {
      logger.log(`${signal} signal received: closing worker gracefully`);
      app
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Error during shutdown', error instanceof Error ? error.stack : String(error));
          process.exit(1);
        });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.error('Failed to start worker:', error instanceof Error ? error.stack : String(error));
    process.exit(1);
  }
}

void bootstrap();
