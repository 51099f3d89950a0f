import { Global, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import { WorkerConfigService } from './config.service';
import { validateEnv } from './env.validation';

/**
 * Loads .env files, validates them and exposes WorkerConfigService globally
 */
@Global()
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      envFilePath: ['.env.local', '.env'],
      validate: validateEnv,
    }),
  ],
  providers: [WorkerConfigService],
  exports: [WorkerConfigService],
})
export class ConfigModule {}
