import { Module, NestModule, MiddlewareConsumer, RequestMethod } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ThrottlerModule, ThrottlerGuard } from '@nestjs/throttler';
import { APP_GUARD } from '@nestjs/core';
import { BullModule } from '@nestjs/bullmq';
import { ScheduleModule } from '@nestjs/schedule';
import { CommonModule } from './common/common.module';
import { RequestLoggerMiddleware } from './common/middleware/request-logger.middleware';
import { validateEnvironment } from './config/env.validation';
import { marketplaceConfig } from './config/marketplace.config';
import { pipelineConfig } from './config/pipeline.config';
import { redisConnectionFromUrl } from './config/redis.connection';
import { CatalogModule } from './catalog/catalog.module';
import { MarketplaceModule } from './marketplace/marketplace.module';
import { PricingModule } from './pricing/pricing.module';
import { RegistrationModule } from './registration/registration.module';
import { SyncEngineModule } from './sync-engine/sync-engine.module';
import { TasksModule } from './tasks/tasks.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate: validateEnvironment,
      load: [marketplaceConfig, pipelineConfig],
    }),
    ScheduleModule.forRoot(),
    ThrottlerModule.forRoot([
      {
        ttl: 60_000, // 1 minute
        limit: 60,
      },
    ]),
    BullModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        connection: redisConnectionFromUrl(configService.getOrThrow<string>('REDIS_URL')),
        defaultJobOptions: {
          removeOnComplete: {
            count: 1000,
            age: 24 * 60 * 60,
          },
          removeOnFail: {
            count: 5000,
            age: 7 * 24 * 60 * 60,
          },
        },
      }),
      inject: [ConfigService],
    }),
    CommonModule,
    CatalogModule,
    MarketplaceModule,
    PricingModule,
    RegistrationModule,
    SyncEngineModule,
    TasksModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer
      .apply(RequestLoggerMiddleware)
      .forRoutes({ path: '*', method: RequestMethod.ALL });
  }
}
