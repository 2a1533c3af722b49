import { Inject, Logger, Module, OnModuleInit } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { CommonModule } from '../common/common.module';
import { CatalogModule } from '../catalog/catalog.module';
import { marketplaceConfig } from '../config/marketplace.config';
import { errorMessage } from '../common/errors/pipeline.errors';
import { CallLogService } from './call-log.service';
import { MarketplaceApiClient } from './marketplace-api-client.service';
import { MarketplaceMapper } from './marketplace.mapper';
import { MarketplaceTokenService } from './marketplace-token.service';
import { RateLimiter } from './rate-limiter';

@Module({
  imports: [CommonModule, CatalogModule],
  providers: [
    MarketplaceMapper,
    CallLogService,
    MarketplaceTokenService,
    MarketplaceApiClient,
    {
      provide: RateLimiter,
      useFactory: (config: ConfigType<typeof marketplaceConfig>) =>
        new RateLimiter({
          windows: config.quotaWindows,
          minIntervalMs: config.minCallIntervalMs,
          maxWaitMs: config.maxQuotaWaitMs,
        }),
      inject: [marketplaceConfig.KEY],
    },
  ],
  exports: [MarketplaceMapper, MarketplaceApiClient, CallLogService, RateLimiter],
})
export class MarketplaceModule implements OnModuleInit {
  private readonly logger = new Logger(MarketplaceModule.name);

  constructor(
    @Inject(marketplaceConfig.KEY)
    private readonly config: ConfigType<typeof marketplaceConfig>,
    private readonly rateLimiter: RateLimiter,
    private readonly callLog: CallLogService,
  ) {}

  // Quota usage lives in ApiCallLogs, so a restart picks up where it left off.
  async onModuleInit(): Promise<void> {
    const longestWindowMs = Math.max(0, ...this.config.quotaWindows.map(w => w.windowMs));
    try {
      const times = await this.callLog.recentCallTimes(longestWindowMs);
      this.rateLimiter.seed(times);
    } catch (error) {
      this.logger.error(`Could not seed rate limiter from call history; starting with empty windows: ${errorMessage(error)}`);
    }
  }
}
