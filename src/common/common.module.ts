import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { SupabaseService } from './supabase.service';
import { ActivityLogService } from './activity-log.service';
import { ProductLockService } from './product-lock.service';
import { OperatorGuard } from './guards/operator.guard';
import { realSleep, SLEEPER } from './sleeper';

@Module({
  imports: [ConfigModule],
  providers: [
    ActivityLogService,
    ProductLockService,
    OperatorGuard,
    { provide: SLEEPER, useValue: realSleep },
    {
      provide: SupabaseService,
      useFactory: async (configService: ConfigService) => {
        const service = new SupabaseService(configService);
        await service.initialize();
        return service;
      },
      inject: [ConfigService],
    },
  ],
  exports: [SupabaseService, ActivityLogService, ProductLockService, OperatorGuard, SLEEPER],
})
export class CommonModule {}
