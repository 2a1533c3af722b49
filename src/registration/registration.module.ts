import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { CommonModule } from '../common/common.module';
import { CatalogModule } from '../catalog/catalog.module';
import { MarketplaceModule } from '../marketplace/marketplace.module';
import { PricingModule } from '../pricing/pricing.module';
import { EligibilityChecker } from './eligibility.checker';
import { RegistrationController } from './registration.controller';
import { RegistrationOrchestrator } from './registration-orchestrator.service';
import { RegistrationProcessor } from './registration.processor';
import { RegistrationQueueService } from './registration-queue.service';
import { REGISTRATION_QUEUE } from './registration.constants';

@Module({
  imports: [
    CommonModule,
    CatalogModule,
    MarketplaceModule,
    PricingModule,
    BullModule.registerQueue({ name: REGISTRATION_QUEUE }),
  ],
  controllers: [RegistrationController],
  providers: [
    EligibilityChecker,
    RegistrationOrchestrator,
    RegistrationProcessor,
    RegistrationQueueService,
  ],
  exports: [RegistrationOrchestrator, RegistrationQueueService],
})
export class RegistrationModule {}
