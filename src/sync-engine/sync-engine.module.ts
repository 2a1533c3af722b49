import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { CommonModule } from '../common/common.module';
import { CatalogModule } from '../catalog/catalog.module';
import { MarketplaceModule } from '../marketplace/marketplace.module';
import { PricingModule } from '../pricing/pricing.module';
import { WebhookController } from './webhook.controller';
import { WebhookReceiverService } from './webhook-receiver.service';
import { ReconciliationService } from './reconciliation.service';
import { ReconciliationQueueService } from './reconciliation-queue.service';
import { ReconciliationProcessor } from './processors/reconciliation.processor';
import { RECONCILIATION_QUEUE } from './sync-engine.constants';

@Module({
  imports: [
    CommonModule,
    CatalogModule,
    MarketplaceModule,
    PricingModule,
    BullModule.registerQueue({ name: RECONCILIATION_QUEUE }),
  ],
  controllers: [WebhookController],
  providers: [
    WebhookReceiverService,
    ReconciliationService,
    ReconciliationQueueService,
    ReconciliationProcessor,
  ],
  exports: [ReconciliationService, ReconciliationQueueService],
})
export class SyncEngineModule {}
