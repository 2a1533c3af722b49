import { Module } from '@nestjs/common';
import { CatalogModule } from '../catalog/catalog.module';
import { CommonModule } from '../common/common.module';
import { RegistrationModule } from '../registration/registration.module';
import { SyncEngineModule } from '../sync-engine/sync-engine.module';
import { TasksController } from './tasks.controller';
import { TasksService } from './tasks.service';

@Module({
  imports: [CommonModule, CatalogModule, RegistrationModule, SyncEngineModule],
  providers: [TasksService],
  controllers: [TasksController],
})
export class TasksModule {}
