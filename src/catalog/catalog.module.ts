import { Module } from '@nestjs/common';
import { CommonModule } from '../common/common.module'; // Needs SupabaseService
import { CatalogService } from './catalog.service';
import { CATALOG_STORE } from './catalog.types';
import { ProductStateWriter } from './product-state.writer';

@Module({
  imports: [CommonModule],
  providers: [
      CatalogService,
      { provide: CATALOG_STORE, useExisting: CatalogService },
      ProductStateWriter,
    ],
  exports: [CatalogService, CATALOG_STORE, ProductStateWriter],
})
export class CatalogModule {}
