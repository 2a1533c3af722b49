import { Injectable, Logger, InternalServerErrorException } from '@nestjs/common';
import { SupabaseClient } from '@supabase/supabase-js';
import { SupabaseService } from '../common/supabase.service';
import { ApiCallLog } from './entities/api-call-log.entity';
import { CompetitorPriceObservation } from './entities/competitor-price-observation.entity';
import { BrandMapping, CategoryMapping, ListingShippingMethod } from './entities/catalog-mapping.entity';
import { ListingProductImage } from './entities/listing-product-image.entity';
import { ListingProductOption } from './entities/listing-product-option.entity';
import { ListingProductVariant, StockState } from './entities/listing-product-variant.entity';
import {
    ListingProduct,
    ListingProductPatch,
    PublishStatus,
} from './entities/listing-product.entity';
import { CatalogStore, ProductBundle, PublishStatusCounts } from './catalog.types';

const PUBLISH_STATUSES: PublishStatus[] = ['unregistered', 'pending_confirmation', 'published', 'failed'];
const CALL_LOG_PAGE_SIZE = 1000; // PostgREST max-rows default

@Injectable()
export class CatalogService implements CatalogStore {
    private readonly logger = new Logger(CatalogService.name);

    constructor(private supabaseService: SupabaseService) {}

    private getSupabaseClient(): SupabaseClient {
        return this.supabaseService.getClient();
    }

    async findRegistrationCandidates(limit: number, afterId = 0): Promise<ListingProduct[]> {
        const supabase = this.getSupabaseClient();
        const { data, error } = await supabase
            .from('ListingProducts')
            .select('*')
            .eq('Control', 'publish')
            .eq('PublishStatus', 'unregistered')
            .gt('Id', afterId)
            .order('Id', { ascending: true })
            .limit(limit);

        if (error) {
            this.logger.error(`Error fetching registration candidates after ${afterId}: ${error.message}`);
            throw new InternalServerErrorException(`Could not fetch registration candidates: ${error.message}`);
        }
        const rows: ListingProduct[] = data || [];
        return rows;
    }

    async findByReference(referenceNumber: string): Promise<ListingProduct | null> {
        const supabase = this.getSupabaseClient();
        const { data, error } = await supabase
            .from('ListingProducts')
            .select('*')
            .eq('ReferenceNumber', referenceNumber)
            .maybeSingle();

        if (error) {
            this.logger.error(`Error fetching product ${referenceNumber}: ${error.message}`);
            throw new InternalServerErrorException(`Could not fetch product: ${error.message}`);
        }
        const row: ListingProduct | null = data;
        return row;
    }

    /**
     * Loads everything the payload builder needs for one product. Images the
     * upload pipeline has not resolved yet (null Url) are left out.
     */
    async loadBundle(product: ListingProduct): Promise<ProductBundle> {
        const supabase = this.getSupabaseClient();
        const [optionsRes, variantsRes, imagesRes, shippingRes] = await Promise.all([
            supabase
                .from('ListingProductOptions')
                .select('*')
                .eq('ProductId', product.Id)
                .order('Position', { ascending: true }),
            supabase
                .from('ListingProductVariants')
                .select('*')
                .eq('ProductId', product.Id)
                .order('Id', { ascending: true }),
            supabase
                .from('ListingProductImages')
                .select('*')
                .eq('ProductId', product.Id)
                .not('Url', 'is', null)
                .order('Position', { ascending: true }),
            supabase
                .from('ListingShippingMethods')
                .select('*')
                .eq('ProductId', product.Id)
                .order('Id', { ascending: true }),
        ]);

        const failed = [optionsRes, variantsRes, imagesRes, shippingRes].find(res => res.error);
        if (failed?.error) {
            this.logger.error(`Error loading bundle for ${product.ReferenceNumber}: ${failed.error.message}`);
            throw new InternalServerErrorException(`Could not load product bundle: ${failed.error.message}`);
        }

        const options: ListingProductOption[] = optionsRes.data || [];
        const variants: ListingProductVariant[] = variantsRes.data || [];
        const images: ListingProductImage[] = imagesRes.data || [];
        const shipping: ListingShippingMethod[] = shippingRes.data || [];

        return {
            product,
            options,
            variants,
            images,
            shippingMethodIds: shipping.map(row => row.ShippingMethodId),
        };
    }

    async findPublishedForReconciliation(limit: number): Promise<ListingProduct[]> {
        const supabase = this.getSupabaseClient();
        const { data, error } = await supabase
            .from('ListingProducts')
            .select('*')
            .eq('PublishStatus', 'published')
            .not('RemoteId', 'is', null)
            .order('StockSyncedAt', { ascending: true, nullsFirst: true })
            .limit(limit);

        if (error) {
            this.logger.error(`Error fetching published products for reconciliation: ${error.message}`);
            throw new InternalServerErrorException(`Could not fetch published products: ${error.message}`);
        }
        const rows: ListingProduct[] = data || [];
        return rows;
    }

    async findStalePending(submittedBefore: Date, limit: number): Promise<ListingProduct[]> {
        const supabase = this.getSupabaseClient();
        const { data, error } = await supabase
            .from('ListingProducts')
            .select('*')
            .eq('PublishStatus', 'pending_confirmation')
            .lt('RegisteredAt', submittedBefore.toISOString())
            .order('RegisteredAt', { ascending: true })
            .limit(limit);

        if (error) {
            this.logger.error(`Error fetching stale pending products: ${error.message}`);
            throw new InternalServerErrorException(`Could not fetch pending products: ${error.message}`);
        }
        const rows: ListingProduct[] = data || [];
        return rows;
    }

    async updateProduct(
        referenceNumber: string,
        patch: ListingProductPatch,
        expectedVersion: number,
    ): Promise<ListingProduct | null> {
        const supabase = this.getSupabaseClient();
        const { data, error } = await supabase
            .from('ListingProducts')
            .update({ ...patch, Version: expectedVersion + 1, UpdatedAt: new Date().toISOString() })
            .eq('ReferenceNumber', referenceNumber)
            .eq('Version', expectedVersion)
            .select()
            .maybeSingle();

        if (error) {
            this.logger.error(`Failed to update product ${referenceNumber}: ${error.message}`);
            throw new InternalServerErrorException(`Could not update product: ${error.message}`);
        }
        if (!data) {
            this.logger.debug(`Version ${expectedVersion} of ${referenceNumber} is stale; update not applied.`);
        }
        const row: ListingProduct | null = data;
        return row;
    }

    async forceUpdateProduct(referenceNumber: string, patch: ListingProductPatch): Promise<ListingProduct | null> {
        const current = await this.findByReference(referenceNumber);
        if (!current) {
            return null;
        }
        const supabase = this.getSupabaseClient();
        const { data, error } = await supabase
            .from('ListingProducts')
            .update({ ...patch, Version: current.Version + 1, UpdatedAt: new Date().toISOString() })
            .eq('ReferenceNumber', referenceNumber)
            .select()
            .maybeSingle();

        if (error) {
            this.logger.error(`Failed to force-update product ${referenceNumber}: ${error.message}`);
            throw new InternalServerErrorException(`Could not update product: ${error.message}`);
        }
        const row: ListingProduct | null = data;
        return row;
    }

    async updateVariantStock(variantId: number, stockState: StockState, quantity: number): Promise<void> {
        const supabase = this.getSupabaseClient();
        const { error } = await supabase
            .from('ListingProductVariants')
            .update({ StockState: stockState, Quantity: quantity, UpdatedAt: new Date().toISOString() })
            .eq('Id', variantId);

        if (error) {
            this.logger.error(`Failed to update stock of variant ${variantId}: ${error.message}`);
            throw new InternalServerErrorException(`Could not update variant stock: ${error.message}`);
        }
    }

    async resolveBrandId(product: ListingProduct): Promise<number | null> {
        if (product.BrandId && product.BrandId > 0) {
            return product.BrandId;
        }
        if (!product.SourceBrand) {
            return null;
        }
        const supabase = this.getSupabaseClient();
        const { data, error } = await supabase
            .from('BrandMappings')
            .select('*')
            .ilike('SourceBrand', product.SourceBrand.trim())
            .limit(1)
            .maybeSingle();

        if (error) {
            this.logger.error(`Error resolving brand '${product.SourceBrand}': ${error.message}`);
            throw new InternalServerErrorException(`Could not resolve brand: ${error.message}`);
        }
        const mapping: BrandMapping | null = data;
        return mapping ? mapping.MarketplaceBrandId : null;
    }

    async resolveCategoryId(product: ListingProduct): Promise<number | null> {
        if (product.CategoryId && product.CategoryId > 0) {
            return product.CategoryId;
        }
        if (!product.SourceCategory) {
            return null;
        }
        const supabase = this.getSupabaseClient();
        const { data, error } = await supabase
            .from('CategoryMappings')
            .select('*')
            .eq('SourceCategory', product.SourceCategory)
            .limit(1)
            .maybeSingle();

        if (error) {
            this.logger.error(`Error resolving category '${product.SourceCategory}': ${error.message}`);
            throw new InternalServerErrorException(`Could not resolve category: ${error.message}`);
        }
        const mapping: CategoryMapping | null = data;
        return mapping ? mapping.MarketplaceCategoryId : null;
    }

    async latestPriceObservation(modelNo: string): Promise<CompetitorPriceObservation | null> {
        const supabase = this.getSupabaseClient();
        const { data, error } = await supabase
            .from('CompetitorPriceObservations')
            .select('*')
            .eq('ModelNo', modelNo)
            .order('ObservedAt', { ascending: false })
            .limit(1)
            .maybeSingle();

        if (error) {
            this.logger.error(`Error fetching price observation for model ${modelNo}: ${error.message}`);
            throw new InternalServerErrorException(`Could not fetch price observation: ${error.message}`);
        }
        const observation: CompetitorPriceObservation | null = data;
        return observation;
    }

    async countByPublishStatus(): Promise<PublishStatusCounts> {
        const supabase = this.getSupabaseClient();
        const counts: PublishStatusCounts = { unregistered: 0, pending_confirmation: 0, published: 0, failed: 0 };

        for (const status of PUBLISH_STATUSES) {
            const { count, error } = await supabase
                .from('ListingProducts')
                .select('Id', { count: 'exact', head: true })
                .eq('PublishStatus', status);

            if (error) {
                this.logger.error(`Error counting ${status} products: ${error.message}`);
                throw new InternalServerErrorException(`Could not count products: ${error.message}`);
            }
            counts[status] = count ?? 0;
        }
        return counts;
    }

    async appendCallLog(entry: ApiCallLog): Promise<void> {
        const supabase = this.getSupabaseClient();
        const { error } = await supabase.from('ApiCallLogs').insert({
            ...entry,
            CreatedAt: entry.CreatedAt || new Date().toISOString(),
        });

        if (error) {
            this.logger.error(`Failed to append call log for ${entry.ReferenceNumber}: ${error.message}`);
            throw new InternalServerErrorException(`Could not append call log: ${error.message}`);
        }
    }

    async findAcceptedCreate(referenceNumber: string): Promise<ApiCallLog | null> {
        const supabase = this.getSupabaseClient();
        const { data, error } = await supabase
            .from('ApiCallLogs')
            .select('*')
            .eq('ReferenceNumber', referenceNumber)
            .eq('Action', 'create')
            .eq('IsSuccess', true)
            .order('CreatedAt', { ascending: false })
            .limit(1)
            .maybeSingle();

        if (error) {
            this.logger.error(`Error checking call log for ${referenceNumber}: ${error.message}`);
            throw new InternalServerErrorException(`Could not read call log: ${error.message}`);
        }
        const row: ApiCallLog | null = data;
        return row;
    }

    async findCallTimesSince(since: Date): Promise<Date[]> {
        const supabase = this.getSupabaseClient();
        const times: Date[] = [];

        for (let from = 0; ; from += CALL_LOG_PAGE_SIZE) {
            const { data, error } = await supabase
                .from('ApiCallLogs')
                .select('*')
                .gte('CreatedAt', since.toISOString())
                .order('CreatedAt', { ascending: true })
                .range(from, from + CALL_LOG_PAGE_SIZE - 1);

            if (error) {
                this.logger.error(`Error reading call history since ${since.toISOString()}: ${error.message}`);
                throw new InternalServerErrorException(`Could not read call history: ${error.message}`);
            }
            const rows: ApiCallLog[] = data || [];
            for (const row of rows) {
                // Local limiter refusals never reached the marketplace.
                if (row.HttpStatus === null && row.Outcome === 'quota_exhausted') continue;
                if (row.CreatedAt) times.push(new Date(row.CreatedAt));
            }
            if (rows.length < CALL_LOG_PAGE_SIZE) {
                return times;
            }
        }
    }
}
