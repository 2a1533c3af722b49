import { ApiCallLog } from './entities/api-call-log.entity';
import { CompetitorPriceObservation } from './entities/competitor-price-observation.entity';
import { ListingProductImage } from './entities/listing-product-image.entity';
import { ListingProductOption } from './entities/listing-product-option.entity';
import { ListingProductVariant, StockState } from './entities/listing-product-variant.entity';
import { ListingProduct, ListingProductPatch, PublishStatus } from './entities/listing-product.entity';

export const CATALOG_STORE = Symbol('CATALOG_STORE');

export interface ProductBundle {
    product: ListingProduct;
    options: ListingProductOption[];
    variants: ListingProductVariant[];
    images: ListingProductImage[]; // uploaded only, ordered by Position
    shippingMethodIds: number[];
}

export type PublishStatusCounts = Record<PublishStatus, number>;

/**
 * Everything the pipeline reads from or writes back to the catalog.
 * `CatalogService` implements it on Supabase; tests use the in-memory store.
 */
export interface CatalogStore {
    findRegistrationCandidates(limit: number, afterId?: number): Promise<ListingProduct[]>;
    findByReference(referenceNumber: string): Promise<ListingProduct | null>;
    loadBundle(product: ListingProduct): Promise<ProductBundle>;
    /** Published with a remote id, whatever the local control; takedowns go out from here too. */
    findPublishedForReconciliation(limit: number): Promise<ListingProduct[]>;
    /** Submitted before `submittedBefore` and still waiting for the marketplace webhook. */
    findStalePending(submittedBefore: Date, limit: number): Promise<ListingProduct[]>;

    /** Returns null when `expectedVersion` no longer matches the stored row. */
    updateProduct(
        referenceNumber: string,
        patch: ListingProductPatch,
        expectedVersion: number,
    ): Promise<ListingProduct | null>;
    /** Unconditional write used after optimistic retries run out. */
    forceUpdateProduct(referenceNumber: string, patch: ListingProductPatch): Promise<ListingProduct | null>;
    updateVariantStock(variantId: number, stockState: StockState, quantity: number): Promise<void>;

    resolveBrandId(product: ListingProduct): Promise<number | null>;
    resolveCategoryId(product: ListingProduct): Promise<number | null>;
    latestPriceObservation(modelNo: string): Promise<CompetitorPriceObservation | null>;
    countByPublishStatus(): Promise<PublishStatusCounts>;

    appendCallLog(entry: ApiCallLog): Promise<void>;
    findAcceptedCreate(referenceNumber: string): Promise<ApiCallLog | null>;
    /** CreatedAt of every call that reached the marketplace since `since`, oldest first. */
    findCallTimesSince(since: Date): Promise<Date[]>;
}
