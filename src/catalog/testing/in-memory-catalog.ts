import { ApiCallLog } from '../entities/api-call-log.entity';
import { CompetitorPriceObservation } from '../entities/competitor-price-observation.entity';
import { ListingProductImage } from '../entities/listing-product-image.entity';
import { ListingProductOption } from '../entities/listing-product-option.entity';
import { ListingProductVariant, StockState } from '../entities/listing-product-variant.entity';
import { ListingProduct, ListingProductPatch, PublishStatus } from '../entities/listing-product.entity';
import { CatalogStore, ProductBundle, PublishStatusCounts } from '../catalog.types';

const FIXED_TS = '2026-01-01T00:00:00.000Z';

export function buildProduct(overrides: Partial<ListingProduct> = {}): ListingProduct {
    return {
        Id: 1,
        ReferenceNumber: 'REF-1',
        RemoteId: null,
        Control: 'publish',
        PublishStatus: 'unregistered',
        Name: 'Canvas Tote Bag',
        Description: 'Sturdy canvas tote.',
        BrandId: 1001,
        BrandName: 'Acme',
        SourceBrand: 'ACME',
        CategoryId: 3001,
        SourceCategory: 'bags/tote',
        Price: 30000,
        ReferencePrice: null,
        PurchaseCost: 1000,
        ExpectedShippingFee: null,
        MarginRate: null,
        ModelNo: 'MODEL-1',
        MarketplaceModelId: null,
        AvailableUntil: null,
        BuyingShopName: null,
        ColorSizeComments: null,
        VariantLayout: 'cross_product',
        RequestUid: null,
        LastError: null,
        LastPayload: null,
        RegisteredAt: null,
        StockSyncedAt: null,
        PriceSyncedAt: null,
        Version: 1,
        CreatedAt: FIXED_TS,
        UpdatedAt: FIXED_TS,
        ...overrides,
    };
}

let nextRowId = 1000;

export function buildOption(overrides: Partial<ListingProductOption> = {}): ListingProductOption {
    return {
        Id: nextRowId++,
        ProductId: 1,
        OptionType: 'size',
        Value: 'M',
        MasterId: null,
        Position: 1,
        ...overrides,
    };
}

export function buildVariant(overrides: Partial<ListingProductVariant> = {}): ListingProductVariant {
    return {
        Id: nextRowId++,
        ProductId: 1,
        ColorValue: null,
        SizeValue: 'M',
        StockState: 'in_stock',
        Quantity: 1,
        SourceStockState: 'in_stock',
        SourceCheckedAt: null,
        UpdatedAt: FIXED_TS,
        ...overrides,
    };
}

export function buildImage(overrides: Partial<ListingProductImage> = {}): ListingProductImage {
    return {
        Id: nextRowId++,
        ProductId: 1,
        Position: 1,
        Url: 'https://cdn.example.test/img/1.jpg',
        ...overrides,
    };
}

export interface SeedBundle {
    product: ListingProduct;
    options?: ListingProductOption[];
    variants?: ListingProductVariant[];
    images?: ListingProductImage[];
    shippingMethodIds?: number[];
}

/**
 * CatalogStore kept in plain arrays. Mirrors the Supabase service closely
 * enough for orchestration tests: version checks, filters and ordering.
 */
export class InMemoryCatalog implements CatalogStore {
    products: ListingProduct[] = [];
    options: ListingProductOption[] = [];
    variants: ListingProductVariant[] = [];
    images: ListingProductImage[] = [];
    shipping = new Map<number, number[]>();
    observations: CompetitorPriceObservation[] = [];
    callLogs: ApiCallLog[] = [];
    brandMappings = new Map<string, number>();
    categoryMappings = new Map<string, number>();

    /** Runs before every versioned update; lets a test slip in a concurrent write. */
    beforeUpdate?: (referenceNumber: string) => void;

    seed(bundle: SeedBundle): ListingProduct {
        this.products.push(bundle.product);
        this.options.push(...(bundle.options ?? []));
        this.variants.push(...(bundle.variants ?? []));
        this.images.push(...(bundle.images ?? []));
        if (bundle.shippingMethodIds) {
            this.shipping.set(bundle.product.Id, bundle.shippingMethodIds);
        }
        return bundle.product;
    }

    get(referenceNumber: string): ListingProduct | undefined {
        return this.products.find(p => p.ReferenceNumber === referenceNumber);
    }

    async findRegistrationCandidates(limit: number, afterId = 0): Promise<ListingProduct[]> {
        return this.products
            .filter(p => p.Control === 'publish' && p.PublishStatus === 'unregistered' && p.Id > afterId)
            .sort((a, b) => a.Id - b.Id)
            .slice(0, limit)
            .map(p => ({ ...p }));
    }

    async findByReference(referenceNumber: string): Promise<ListingProduct | null> {
        const found = this.get(referenceNumber);
        return found ? { ...found } : null;
    }

    async loadBundle(product: ListingProduct): Promise<ProductBundle> {
        return {
            product,
            options: this.options
                .filter(o => o.ProductId === product.Id)
                .sort((a, b) => a.Position - b.Position)
                .map(o => ({ ...o })),
            variants: this.variants.filter(v => v.ProductId === product.Id).map(v => ({ ...v })),
            images: this.images
                .filter(i => i.ProductId === product.Id && i.Url !== null)
                .sort((a, b) => a.Position - b.Position)
                .map(i => ({ ...i })),
            shippingMethodIds: this.shipping.get(product.Id) ?? [],
        };
    }

    async findPublishedForReconciliation(limit: number): Promise<ListingProduct[]> {
        const syncedAt = (p: ListingProduct) => (p.StockSyncedAt ? Date.parse(p.StockSyncedAt) : -Infinity);
        return this.products
            .filter(p => p.PublishStatus === 'published' && p.RemoteId !== null)
            .sort((a, b) => syncedAt(a) - syncedAt(b))
            .slice(0, limit)
            .map(p => ({ ...p }));
    }

    async findStalePending(submittedBefore: Date, limit: number): Promise<ListingProduct[]> {
        return this.products
            .filter(
                p =>
                    p.PublishStatus === 'pending_confirmation' &&
                    p.RegisteredAt !== null &&
                    Date.parse(p.RegisteredAt) < submittedBefore.getTime(),
            )
            .sort((a, b) => Date.parse(a.RegisteredAt ?? '') - Date.parse(b.RegisteredAt ?? ''))
            .slice(0, limit)
            .map(p => ({ ...p }));
    }

    async updateProduct(
        referenceNumber: string,
        patch: ListingProductPatch,
        expectedVersion: number,
    ): Promise<ListingProduct | null> {
        this.beforeUpdate?.(referenceNumber);
        const index = this.products.findIndex(p => p.ReferenceNumber === referenceNumber);
        if (index < 0 || this.products[index].Version !== expectedVersion) {
            return null;
        }
        return this.write(index, patch);
    }

    async forceUpdateProduct(referenceNumber: string, patch: ListingProductPatch): Promise<ListingProduct | null> {
        const index = this.products.findIndex(p => p.ReferenceNumber === referenceNumber);
        return index < 0 ? null : this.write(index, patch);
    }

    /** Simulates another process writing the row (bumps Version). */
    touch(referenceNumber: string, patch: ListingProductPatch = {}): void {
        const index = this.products.findIndex(p => p.ReferenceNumber === referenceNumber);
        if (index >= 0) {
            this.write(index, patch);
        }
    }

    private write(index: number, patch: ListingProductPatch): ListingProduct {
        const current = this.products[index];
        const updated: ListingProduct = {
            ...current,
            ...patch,
            Version: current.Version + 1,
            UpdatedAt: new Date().toISOString(),
        };
        this.products[index] = updated;
        return { ...updated };
    }

    async updateVariantStock(variantId: number, stockState: StockState, quantity: number): Promise<void> {
        const variant = this.variants.find(v => v.Id === variantId);
        if (variant) {
            variant.StockState = stockState;
            variant.Quantity = quantity;
        }
    }

    async resolveBrandId(product: ListingProduct): Promise<number | null> {
        if (product.BrandId && product.BrandId > 0) return product.BrandId;
        return product.SourceBrand ? this.brandMappings.get(product.SourceBrand) ?? null : null;
    }

    async resolveCategoryId(product: ListingProduct): Promise<number | null> {
        if (product.CategoryId && product.CategoryId > 0) return product.CategoryId;
        return product.SourceCategory ? this.categoryMappings.get(product.SourceCategory) ?? null : null;
    }

    async latestPriceObservation(modelNo: string): Promise<CompetitorPriceObservation | null> {
        const matches = this.observations
            .filter(o => o.ModelNo === modelNo)
            .sort((a, b) => Date.parse(b.ObservedAt) - Date.parse(a.ObservedAt));
        return matches[0] ?? null;
    }

    async countByPublishStatus(): Promise<PublishStatusCounts> {
        const counts: PublishStatusCounts = { unregistered: 0, pending_confirmation: 0, published: 0, failed: 0 };
        for (const p of this.products) {
            const status: PublishStatus = p.PublishStatus;
            counts[status] += 1;
        }
        return counts;
    }

    async appendCallLog(entry: ApiCallLog): Promise<void> {
        this.callLogs.push({ ...entry, Id: this.callLogs.length + 1, CreatedAt: entry.CreatedAt ?? FIXED_TS });
    }

    async findAcceptedCreate(referenceNumber: string): Promise<ApiCallLog | null> {
        const accepted = this.callLogs.filter(
            l => l.ReferenceNumber === referenceNumber && l.Action === 'create' && l.IsSuccess,
        );
        return accepted[accepted.length - 1] ?? null;
    }

    async findCallTimesSince(since: Date): Promise<Date[]> {
        return this.callLogs
            .filter(l => !(l.HttpStatus === null && l.Outcome === 'quota_exhausted'))
            .map(l => new Date(l.CreatedAt ?? FIXED_TS))
            .filter(d => d.getTime() >= since.getTime())
            .sort((a, b) => a.getTime() - b.getTime());
    }
}
