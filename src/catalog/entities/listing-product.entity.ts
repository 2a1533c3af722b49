export type ControlFlag = 'draft' | 'publish' | 'suspend' | 'deleted';

export type PublishStatus = 'unregistered' | 'pending_confirmation' | 'published' | 'failed';

export type VariantLayout = 'cross_product' | 'paired';

// Mirrors the ListingProducts table. Rows are created by the ETL step; this
// service only writes the publish/sync columns back.
export interface ListingProduct {
    Id: number;
    ReferenceNumber: string; // text UNIQUE NOT NULL, immutable
    RemoteId: string | null; // set once the marketplace confirms creation
    Control: ControlFlag;
    PublishStatus: PublishStatus;
    Name: string;
    Description: string | null;
    BrandId: number | null;
    BrandName: string | null;
    SourceBrand: string | null;
    CategoryId: number | null;
    SourceCategory: string | null;
    Price: number; // listing currency, integer
    ReferencePrice: number | null;
    PurchaseCost: number | null; // source currency
    ExpectedShippingFee: number | null; // source currency
    MarginRate: number | null;
    ModelNo: string | null;
    MarketplaceModelId: number | null;
    AvailableUntil: string | null; // date
    BuyingShopName: string | null;
    ColorSizeComments: string | null;
    VariantLayout: VariantLayout;
    RequestUid: string | null;
    LastError: string | null;
    LastPayload: Record<string, unknown> | null; // jsonb
    RegisteredAt: string | null;
    StockSyncedAt: string | null;
    PriceSyncedAt: string | null;
    Version: number;
    CreatedAt: string;
    UpdatedAt: string;
}

export type ListingProductPatch = Partial<
    Pick<
        ListingProduct,
        | 'RemoteId'
        | 'Control'
        | 'PublishStatus'
        | 'Price'
        | 'MarginRate'
        | 'RequestUid'
        | 'LastError'
        | 'LastPayload'
        | 'RegisteredAt'
        | 'StockSyncedAt'
        | 'PriceSyncedAt'
    >
>;
