// Operator-maintained reference data. The pipeline only reads these.
export interface BrandMapping {
    Id: number;
    SourceBrand: string;
    MarketplaceBrandId: number;
    MarketplaceBrandName: string | null;
}

export interface CategoryMapping {
    Id: number;
    SourceCategory: string;
    MarketplaceCategoryId: number;
}

export interface ListingShippingMethod {
    Id: number;
    ProductId: number;
    ShippingMethodId: number;
}
