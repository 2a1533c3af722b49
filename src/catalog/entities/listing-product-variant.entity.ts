export type StockState = 'in_stock' | 'out_of_stock';

export interface ListingProductVariant {
    Id: number;
    ProductId: number;
    ColorValue: string | null;
    SizeValue: string | null;
    StockState: StockState; // what the marketplace currently advertises
    Quantity: number;
    SourceStockState: StockState; // freshest source-of-truth inventory, written by the collector
    SourceCheckedAt: string | null;
    UpdatedAt: string;
}
