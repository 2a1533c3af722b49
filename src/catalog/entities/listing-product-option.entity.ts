export type OptionType = 'color' | 'size';

export interface ListingProductOption {
    Id: number;
    ProductId: number;
    OptionType: OptionType;
    Value: string;
    MasterId: number | null; // null or 0 means "use the per-type default"
    Position: number;
}
