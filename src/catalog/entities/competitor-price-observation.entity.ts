export interface CompetitorPriceObservation {
    Id: number;
    ModelNo: string;
    LowestPrice: number | null;
    CompetitorCount: number;
    ObservedAt: string;
}
