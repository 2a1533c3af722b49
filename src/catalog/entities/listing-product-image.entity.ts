export interface ListingProductImage {
    Id: number;
    ProductId: number;
    Position: number;
    Url: string | null; // null until the image pipeline has uploaded it
}
