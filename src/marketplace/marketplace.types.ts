import { OptionType } from '../catalog/entities/listing-product-option.entity';
import { FieldError } from '../common/errors/pipeline.errors';

// --- Wire shapes of POST /api/v1/products.json ---

export type WireControl = 'publish' | 'draft' | 'suspend' | 'delete';

export type WireStockType = 'purchase_for_order' | 'out_of_stock';

export type WireImage = {
    path: string;
    position: number; // 1..N
};

export type WireShippingMethod = {
    shipping_method_id: number;
};

export type WireOption = {
    type: OptionType;
    value: string;
    master_id: number;
    position: number; // 1..N per type
};

export type WireVariantOption = {
    type: OptionType;
    value: string;
};

export type WireVariant = {
    options: WireVariantOption[];
    stock_type: WireStockType;
    stocks: number;
};

export type ProductDocument = {
    id?: string; // remote id, update calls only
    reference_number: string;
    control: WireControl;
    name: string;
    comments: string;
    brand_id?: number;
    brand_name?: string;
    category_id: number;
    price: number;
    reference_price?: number;
    available_until: string; // YYYY/MM/DD
    buying_area_id: string;
    shipping_area_id: string;
    buying_shop_name?: string;
    theme_id: number;
    duty: string;
    model_id?: number;
    colorsize_comments?: string;
    order_quantity: number;
    images: WireImage[];
    shipping_methods: WireShippingMethod[];
    options: WireOption[];
    variants: WireVariant[];
};

// Only the control changes; the marketplace keeps the rest of the listing as it is.
export type ControlDocument = {
    id: string;
    reference_number: string;
    control: WireControl;
};

export type OutboundDocument = ProductDocument | ControlDocument;

export type ProductRequest = {
    product: OutboundDocument;
};

// --- Classified results of one call ---

export type CallOutcome =
    | { kind: 'submitted'; httpStatus: number; requestUid: string | null }
    | { kind: 'rejected'; httpStatus: number; message: string; fieldErrors: FieldError[] }
    | { kind: 'quota_exhausted'; httpStatus: number | null; message: string }
    | { kind: 'unauthorized'; httpStatus: number | null; message: string }
    | { kind: 'retryable'; httpStatus: number | null; message: string };
