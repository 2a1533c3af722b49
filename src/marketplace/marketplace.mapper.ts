import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { marketplaceConfig, ListingConstants } from '../config/marketplace.config';
import { ListingProduct, ControlFlag } from '../catalog/entities/listing-product.entity';
import { ListingProductOption, OptionType } from '../catalog/entities/listing-product-option.entity';
import { ListingProductVariant, StockState } from '../catalog/entities/listing-product-variant.entity';
import { ListingProductImage } from '../catalog/entities/listing-product-image.entity';
import { ValidationError } from '../common/errors/pipeline.errors';
import {
    ControlDocument,
    ProductDocument,
    WireControl,
    WireImage,
    WireOption,
    WireStockType,
    WireVariant,
    WireVariantOption,
} from './marketplace.types';

export interface PayloadInput {
    product: ListingProduct;
    options: ListingProductOption[];
    variants: ListingProductVariant[];
    images: ListingProductImage[];
    shippingMethodIds: number[];
    brandId: number | null; // resolved through BrandMappings when the product has none
    categoryId: number | null;
}

/** Present only for update calls. */
export interface UpdateTarget {
    remoteId: string;
    control?: WireControl;
}

export type BuildResult =
    | { ok: true; document: ProductDocument }
    | { ok: false; error: ValidationError };

const ELLIPSIS = '...';

const WIRE_CONTROL: Record<ControlFlag, WireControl> = {
    draft: 'draft',
    publish: 'publish',
    suspend: 'suspend',
    deleted: 'delete',
};

export function wireStock(state: StockState): { stock_type: WireStockType; stocks: number } {
    return state === 'in_stock'
        ? { stock_type: 'purchase_for_order', stocks: 1 }
        : { stock_type: 'out_of_stock', stocks: 0 };
}

/** Truncates to `limit` code points, replacing the tail with an ellipsis. */
export function truncateName(name: string, limit: number): string {
    const chars = Array.from(name.trim());
    if (chars.length <= limit) {
        return chars.join('');
    }
    return chars.slice(0, Math.max(0, limit - ELLIPSIS.length)).join('') + ELLIPSIS;
}

export function formatDeadline(date: Date): string {
    const yyyy = date.getUTCFullYear();
    const mm = String(date.getUTCMonth() + 1).padStart(2, '0');
    const dd = String(date.getUTCDate()).padStart(2, '0');
    return `${yyyy}/${mm}/${dd}`;
}

function normalize(value: string): string {
    return value.trim().toLowerCase();
}

/** Trimmed text, or null when absent or blank. */
function present(value: string | null | undefined): string | null {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
}

// Emitted option values of one type, keyed by normalized value.
interface Axis {
    type: OptionType;
    values: string[];
    byKey: Map<string, string>;
    placeholder: boolean;
}

@Injectable()
export class MarketplaceMapper {
    private readonly logger = new Logger(MarketplaceMapper.name);
    private readonly listing: ListingConstants;

    constructor(
        @Inject(marketplaceConfig.KEY)
        config: ConfigType<typeof marketplaceConfig>,
    ) {
        this.listing = config.listing;
    }

    /**
     * Builds the marketplace document for one product. Pure apart from `now`,
     * which only feeds the default purchase deadline.
     */
    buildDocument(input: PayloadInput, now: Date, update?: UpdateTarget): BuildResult {
        const { product } = input;
        const ref = product.ReferenceNumber;

        if (!Number.isInteger(product.Price) || product.Price <= 0) {
            return this.fail('MISSING_PRICE', `Product ${ref} has no positive price (${product.Price})`);
        }
        if (input.categoryId === null || input.categoryId <= 0) {
            return this.fail('MISSING_CATEGORY', `Product ${ref} has no marketplace category`);
        }
        const brandId = input.brandId !== null && input.brandId > 0 ? input.brandId : null;
        const brandName = present(product.BrandName);
        if (brandId === null && brandName === null) {
            return this.fail('MISSING_BRAND', `Product ${ref} has neither a brand id nor a brand name`);
        }
        const images = this.mapImages(input.images);
        if (images.length === 0) {
            return this.fail('MISSING_IMAGES', `Product ${ref} has no uploaded images`);
        }
        if (input.variants.length === 0) {
            return this.fail('MISSING_VARIANTS', `Product ${ref} has no variants`);
        }

        const colors = this.buildAxis('color', input.options);
        const sizes = this.buildAxis('size', input.options);
        if (colors.values.length === 0 && sizes.values.length === 0) {
            sizes.values.push(this.listing.placeholderSizeValue);
            sizes.byKey.set(normalize(this.listing.placeholderSizeValue), this.listing.placeholderSizeValue);
            sizes.placeholder = true;
        }

        const strayVariantId = this.findUnknownOption(input.variants, colors, sizes);
        if (strayVariantId !== null) {
            return this.fail('UNKNOWN_VARIANT_OPTION', `Product ${ref} variant ${strayVariantId} references an option the product does not define`);
        }

        const document: ProductDocument = {
            reference_number: ref,
            control: update?.control ?? WIRE_CONTROL.publish,
            name: truncateName(product.Name, this.listing.nameMaxLength),
            comments: this.description(product),
            category_id: input.categoryId,
            price: product.Price,
            available_until: this.deadline(product, now),
            buying_area_id: this.listing.buyingAreaId,
            shipping_area_id: this.listing.shippingAreaId,
            theme_id: this.listing.themeId,
            duty: this.listing.duty,
            order_quantity: this.listing.orderQuantity,
            images,
            shipping_methods: this.shippingMethods(input.shippingMethodIds).map(id => ({ shipping_method_id: id })),
            options: this.mapOptions(input.options, colors, sizes),
            variants:
                product.VariantLayout === 'paired'
                    ? this.pairedVariants(input.variants, colors, sizes)
                    : this.crossProductVariants(input.variants, colors, sizes),
        };

        if (update) {
            document.id = update.remoteId;
        }
        if (brandId !== null) {
            document.brand_id = brandId;
        } else if (brandName !== null) {
            document.brand_name = brandName;
        }
        const shopName = present(product.BuyingShopName);
        if (shopName !== null) {
            document.buying_shop_name = shopName;
        }
        if (product.ReferencePrice !== null && product.ReferencePrice > 0) {
            document.reference_price = product.ReferencePrice;
        }
        if (product.MarketplaceModelId !== null && product.MarketplaceModelId > 0) {
            document.model_id = product.MarketplaceModelId;
        }
        const colorSizeComments = present(product.ColorSizeComments);
        if (colorSizeComments !== null) {
            document.colorsize_comments = colorSizeComments;
        }

        return { ok: true, document };
    }

    wireControl(control: ControlFlag): WireControl {
        return WIRE_CONTROL[control];
    }

    /** Control-only update that takes a live listing down (or hides it) without resending its body. */
    buildControlDocument(product: ListingProduct, remoteId: string): ControlDocument {
        return {
            id: remoteId,
            reference_number: product.ReferenceNumber,
            control: this.wireControl(product.Control),
        };
    }

    private fail(code: ValidationError['code'], message: string): BuildResult {
        this.logger.warn(`[${code}] ${message}`);
        return { ok: false, error: new ValidationError(code, message) };
    }

    private description(product: ListingProduct): string {
        const text = present(product.Description) ?? product.Name.trim();
        return Array.from(text).slice(0, this.listing.descriptionMaxLength).join('');
    }

    private deadline(product: ListingProduct, now: Date): string {
        if (product.AvailableUntil) {
            return product.AvailableUntil.slice(0, 10).replace(/-/g, '/');
        }
        const fallback = new Date(now.getTime());
        fallback.setUTCDate(fallback.getUTCDate() + this.listing.defaultAvailableDays);
        return formatDeadline(fallback);
    }

    private mapImages(images: ListingProductImage[]): WireImage[] {
        const paths: string[] = [];
        for (const image of [...images].sort((a, b) => a.Position - b.Position)) {
            const path = present(image.Url);
            if (path !== null) {
                paths.push(path);
            }
        }
        return paths
            .slice(0, this.listing.maxImages)
            .map((path, index) => ({ path, position: index + 1 }));
    }

    private shippingMethods(configured: number[]): number[] {
        const ids = configured.length > 0 ? configured : this.listing.defaultShippingMethodIds;
        return [...new Set(ids)];
    }

    private buildAxis(type: OptionType, options: ListingProductOption[]): Axis {
        const axis: Axis = { type, values: [], byKey: new Map(), placeholder: false };
        const ofType = options
            .map((option, index) => ({ option, index }))
            .filter(({ option }) => option.OptionType === type && present(option.Value) !== null)
            .sort((a, b) => a.option.Position - b.option.Position || a.index - b.index);

        for (const { option } of ofType) {
            const value = option.Value.trim();
            const key = normalize(value);
            if (!axis.byKey.has(key)) {
                axis.byKey.set(key, value);
                axis.values.push(value);
            }
        }
        return axis;
    }

    private mapOptions(options: ListingProductOption[], colors: Axis, sizes: Axis): WireOption[] {
        const masterIds = new Map<string, number>();
        for (const option of options) {
            const key = `${option.OptionType}:${normalize(option.Value)}`;
            if (!masterIds.has(key) && option.MasterId !== null && option.MasterId !== 0) {
                masterIds.set(key, option.MasterId);
            }
        }

        const emit = (axis: Axis, fallbackMasterId: number): WireOption[] =>
            axis.values.map((value, index) => ({
                type: axis.type,
                value,
                master_id: masterIds.get(`${axis.type}:${normalize(value)}`) ?? fallbackMasterId,
                position: index + 1,
            }));

        return [
            ...emit(colors, this.listing.defaultColorMasterId),
            ...emit(sizes, this.listing.defaultSizeMasterId),
        ];
    }

    /** First variant (by id) naming a value its product does not define. */
    private findUnknownOption(variants: ListingProductVariant[], colors: Axis, sizes: Axis): number | null {
        for (const variant of variants) {
            if (!this.onAxis(variant.ColorValue, colors) || !this.onAxis(variant.SizeValue, sizes)) {
                return variant.Id;
            }
        }
        return null;
    }

    private onAxis(value: string | null, axis: Axis): boolean {
        const text = present(value);
        return text === null || axis.byKey.has(normalize(text));
    }

    private crossProductVariants(variants: ListingProductVariant[], colors: Axis, sizes: Axis): WireVariant[] {
        const colorValues: (string | null)[] = colors.values.length > 0 ? colors.values : [null];
        const sizeValues: (string | null)[] = sizes.values.length > 0 ? sizes.values : [null];
        const result: WireVariant[] = [];

        for (const color of colorValues) {
            for (const size of sizeValues) {
                const matching = variants.filter(
                    v => this.matches(v.ColorValue, color, false) && this.matches(v.SizeValue, size, sizes.placeholder),
                );
                const state: StockState = matching.some(v => v.StockState === 'in_stock') ? 'in_stock' : 'out_of_stock';
                result.push({ options: this.variantOptions(color, size), ...wireStock(state) });
            }
        }
        return result;
    }

    private pairedVariants(variants: ListingProductVariant[], colors: Axis, sizes: Axis): WireVariant[] {
        return variants.map(variant => {
            const colorText = present(variant.ColorValue);
            const sizeText = present(variant.SizeValue);
            const color = colorText === null ? null : colors.byKey.get(normalize(colorText)) ?? null;
            let size = sizeText === null ? null : sizes.byKey.get(normalize(sizeText)) ?? null;
            if (size === null && sizes.placeholder) {
                size = this.listing.placeholderSizeValue;
            }
            return { options: this.variantOptions(color, size), ...wireStock(variant.StockState) };
        });
    }

    // A null axis value matches any variant; the placeholder axis also matches variants without a size.
    private matches(variantValue: string | null, axisValue: string | null, placeholder: boolean): boolean {
        if (axisValue === null) {
            return true;
        }
        const text = present(variantValue);
        if (text === null) {
            return placeholder;
        }
        return normalize(text) === normalize(axisValue);
    }

    private variantOptions(color: string | null, size: string | null): WireVariantOption[] {
        const options: WireVariantOption[] = [];
        if (color !== null) options.push({ type: 'color', value: color });
        if (size !== null) options.push({ type: 'size', value: size });
        return options;
    }
}
