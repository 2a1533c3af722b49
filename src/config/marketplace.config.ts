import { registerAs } from '@nestjs/config';
import { envNumber, envNumberList, envString } from './env.helpers';

export interface QuotaWindowConfig {
  name: string;
  limit: number;
  windowMs: number;
}

/**
 * Fixed values the marketplace expects on every listing. They are injected
 * into the payload builder instead of being spread across call sites.
 */
export interface ListingConstants {
  buyingAreaId: string;
  shippingAreaId: string;
  themeId: number;
  duty: string;
  defaultShippingMethodIds: number[];
  defaultAvailableDays: number;
  defaultColorMasterId: number;
  defaultSizeMasterId: number;
  placeholderSizeValue: string;
  nameMaxLength: number;
  descriptionMaxLength: number;
  maxImages: number;
  orderQuantity: number;
}

export interface MarketplaceConfig {
  baseUrl: string;
  productsPath: string;
  tokenHeader: string;
  accessToken: string | null;
  requestTimeoutMs: number;
  minCallIntervalMs: number;
  maxQuotaWaitMs: number;
  quotaWindows: QuotaWindowConfig[];
  listing: ListingConstants;
}

const HOUR_MS = 60 * 60 * 1000;

export const marketplaceConfig = registerAs('marketplace', (): MarketplaceConfig => ({
  baseUrl: envString('MARKETPLACE_API_BASE_URL', 'https://sandbox.marketplace.example.com'),
  productsPath: envString('MARKETPLACE_PRODUCTS_PATH', '/api/v1/products.json'),
  tokenHeader: envString('MARKETPLACE_TOKEN_HEADER', 'X-Personal-Shopper-Api-Access-Token'),
  accessToken: process.env.MARKETPLACE_ACCESS_TOKEN || null,
  requestTimeoutMs: envNumber('MARKETPLACE_TIMEOUT_MS', 30_000),
  minCallIntervalMs: envNumber('MIN_CALL_INTERVAL_MS', 1_500),
  maxQuotaWaitMs: envNumber('MAX_QUOTA_WAIT_MS', 5 * 60 * 1000),
  quotaWindows: [
    {
      name: 'global',
      limit: envNumber('QUOTA_GLOBAL_LIMIT', 5_000),
      windowMs: envNumber('QUOTA_GLOBAL_WINDOW_MS', HOUR_MS),
    },
    {
      name: 'product',
      limit: envNumber('QUOTA_PRODUCT_LIMIT', 2_500),
      windowMs: envNumber('QUOTA_PRODUCT_WINDOW_MS', 24 * HOUR_MS),
    },
  ],
  listing: {
    buyingAreaId: envString('LISTING_BUYING_AREA_ID', '2002003000'),
    shippingAreaId: envString('LISTING_SHIPPING_AREA_ID', '2002003000'),
    themeId: envNumber('LISTING_THEME_ID', 98),
    duty: envString('LISTING_DUTY', 'included'),
    defaultShippingMethodIds: envNumberList('LISTING_SHIPPING_METHOD_IDS', [369]),
    defaultAvailableDays: envNumber('LISTING_AVAILABLE_DAYS', 30),
    defaultColorMasterId: envNumber('LISTING_DEFAULT_COLOR_MASTER_ID', 99),
    defaultSizeMasterId: envNumber('LISTING_DEFAULT_SIZE_MASTER_ID', 0),
    placeholderSizeValue: envString('LISTING_PLACEHOLDER_SIZE', 'ONE SIZE'),
    nameMaxLength: envNumber('LISTING_NAME_MAX_LENGTH', 60),
    descriptionMaxLength: envNumber('LISTING_DESCRIPTION_MAX_LENGTH', 3_000),
    maxImages: envNumber('LISTING_MAX_IMAGES', 20),
    orderQuantity: envNumber('LISTING_ORDER_QUANTITY', 100),
  },
}));
