import { MarketplaceConfig } from '../marketplace.config';
import { PipelineConfig } from '../pipeline.config';
import { QuotaExhaustedPolicy } from '../env.validation';

const HOUR_MS = 60 * 60 * 1000;

export function testMarketplaceConfig(overrides: Partial<MarketplaceConfig> = {}): MarketplaceConfig {
  return {
    baseUrl: 'https://marketplace.test',
    productsPath: '/api/v1/products.json',
    tokenHeader: 'X-Personal-Shopper-Api-Access-Token',
    accessToken: 'test-token',
    requestTimeoutMs: 1_000,
    minCallIntervalMs: 1_500,
    maxQuotaWaitMs: 5 * 60 * 1000,
    quotaWindows: [
      { name: 'global', limit: 5_000, windowMs: HOUR_MS },
      { name: 'product', limit: 2_500, windowMs: 24 * HOUR_MS },
    ],
    listing: {
      buyingAreaId: '2002003000',
      shippingAreaId: '2002003000',
      themeId: 98,
      duty: 'included',
      defaultShippingMethodIds: [369],
      defaultAvailableDays: 30,
      defaultColorMasterId: 99,
      defaultSizeMasterId: 0,
      placeholderSizeValue: 'ONE SIZE',
      nameMaxLength: 60,
      descriptionMaxLength: 3_000,
      maxImages: 20,
      orderQuantity: 100,
    },
    ...overrides,
  };
}

export function testPipelineConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return {
    registrationBatchSize: 50,
    registrationCron: '0 0 * * * *',
    registrationCronEnabled: false,
    quotaPolicy: QuotaExhaustedPolicy.HALT,
    quotaBackoffMs: 60_000,
    quotaBackoffAttempts: 3,
    margin: {
      exchangeRate: 9.2,
      salesFeeRate: 0.055,
      defaultShippingFee: 15_000,
      vatRefundDivisor: 11,
      minMarginRate: 0,
    },
    undercut: { min: 1, max: 9 },
    suspendWhenUnprofitable: true,
    reconcileBatchSize: 200,
    reconcileCron: '0 */30 * * * *',
    webhookEventHeader: 'x-marketplace-event',
    webhookLookupAttempts: 3,
    webhookLookupDelayMs: 2_000,
    writeAttempts: 3,
    pendingAlertHours: 24,
    ...overrides,
  };
}
