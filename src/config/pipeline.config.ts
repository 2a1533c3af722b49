import { registerAs } from '@nestjs/config';
import { envBoolean, envNumber, envString } from './env.helpers';
import { QuotaExhaustedPolicy } from './env.validation';

export interface MarginPolicy {
  /** Source-currency units per one listing-currency unit. */
  exchangeRate: number;
  salesFeeRate: number;
  defaultShippingFee: number;
  vatRefundDivisor: number;
  minMarginRate: number;
}

export interface UndercutBand {
  min: number;
  max: number;
}

export interface PipelineConfig {
  registrationBatchSize: number;
  registrationCron: string;
  registrationCronEnabled: boolean;
  quotaPolicy: QuotaExhaustedPolicy;
  quotaBackoffMs: number;
  quotaBackoffAttempts: number;
  margin: MarginPolicy;
  undercut: UndercutBand;
  suspendWhenUnprofitable: boolean;
  reconcileBatchSize: number;
  reconcileCron: string;
  webhookEventHeader: string;
  webhookLookupAttempts: number;
  webhookLookupDelayMs: number;
  writeAttempts: number;
  /** Pending confirmations older than this are reported to the operator. */
  pendingAlertHours: number;
}

function quotaPolicyFromEnv(): QuotaExhaustedPolicy {
  return process.env.QUOTA_EXHAUSTED_POLICY === QuotaExhaustedPolicy.BACKOFF
    ? QuotaExhaustedPolicy.BACKOFF
    : QuotaExhaustedPolicy.HALT;
}

export const pipelineConfig = registerAs('pipeline', (): PipelineConfig => ({
  registrationBatchSize: envNumber('REGISTRATION_BATCH_SIZE', 50),
  registrationCron: envString('REGISTRATION_CRON', '0 0 * * * *'),
  registrationCronEnabled: envBoolean('REGISTRATION_CRON_ENABLED', false),
  quotaPolicy: quotaPolicyFromEnv(),
  quotaBackoffMs: envNumber('QUOTA_BACKOFF_MS', 60_000),
  quotaBackoffAttempts: envNumber('QUOTA_BACKOFF_ATTEMPTS', 3),
  margin: {
    exchangeRate: envNumber('MARGIN_EXCHANGE_RATE', 9.2),
    salesFeeRate: envNumber('MARGIN_SALES_FEE_RATE', 0.055),
    defaultShippingFee: envNumber('MARGIN_DEFAULT_SHIPPING_FEE', 15_000),
    vatRefundDivisor: envNumber('MARGIN_VAT_REFUND_DIVISOR', 11),
    minMarginRate: envNumber('MIN_MARGIN_RATE', 0),
  },
  undercut: {
    min: envNumber('PRICE_UNDERCUT_MIN', 1),
    max: envNumber('PRICE_UNDERCUT_MAX', 9),
  },
  suspendWhenUnprofitable: envBoolean('SUSPEND_WHEN_UNPROFITABLE', true),
  reconcileBatchSize: envNumber('RECONCILE_BATCH_SIZE', 200),
  reconcileCron: envString('RECONCILE_CRON', '0 */30 * * * *'),
  webhookEventHeader: envString('WEBHOOK_EVENT_HEADER', 'x-marketplace-event').toLowerCase(),
  webhookLookupAttempts: envNumber('WEBHOOK_LOOKUP_ATTEMPTS', 3),
  webhookLookupDelayMs: envNumber('WEBHOOK_LOOKUP_DELAY_MS', 2_000),
  writeAttempts: envNumber('OPTIMISTIC_WRITE_ATTEMPTS', 3),
  pendingAlertHours: envNumber('PENDING_CONFIRMATION_ALERT_HOURS', 24),
}));
