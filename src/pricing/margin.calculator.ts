import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { MarginPolicy, pipelineConfig } from '../config/pipeline.config';

export interface MarginBreakdown {
  salesPrice: number; // source currency
  salesFee: number;
  netIncome: number;
  totalCost: number;
  vatRefund: number;
  margin: number;
  marginRate: number; // percent, two decimals
  profitable: boolean;
}

/**
 * Margin of selling at `price` (listing currency) for an item bought at
 * `purchaseCost` (source currency). Purchase VAT is refunded on export, so
 * `purchaseCost / vatRefundDivisor` is added back.
 */
export function computeMargin(
  price: number,
  purchaseCost: number,
  shippingFee: number | null,
  policy: MarginPolicy,
): MarginBreakdown {
  const salesPrice = price * policy.exchangeRate;
  const salesFee = salesPrice * policy.salesFeeRate;
  const netIncome = salesPrice - salesFee;
  const totalCost = purchaseCost + (shippingFee ?? policy.defaultShippingFee);
  const vatRefund = purchaseCost / policy.vatRefundDivisor;
  const margin = netIncome - totalCost + vatRefund;
  const marginRate = salesPrice > 0 ? (margin / salesPrice) * 100 : 0;

  return {
    salesPrice: Math.round(salesPrice),
    salesFee: Math.round(salesFee),
    netIncome: Math.round(netIncome),
    totalCost: Math.round(totalCost),
    vatRefund: Math.round(vatRefund),
    margin: Math.round(margin),
    marginRate: Math.round(marginRate * 100) / 100,
    profitable: margin > 0,
  };
}

@Injectable()
export class MarginCalculator {
  constructor(
    @Inject(pipelineConfig.KEY)
    private readonly config: ConfigType<typeof pipelineConfig>,
  ) {}

  calculate(price: number, purchaseCost: number, shippingFee: number | null): MarginBreakdown {
    return computeMargin(price, purchaseCost, shippingFee, this.config.margin);
  }

  /** Profitable and at or above the configured minimum rate. */
  meetsPolicy(breakdown: MarginBreakdown): boolean {
    return breakdown.profitable && breakdown.marginRate >= this.config.margin.minMarginRate;
  }
}
