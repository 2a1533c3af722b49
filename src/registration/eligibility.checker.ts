import { Injectable } from '@nestjs/common';
import { ProductBundle } from '../catalog/catalog.types';
import { MarginCalculator } from '../pricing/margin.calculator';

export type Eligibility =
  | { eligible: true; marginRate: number | null }
  | { eligible: false; reason: string };

/**
 * Batch selection filter. Products that fail it are skipped without any state
 * change; the payload builder still validates whatever gets through.
 */
@Injectable()
export class EligibilityChecker {
  constructor(private readonly marginCalculator: MarginCalculator) {}

  check(bundle: ProductBundle, categoryId: number | null): Eligibility {
    const { product } = bundle;

    if (product.Control !== 'publish') {
      return { eligible: false, reason: `control is ${product.Control}` };
    }
    if (product.PublishStatus !== 'unregistered') {
      return { eligible: false, reason: `status is ${product.PublishStatus}` };
    }
    if (!(product.Price > 0)) {
      return { eligible: false, reason: 'no positive price' };
    }
    if (categoryId === null || categoryId <= 0) {
      return { eligible: false, reason: 'category not resolved' };
    }
    if (!bundle.images.some(image => image.Url)) {
      return { eligible: false, reason: 'no uploaded image' };
    }
    if (!bundle.variants.some(variant => variant.StockState !== 'out_of_stock')) {
      return { eligible: false, reason: 'every variant is out of stock' };
    }

    // Without a purchase cost there is nothing to check the margin against.
    if (product.PurchaseCost === null) {
      return { eligible: true, marginRate: null };
    }
    const margin = this.marginCalculator.calculate(product.Price, product.PurchaseCost, product.ExpectedShippingFee);
    if (!this.marginCalculator.meetsPolicy(margin)) {
      return { eligible: false, reason: `margin ${margin.margin} (${margin.marginRate}%) below policy` };
    }
    return { eligible: true, marginRate: margin.marginRate };
  }
}
