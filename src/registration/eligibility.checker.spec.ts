import { ProductBundle } from '../catalog/catalog.types';
import { buildImage, buildProduct, buildVariant } from '../catalog/testing/in-memory-catalog';
import { ListingProduct } from '../catalog/entities/listing-product.entity';
import { testPipelineConfig } from '../config/testing/config.fixtures';
import { MarginCalculator } from '../pricing/margin.calculator';
import { EligibilityChecker } from './eligibility.checker';

describe('EligibilityChecker', () => {
  const checker = new EligibilityChecker(new MarginCalculator(testPipelineConfig()));

  function bundle(product: Partial<ListingProduct> = {}, rest: Partial<ProductBundle> = {}): ProductBundle {
    return {
      product: buildProduct(product),
      options: [],
      variants: [buildVariant()],
      images: [buildImage()],
      shippingMethodIds: [],
      ...rest,
    };
  }

  it('accepts a sellable product and reports its margin rate', () => {
    expect(checker.check(bundle(), 3001)).toEqual({ eligible: true, marginRate: 88.74 });
  });

  it('accepts a product without a purchase cost without a margin', () => {
    expect(checker.check(bundle({ PurchaseCost: null }), 3001)).toEqual({ eligible: true, marginRate: null });
  });

  it.each([
    ['a draft', bundle({ Control: 'draft' }), 3001, 'control is draft'],
    ['an already submitted product', bundle({ PublishStatus: 'pending_confirmation' }), 3001, 'status is pending_confirmation'],
    ['a zero price', bundle({ Price: 0 }), 3001, 'no positive price'],
    ['an unmapped category', bundle(), null, 'category not resolved'],
    ['no uploaded image', bundle({}, { images: [buildImage({ Url: null })] }), 3001, 'no uploaded image'],
    [
      'all variants out of stock',
      bundle({}, { variants: [buildVariant({ StockState: 'out_of_stock', Quantity: 0 })] }),
      3001,
      'every variant is out of stock',
    ],
  ])('skips %s', (_label, candidate, categoryId, reason) => {
    expect(checker.check(candidate, categoryId)).toEqual({ eligible: false, reason });
  });

  it('skips a product sold below cost', () => {
    const result = checker.check(bundle({ PurchaseCost: 300_000 }), 3001);

    expect(result.eligible).toBe(false);
    if (!result.eligible) {
      expect(result.reason).toMatch(/^margin -\d+ \(-[\d.]+%\) below policy$/);
    }
  });
});
