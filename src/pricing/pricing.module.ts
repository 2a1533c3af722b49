import { Module } from '@nestjs/common';
import { MarginCalculator } from './margin.calculator';
import { CompetitivePricePolicy } from './price-policy';

@Module({
  providers: [MarginCalculator, CompetitivePricePolicy],
  exports: [MarginCalculator, CompetitivePricePolicy],
})
export class PricingModule {}
