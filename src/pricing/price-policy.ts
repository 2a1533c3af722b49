import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { pipelineConfig, UndercutBand } from '../config/pipeline.config';

export type PriceDecisionReason = 'no_observation' | 'within_band' | 'undercut';

export interface PriceDecision {
  price: number;
  reason: PriceDecisionReason;
}

/**
 * Keeps the current price when it already sits inside
 * `[lowest - band.max, lowest - band.min]`; otherwise undercuts the lowest
 * competitor by `band.min`.
 */
export function decideCompetitivePrice(
  currentPrice: number,
  lowestCompetitorPrice: number | null,
  band: UndercutBand,
): PriceDecision {
  if (lowestCompetitorPrice === null || lowestCompetitorPrice <= 0) {
    return { price: currentPrice, reason: 'no_observation' };
  }

  const floor = lowestCompetitorPrice - band.max;
  const ceiling = lowestCompetitorPrice - band.min;
  if (currentPrice >= floor && currentPrice <= ceiling) {
    return { price: currentPrice, reason: 'within_band' };
  }
  if (ceiling <= 0) {
    return { price: currentPrice, reason: 'no_observation' };
  }
  return { price: ceiling, reason: 'undercut' };
}

@Injectable()
export class CompetitivePricePolicy {
  constructor(
    @Inject(pipelineConfig.KEY)
    private readonly config: ConfigType<typeof pipelineConfig>,
  ) {}

  decide(currentPrice: number, lowestCompetitorPrice: number | null): PriceDecision {
    return decideCompetitivePrice(currentPrice, lowestCompetitorPrice, this.config.undercut);
  }
}
