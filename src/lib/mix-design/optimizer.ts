import type { MixResult, OptimizedMixResult, RandomSource, SubstitutionRatios } from '@/types';
import { DEFAULT_SUBSTITUTION } from './constants';
import { assertFinite } from './errors';
import { defaultRandom, uniform } from './random';

/**
 * Sustainable variant of a base mix: part of the cement goes to SCM (e.g. fly
 * ash) and part of each aggregate to recycled aggregate. Water is raised
 * slightly for workability.
 *
 * The strength and slump estimates are drawn from `random`, so only those two
 * fields differ between calls with the same inputs. Emission and cost
 * reductions are fixed figures, not computed.
 */
export const optimizeMix = (
  base: MixResult,
  strengthMPa: number,
  slumpMm: number,
  random: RandomSource = defaultRandom,
  ratios: Readonly<SubstitutionRatios> = DEFAULT_SUBSTITUTION
): OptimizedMixResult => {
  assertFinite({ strengthMPa, slumpMm });

  const cement = base.cement * (1 - ratios.scmReplacement);
  const scm = base.cement * ratios.scmReplacement;

  const coarseAggregate = base.coarseAggregate * (1 - ratios.coarseRecycledReplacement);
  const coarseRecycled = base.coarseAggregate * ratios.coarseRecycledReplacement;

  const fineAggregate = base.fineAggregate * (1 - ratios.fineRecycledReplacement);
  const fineRecycled = base.fineAggregate * ratios.fineRecycledReplacement;

  const water = base.water * ratios.waterAdjustment;

  return Object.freeze({
    cement,
    scm,
    water,
    fineAggregate,
    fineRecycled,
    coarseAggregate,
    coarseRecycled,
    waterCementRatio: water / (cement + scm),
    estimatedStrengthMPa: strengthMPa - uniform(random, 0, ratios.maxStrengthLossMPa),
    estimatedSlumpMm: slumpMm + uniform(random, -ratios.slumpVariationMm, ratios.slumpVariationMm),
    co2ReductionPercent: ratios.co2ReductionPercent,
    costReductionPercent: ratios.costReductionPercent,
  });
};
