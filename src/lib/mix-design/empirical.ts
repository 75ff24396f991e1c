import type { EmpiricalCoefficients, MixResult } from '@/types';
import { DEFAULT_EMPIRICAL_COEFFICIENTS } from './constants';
import { assertFinite } from './errors';

// Simplified rule-of-thumb mix, kg per m³
export const computeEmpiricalMix = (
  strengthMPa: number,
  slumpMm: number,
  coefficients: Readonly<EmpiricalCoefficients> = DEFAULT_EMPIRICAL_COEFFICIENTS
): MixResult => {
  assertFinite({ strengthMPa, slumpMm });
  const c = coefficients;

  const strengthDelta = strengthMPa - c.referenceStrengthMPa;
  const slumpFactor = slumpMm / c.referenceSlumpMm;

  const cement = c.baseCement + strengthDelta * c.cementPerMPa;
  const water = c.baseWater + slumpFactor * c.waterPerSlumpUnit;
  const fineAggregate = c.baseFineAggregate - slumpFactor * c.fineAggregatePerSlumpUnit;
  const coarseAggregate = c.baseCoarseAggregate - strengthDelta * c.coarseAggregatePerMPa;

  return Object.freeze({
    cement,
    water,
    fineAggregate,
    coarseAggregate,
    waterCementRatio: water / cement,
  });
};
