import type { EmpiricalCoefficients, MaterialConstants, SubstitutionRatios } from '@/types';

export const DEFAULT_MATERIALS: Readonly<MaterialConstants> = Object.freeze({
  cement: 3.15,
  fineAggregate: 2.65,
  coarseAggregate: 2.7,
  water: 1.0,
});

// Starting value, kg/m³. Not derived from strength.
export const DEFAULT_CEMENT_CONTENT = 400;

// Rule-of-thumb regressions, kg/m³
export const DEFAULT_EMPIRICAL_COEFFICIENTS: Readonly<EmpiricalCoefficients> = Object.freeze({
  baseCement: 350,
  cementPerMPa: 5,
  baseWater: 180,
  waterPerSlumpUnit: 20,
  baseFineAggregate: 700,
  fineAggregatePerSlumpUnit: 50,
  baseCoarseAggregate: 1100,
  coarseAggregatePerMPa: 10,
  referenceStrengthMPa: 20,
  referenceSlumpMm: 150,
});

export const DEFAULT_SUBSTITUTION: Readonly<SubstitutionRatios> = Object.freeze({
  scmReplacement: 0.3,
  coarseRecycledReplacement: 0.2,
  fineRecycledReplacement: 0.15,
  waterAdjustment: 1.02,
  maxStrengthLossMPa: 2,
  slumpVariationMm: 10,
  co2ReductionPercent: 25,
  costReductionPercent: 15,
});

export const WATER_CEMENT_RATIO_RANGE = { min: 0.3, max: 0.7 } as const;
export const FINE_AGGREGATE_FRACTION_RANGE = { min: 0.3, max: 0.6 } as const;

// Selectable values of the empirical calculator
const STRENGTH_RANGE = { min: 20, max: 60, step: 5 } as const;
const SLUMP_RANGE = { min: 25, max: 150, step: 5 } as const;

const steps = ({ min, max, step }: { min: number; max: number; step: number }) =>
  Array.from({ length: Math.floor((max - min) / step) + 1 }, (_, i) => min + i * step);

export const STRENGTH_OPTIONS: readonly number[] = steps(STRENGTH_RANGE);
export const SLUMP_OPTIONS: readonly number[] = steps(SLUMP_RANGE);
