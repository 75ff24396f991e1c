export interface VolumetricMixInputs {
  strengthMPa: number;
  waterCementRatio: number;
  fineAggregateFraction: number;
}

export interface EmpiricalMixInputs {
  strengthMPa: number;
  slumpMm: number;
}

/** Specific gravities, relative to water. */
export interface MaterialConstants {
  cement: number;
  fineAggregate: number;
  coarseAggregate: number;
  water: number;
}

/** Masses in kg per m³ of concrete. */
export interface MixResult {
  cement: number;
  water: number;
  fineAggregate: number;
  coarseAggregate: number;
  waterCementRatio: number;
}

/** Absolute volumes in m³. */
export interface MixVolumes {
  cement: number;
  water: number;
  fineAggregate: number;
  coarseAggregate: number;
}

export interface VolumetricMixResult extends MixResult {
  volumes: MixVolumes;
}

export interface OptimizedMixResult extends MixResult {
  /** Supplementary cementitious material replacing part of the cement. */
  scm: number;
  fineRecycled: number;
  coarseRecycled: number;
  estimatedStrengthMPa: number;
  estimatedSlumpMm: number;
  co2ReductionPercent: number;
  costReductionPercent: number;
}

export interface EmpiricalCoefficients {
  baseCement: number;
  cementPerMPa: number;
  baseWater: number;
  waterPerSlumpUnit: number;
  baseFineAggregate: number;
  fineAggregatePerSlumpUnit: number;
  baseCoarseAggregate: number;
  coarseAggregatePerMPa: number;
  referenceStrengthMPa: number;
  referenceSlumpMm: number;
}

export interface SubstitutionRatios {
  /** Share of the base cement replaced by SCM. */
  scmReplacement: number;
  coarseRecycledReplacement: number;
  fineRecycledReplacement: number;
  waterAdjustment: number;
  maxStrengthLossMPa: number;
  slumpVariationMm: number;
  co2ReductionPercent: number;
  costReductionPercent: number;
}

export interface RandomSource {
  /** Returns a value in [0, 1). */
  next(): number;
}

export type MixResultKey = keyof OptimizedMixResult;

export interface ResultRow {
  key: MixResultKey;
  label: string;
  value: string;
  unit: string;
}

export type Page = 'home' | 'volumetric' | 'empirical';

export type Language = 'en' | 'ar';
