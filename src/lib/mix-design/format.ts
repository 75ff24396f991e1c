import type { MixResult, MixResultKey, OptimizedMixResult, ResultRow } from '@/types';

export interface RowLabel {
  key: MixResultKey;
  label: string;
  unit: string;
  /** Decimal places, 1 when omitted. */
  digits?: number;
}

export const BASE_MIX_ROWS: readonly RowLabel[] = [
  { key: 'cement', label: 'Cement', unit: 'kg' },
  { key: 'water', label: 'Water', unit: 'kg' },
  { key: 'fineAggregate', label: 'Fine Aggregate', unit: 'kg' },
  { key: 'coarseAggregate', label: 'Coarse Aggregate', unit: 'kg' },
  { key: 'waterCementRatio', label: 'w/c ratio', unit: '', digits: 3 },
];

export const OPTIMIZED_MIX_ROWS: readonly RowLabel[] = [
  { key: 'cement', label: 'Cement', unit: 'kg' },
  { key: 'scm', label: 'SCMs', unit: 'kg' },
  { key: 'water', label: 'Water', unit: 'kg' },
  { key: 'fineAggregate', label: 'Fine Aggregate', unit: 'kg' },
  { key: 'fineRecycled', label: 'Fine Recycled Agg.', unit: 'kg' },
  { key: 'coarseAggregate', label: 'Coarse Aggregate', unit: 'kg' },
  { key: 'coarseRecycled', label: 'Coarse Recycled Agg.', unit: 'kg' },
  { key: 'waterCementRatio', label: 'w/c ratio', unit: '', digits: 3 },
  { key: 'estimatedStrengthMPa', label: 'New Strength', unit: 'MPa' },
  { key: 'estimatedSlumpMm', label: 'New Slump', unit: 'mm' },
  { key: 'co2ReductionPercent', label: 'CO2 Reduction', unit: '%' },
  { key: 'costReductionPercent', label: 'Cost Reduction', unit: '%' },
];

export const round1 = (value: number) => Math.round(value * 10) / 10;

export const formatQuantity = (value: number, digits = 1) => value.toFixed(digits);

const isOptimized = (result: MixResult | OptimizedMixResult): result is OptimizedMixResult =>
  'scm' in result;

const readField = (result: MixResult | OptimizedMixResult, key: MixResultKey): number | undefined => {
  switch (key) {
    case 'cement':
    case 'water':
    case 'fineAggregate':
    case 'coarseAggregate':
    case 'waterCementRatio':
      return result[key];
    default:
      return isOptimized(result) ? result[key] : undefined;
  }
};

/** Rows for the results table, skipping labels the result has no value for. */
export const toResultRows = (
  result: MixResult | OptimizedMixResult,
  labels: readonly RowLabel[] = BASE_MIX_ROWS
): ResultRow[] =>
  labels.flatMap(({ key, label, unit, digits }) => {
    const value = readField(result, key);
    return value === undefined ? [] : [{ key, label, unit, value: formatQuantity(value, digits) }];
  });
