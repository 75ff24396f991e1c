import { z } from 'zod';
import {
  FINE_AGGREGATE_FRACTION_RANGE,
  SLUMP_OPTIONS,
  STRENGTH_OPTIONS,
  WATER_CEMENT_RATIO_RANGE,
} from './constants';

const oneOf = (options: readonly number[], message: string) =>
  z.coerce.number().refine((value) => options.includes(value), message);

export const volumetricInputSchema = z.object({
  strengthMPa: z.coerce.number().positive('Must be positive'),
  waterCementRatio: z.coerce
    .number()
    .min(WATER_CEMENT_RATIO_RANGE.min, `Must be at least ${WATER_CEMENT_RATIO_RANGE.min}`)
    .max(WATER_CEMENT_RATIO_RANGE.max, `Must be at most ${WATER_CEMENT_RATIO_RANGE.max}`),
  fineAggregateFraction: z.coerce
    .number()
    .min(FINE_AGGREGATE_FRACTION_RANGE.min, `Must be at least ${FINE_AGGREGATE_FRACTION_RANGE.min}`)
    .max(FINE_AGGREGATE_FRACTION_RANGE.max, `Must be at most ${FINE_AGGREGATE_FRACTION_RANGE.max}`),
});

export const MAX_SEED = 2 ** 32 - 1;

const SEED_MESSAGE = `Seed must be a whole number from 0 to ${MAX_SEED}`;

// Blank means a fresh draw
export const seedSchema = z.preprocess(
  (value) => (value === '' || value === null ? undefined : value),
  z.coerce.number().int(SEED_MESSAGE).nonnegative(SEED_MESSAGE).max(MAX_SEED, SEED_MESSAGE).optional()
);

export const empiricalMixSchema = z.object({
  strengthMPa: oneOf(STRENGTH_OPTIONS, 'Select a strength between 20 and 60 MPa'),
  slumpMm: oneOf(SLUMP_OPTIONS, 'Select a slump between 25 and 150 mm'),
});

export const empiricalInputSchema = empiricalMixSchema.extend({
  seed: seedSchema,
});

export type VolumetricFormValues = z.infer<typeof volumetricInputSchema>;
export type EmpiricalFormValues = z.infer<typeof empiricalInputSchema>;

export const VOLUMETRIC_DEFAULTS: VolumetricFormValues = {
  strengthMPa: 30,
  waterCementRatio: 0.5,
  fineAggregateFraction: 0.4,
};

export const EMPIRICAL_DEFAULTS: EmpiricalFormValues = {
  strengthMPa: 20,
  slumpMm: 25,
};

export const clamp = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value));
