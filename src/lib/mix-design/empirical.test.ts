import { describe, expect, it } from 'vitest';
import { DEFAULT_EMPIRICAL_COEFFICIENTS, SLUMP_OPTIONS, STRENGTH_OPTIONS } from './constants';
import { computeEmpiricalMix } from './empirical';
import { InvalidMixInputError } from './errors';

describe('computeEmpiricalMix', () => {
  it('computes the mix for 30 MPa and 75 mm slump', () => {
    const mix = computeEmpiricalMix(30, 75);
    expect(mix.cement).toBe(400);
    expect(mix.water).toBe(190);
    expect(mix.fineAggregate).toBe(675);
    expect(mix.coarseAggregate).toBe(1000);
    expect(mix.waterCementRatio).toBeCloseTo(0.475, 10);
  });

  it('stays non-negative at the ends of the selectable ranges', () => {
    expect(computeEmpiricalMix(20, 25)).toEqual({
      cement: 350,
      water: 180 + (25 / 150) * 20,
      fineAggregate: 700 - (25 / 150) * 50,
      coarseAggregate: 1100,
      waterCementRatio: (180 + (25 / 150) * 20) / 350,
    });

    const high = computeEmpiricalMix(60, 150);
    expect(high.cement).toBe(550);
    expect(high.water).toBe(200);
    expect(high.fineAggregate).toBe(650);
    expect(high.coarseAggregate).toBe(700);
  });

  it('never produces negative masses for any selectable pair', () => {
    for (const strength of STRENGTH_OPTIONS) {
      for (const slump of SLUMP_OPTIONS) {
        const mix = computeEmpiricalMix(strength, slump);
        expect(Math.min(mix.cement, mix.water, mix.fineAggregate, mix.coarseAggregate)).toBeGreaterThan(0);
      }
    }
  });

  it('is deterministic', () => {
    expect(computeEmpiricalMix(45, 100)).toEqual(computeEmpiricalMix(45, 100));
  });

  it('uses injected coefficients', () => {
    const mix = computeEmpiricalMix(30, 75, { ...DEFAULT_EMPIRICAL_COEFFICIENTS, baseCement: 300 });
    expect(mix.cement).toBe(350);
    expect(mix.waterCementRatio).toBeCloseTo(190 / 350, 10);
  });

  it('rejects a non-finite slump', () => {
    expect(() => computeEmpiricalMix(30, Number.NaN)).toThrow(InvalidMixInputError);
  });
});
