import { describe, expect, it } from 'vitest';
import { DEFAULT_MATERIALS } from './constants';
import { InvalidMixInputError } from './errors';
import { computeVolumetricMix } from './volumetric';

const defaults = { strengthMPa: 30, waterCementRatio: 0.5, fineAggregateFraction: 0.4 };

describe('computeVolumetricMix', () => {
  it('holds cement at 400 kg and derives water from the w/c ratio', () => {
    const mix = computeVolumetricMix(defaults);
    expect(mix.cement).toBe(400);
    expect(mix.water).toBe(200);
    expect(mix.waterCementRatio).toBe(0.5);
  });

  it('splits the remaining volume between fine and coarse aggregate', () => {
    const mix = computeVolumetricMix(defaults);
    expect(mix.volumes.cement).toBeCloseTo(400 / 3150, 10);
    expect(mix.volumes.water).toBeCloseTo(0.2, 10);
    expect(mix.fineAggregate).toBeCloseTo(713.3968, 3);
    expect(mix.coarseAggregate).toBeCloseTo(1090.2857, 3);
  });

  it('fills exactly one cubic meter across the selectable ranges', () => {
    for (const waterCementRatio of [0.3, 0.4, 0.5, 0.6, 0.7]) {
      for (const fineAggregateFraction of [0.3, 0.4, 0.5, 0.6]) {
        const mix = computeVolumetricMix({ strengthMPa: 30, waterCementRatio, fineAggregateFraction });
        const { cement, water, fineAggregate, coarseAggregate } = mix.volumes;
        expect(cement + water + fineAggregate + coarseAggregate).toBeCloseTo(1, 12);
        for (const mass of [mix.cement, mix.water, mix.fineAggregate, mix.coarseAggregate]) {
          expect(mass).toBeGreaterThanOrEqual(0);
        }
      }
    }
  });

  it('does not use the strength', () => {
    const low = computeVolumetricMix({ ...defaults, strengthMPa: 20 });
    const high = computeVolumetricMix({ ...defaults, strengthMPa: 60 });
    expect(low.fineAggregate).toBe(high.fineAggregate);
    expect(low.coarseAggregate).toBe(high.coarseAggregate);
  });

  it('returns identical frozen results for identical inputs', () => {
    const first = computeVolumetricMix(defaults);
    const second = computeVolumetricMix(defaults);
    expect(second).toEqual(first);
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first.volumes)).toBe(true);
  });

  it('accepts other specific gravities and cement contents', () => {
    const mix = computeVolumetricMix(defaults, { ...DEFAULT_MATERIALS, fineAggregate: 2.5 }, 300);
    expect(mix.cement).toBe(300);
    expect(mix.water).toBe(150);
    const aggregateVolume = 1 - (300 / 3150 + 0.15);
    expect(mix.fineAggregate).toBeCloseTo(aggregateVolume * 0.4 * 2500, 6);
  });

  it('rejects non-finite inputs', () => {
    expect(() => computeVolumetricMix({ ...defaults, waterCementRatio: Number.NaN })).toThrow(InvalidMixInputError);
    expect(() => computeVolumetricMix({ ...defaults, strengthMPa: Number.POSITIVE_INFINITY })).toThrow(
      'Invalid mix input "strengthMPa": expected a finite number, got Infinity'
    );
  });
});
