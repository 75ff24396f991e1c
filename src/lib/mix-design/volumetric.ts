import type { MaterialConstants, VolumetricMixInputs, VolumetricMixResult } from '@/types';
import { DEFAULT_CEMENT_CONTENT, DEFAULT_MATERIALS } from './constants';
import { assertFinite } from './errors';

// kg/m³ of water
const WATER_DENSITY = 1000;

const toVolume = (mass: number, specificGravity: number) => mass / (specificGravity * WATER_DENSITY);
const toMass = (volume: number, specificGravity: number) => volume * specificGravity * WATER_DENSITY;

/**
 * Absolute-volume mix design for 1 m³ of concrete. Cement is held at
 * `cementContent`, water follows from the w/c ratio, and whatever volume is
 * left is split between fine and coarse aggregate.
 *
 * Ranges are not checked here; callers clamp w/c to 0.3–0.7 and the fine
 * fraction to 0.3–0.6.
 */
export const computeVolumetricMix = (
  inputs: VolumetricMixInputs,
  materials: Readonly<MaterialConstants> = DEFAULT_MATERIALS,
  cementContent = DEFAULT_CEMENT_CONTENT
): VolumetricMixResult => {
  const { strengthMPa, waterCementRatio, fineAggregateFraction } = inputs;
  assertFinite({ strengthMPa, waterCementRatio, fineAggregateFraction, cementContent });

  const cement = cementContent;
  const water = cement * waterCementRatio;

  const cementVolume = toVolume(cement, materials.cement);
  const waterVolume = toVolume(water, materials.water);
  const aggregateVolume = 1 - (cementVolume + waterVolume);

  const fineVolume = aggregateVolume * fineAggregateFraction;
  const coarseVolume = aggregateVolume * (1 - fineAggregateFraction);

  return Object.freeze({
    cement,
    water,
    fineAggregate: toMass(fineVolume, materials.fineAggregate),
    coarseAggregate: toMass(coarseVolume, materials.coarseAggregate),
    waterCementRatio,
    volumes: Object.freeze({
      cement: cementVolume,
      water: waterVolume,
      fineAggregate: fineVolume,
      coarseAggregate: coarseVolume,
    }),
  });
};
