import type { RandomSource } from '@/types';
import { assertFinite } from './errors';

export const defaultRandom: RandomSource = {
  next: () => Math.random(),
};

/**
 * Deterministic mulberry32 source for tests and reproducible designs. The
 * seed is taken as an unsigned 32-bit integer.
 */
export const createSeededRandom = (seed: number): RandomSource => {
  assertFinite({ seed });
  let current = seed >>> 0;
  return {
    next: () => {
      current = (current + 0x6d2b79f5) >>> 0;
      let t = current;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
};

export const uniform = (random: RandomSource, min: number, max: number) =>
  min + (max - min) * random.next();
