import type { Sample } from '../types.mjs';

/** Source of uniform numbers in [0, 1) */
export type RandomSource = () => number;

/**
 * Synthesize `count` samples with every coordinate drawn independently from
 * `random`.
 */
export function generateSamples(count: number, random: RandomSource = Math.random): Sample[] {
  return Array.from({ length: count }, () => ({
    x: random(),
    y: random(),
    z: random(),
  }));
}
