// ---------------------------------------------------------------------------
// Random direction sampling for Monte-Carlo scattering.
// ---------------------------------------------------------------------------

import type { PRNG, Vector3 } from '../types.js';
import { vec3LengthSq, vec3Scale } from './vector.js';

/** Uniform float in [min, max). */
export function randomRange(rng: PRNG, min: number, max: number): number {
  return min + (max - min) * rng();
}

/**
 * Uniform point strictly inside the unit ball, by rejection sampling from
 * the [-1, 1)^3 cube. The origin itself is rejected so the result can
 * always be normalized.
 */
export function randomInUnitSphere(rng: PRNG): Vector3 {
  for (;;) {
    const p = {
      x: randomRange(rng, -1, 1),
      y: randomRange(rng, -1, 1),
      z: randomRange(rng, -1, 1),
    };
    const lenSq = vec3LengthSq(p);
    if (lenSq > 0 && lenSq < 1) return p;
  }
}

/** Uniform direction on the unit sphere. */
export function randomUnitVector(rng: PRNG): Vector3 {
  const p = randomInUnitSphere(rng);
  return vec3Scale(p, 1 / Math.sqrt(vec3LengthSq(p)));
}
