import type { RenderMode } from '@prism/config';
import type { Color, PRNG, Ray, TraceStats } from '../types.js';
import { vec3IsFinite } from '../math/vector.js';

/**
 * Light-transport strategy. `radiance` is the boundary between tracing and
 * the frame: whatever happens inside, it returns a finite color.
 */
export interface Integrator {
  readonly kind: RenderMode;
  radiance(ray: Ray, rng: PRNG, stats: TraceStats): Color;
}

export const BLACK: Readonly<Color> = Object.freeze({ x: 0, y: 0, z: 0 });

/** Replace a color with a non-finite channel by `fallback`, counting it. */
export function guardRadiance(color: Color, fallback: Readonly<Color>, stats: TraceStats): Color {
  if (vec3IsFinite(color)) return color;
  stats.nonFiniteSamples++;
  return { ...fallback };
}
