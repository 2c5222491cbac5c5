// ---------------------------------------------------------------------------
// Monte-Carlo diffuse path tracing: every hit scatters once into a random
// direction around the normal and keeps a fixed fraction of the energy.
// ---------------------------------------------------------------------------

import type { Color, PRNG, Ray, Scene, TraceStats, Vector3 } from '../types.js';
import { vec3Add, vec3Lerp, vec3NearZero, vec3Normalize, vec3Scale } from '../math/vector.js';
import { randomUnitVector } from '../math/sampling.js';
import { sceneIntersect } from '../geometry/scene-intersect.js';
import { BLACK, guardRadiance, type Integrator } from './types.js';

export const PATH_MAX_DEPTH = 50;
/** Fraction of energy kept per bounce. */
export const DEFAULT_ATTENUATION = 0.5;
/** Minimum hit distance for scattered rays (avoids shadow acne). */
export const SCATTER_T_MIN = 1e-3;
export const SKY_HORIZON: Readonly<Color> = Object.freeze({ x: 1, y: 1, z: 1 });
export const SKY_ZENITH: Readonly<Color> = Object.freeze({ x: 0.5, y: 0.7, z: 1 });

export interface PathOptions {
  /** Bounces left for a primary ray. Default 50. */
  maxDepth?: number;
  attenuation?: number;
  tMin?: number;
  fallbackColor?: Readonly<Color>;
}

export interface PathContext {
  readonly scene: Scene;
  readonly attenuation: number;
  readonly tMin: number;
  readonly rng: PRNG;
  readonly stats: TraceStats;
}

/** Vertical gradient from white at the horizon to light blue overhead. */
export function skyColor(direction: Vector3): Color {
  const t = 0.5 * (direction.y + 1);
  return vec3Lerp(SKY_HORIZON, SKY_ZENITH, t);
}

/**
 * Lambertian scatter: normal plus a random unit vector. A sum that cancels
 * to (almost) zero falls back to the normal.
 */
export function scatterDirection(normal: Vector3, rng: PRNG): Vector3 {
  const candidate = vec3Add(normal, randomUnitVector(rng));
  if (vec3NearZero(candidate)) return normal;
  return vec3Normalize(candidate);
}

/** Radiance along `ray` with `depth` bounces remaining; 0 left means black. */
export function tracePath(ray: Ray, depth: number, ctx: PathContext): Color {
  if (depth <= 0) return { ...BLACK };

  const hit = sceneIntersect(ctx.scene, ray.origin, ray.direction, {
    tMin: ctx.tMin,
    tMax: Infinity,
  });
  if (!hit) return skyColor(ray.direction);

  const direction = scatterDirection(hit.normal, ctx.rng);
  ctx.stats.secondaryRays++;
  return vec3Scale(tracePath({ origin: hit.point, direction }, depth - 1, ctx), ctx.attenuation);
}

export function createPathIntegrator(scene: Scene, options: PathOptions = {}): Integrator {
  const maxDepth = options.maxDepth ?? PATH_MAX_DEPTH;
  const attenuation = options.attenuation ?? DEFAULT_ATTENUATION;
  const tMin = options.tMin ?? SCATTER_T_MIN;
  const fallback = options.fallbackColor ?? BLACK;

  return {
    kind: 'path',
    radiance(ray, rng, stats) {
      stats.primaryRays++;
      const ctx: PathContext = { scene, attenuation, tMin, rng, stats };
      return guardRadiance(tracePath(ray, maxDepth, ctx), fallback, stats);
    },
  };
}
