// ---------------------------------------------------------------------------
// Scene-wide nearest-hit query (linear scan, no acceleration structure).
// ---------------------------------------------------------------------------

import type { HitRecord, Scene, Vector3 } from '../types.js';
import { vec3Add, vec3Dot, vec3Negate, vec3Scale, vec3Sub } from '../math/vector.js';
import { sphereIntersect } from './sphere.js';

/** Far-plane cutoff used by the Whitted tracer: hits at or beyond it are background. */
export const DEFAULT_FAR_PLANE = 1000;

export interface IntersectOptions {
  /** Smallest accepted ray parameter. Default 0. */
  tMin?: number;
  /** Far-plane cutoff; hits at or beyond it count as misses. Default {@link DEFAULT_FAR_PLANE}. */
  tMax?: number;
}

/**
 * Find the closest sphere hit along a ray.
 *
 * Ties at exactly equal distance keep the earlier sphere. Returns null for
 * an empty scene, a miss, or a nearest hit at/after the far plane.
 */
export function sceneIntersect(
  scene: Scene,
  origin: Vector3,
  direction: Vector3,
  options: IntersectOptions = {},
): HitRecord | null {
  const tMin = options.tMin ?? 0;
  const tMax = options.tMax ?? DEFAULT_FAR_PLANE;

  let nearest = Infinity;
  let nearestIndex = -1;
  for (let i = 0; i < scene.spheres.length; i++) {
    const t = sphereIntersect(scene.spheres[i]!, origin, direction, tMin, Infinity);
    if (t !== null && t < nearest) {
      nearest = t;
      nearestIndex = i;
    }
  }

  if (nearestIndex < 0 || !(nearest < tMax)) return null;

  const sphere = scene.spheres[nearestIndex]!;
  const point = vec3Add(origin, vec3Scale(direction, nearest));
  const outwardNormal = vec3Scale(vec3Sub(point, sphere.center), 1 / sphere.radius);
  const frontFace = vec3Dot(direction, outwardNormal) < 0;

  return {
    distance: nearest,
    point,
    normal: frontFace ? outwardNormal : vec3Negate(outwardNormal),
    outwardNormal,
    frontFace,
    material: sphere.material,
    sphereIndex: nearestIndex,
  };
}
