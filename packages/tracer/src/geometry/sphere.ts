// ---------------------------------------------------------------------------
// Ray–sphere intersection by geometric projection.
// ---------------------------------------------------------------------------

import type { Sphere, Vector3 } from '../types.js';
import { vec3Dot, vec3Sub } from '../math/vector.js';

/**
 * Both ray parameters where a ray's line meets a sphere, or null on a miss.
 * `near <= far`; they coincide for a tangent ray.
 *
 *   L   = C - O
 *   tca = L·D          (distance to closest approach)
 *   d²  = L·L - tca²   (squared miss distance)
 *   thc = sqrt(r² - d²)
 *
 * `direction` must be unit length.
 */
export function sphereRoots(
  sphere: Sphere,
  origin: Vector3,
  direction: Vector3,
): { near: number; far: number } | null {
  const l = vec3Sub(sphere.center, origin);
  const tca = vec3Dot(l, direction);
  const d2 = vec3Dot(l, l) - tca * tca;
  const r2 = sphere.radius * sphere.radius;
  if (d2 > r2) return null;

  const thc = Math.sqrt(r2 - d2);
  return { near: tca - thc, far: tca + thc };
}

/**
 * Nearest ray parameter in `[tMin, tMax]` where the ray hits the sphere.
 *
 * When the near root falls before `tMin` (for the default range, the origin
 * is inside the sphere) the far root is tried instead.
 */
export function sphereIntersect(
  sphere: Sphere,
  origin: Vector3,
  direction: Vector3,
  tMin = 0,
  tMax = Infinity,
): number | null {
  const roots = sphereRoots(sphere, origin, direction);
  if (!roots) return null;
  if (roots.near >= tMin && roots.near <= tMax) return roots.near;
  if (roots.far >= tMin && roots.far <= tMax) return roots.far;
  return null;
}
