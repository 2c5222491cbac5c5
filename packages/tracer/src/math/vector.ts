// ---------------------------------------------------------------------------
// Vector3 operations. Pure; every call allocates its result.
// ---------------------------------------------------------------------------

import type { TirPolicy } from '@prism/config';
import type { Vector3 } from '../types.js';
import { DegenerateVectorError } from '../errors.js';

/** Construct a Vector3. */
export function vec3(x: number, y: number, z: number): Vector3 {
  return { x, y, z };
}

/** Element-wise addition of two Vector3. */
export function vec3Add(a: Vector3, b: Vector3): Vector3 {
  return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
}

/** Element-wise subtraction of two Vector3. */
export function vec3Sub(a: Vector3, b: Vector3): Vector3 {
  return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
}

/** Scalar multiplication of a Vector3. */
export function vec3Scale(v: Vector3, s: number): Vector3 {
  return { x: v.x * s, y: v.y * s, z: v.z * s };
}

/** Element-wise (Hadamard) product, used for color modulation. */
export function vec3Mul(a: Vector3, b: Vector3): Vector3 {
  return { x: a.x * b.x, y: a.y * b.y, z: a.z * b.z };
}

/** Dot product of two Vector3. */
export function vec3Dot(a: Vector3, b: Vector3): number {
  return a.x * b.x + a.y * b.y + a.z * b.z;
}

export function vec3LengthSq(v: Vector3): number {
  return v.x * v.x + v.y * v.y + v.z * v.z;
}

/** Euclidean length of a Vector3. */
export function vec3Length(v: Vector3): number {
  return Math.sqrt(vec3LengthSq(v));
}

/**
 * Normalize a Vector3 to unit length.
 *
 * @throws DegenerateVectorError when the length is zero or not finite.
 */
export function vec3Normalize(v: Vector3): Vector3 {
  const len = vec3Length(v);
  if (len === 0 || !Number.isFinite(len)) throw new DegenerateVectorError(v);
  return { x: v.x / len, y: v.y / len, z: v.z / len };
}

export function vec3Negate(v: Vector3): Vector3 {
  return { x: -v.x, y: -v.y, z: -v.z };
}

/** `a + (b - a) * t`. */
export function vec3Lerp(a: Vector3, b: Vector3, t: number): Vector3 {
  return {
    x: a.x + (b.x - a.x) * t,
    y: a.y + (b.y - a.y) * t,
    z: a.z + (b.z - a.z) * t,
  };
}

export function vec3MaxComponent(v: Vector3): number {
  return Math.max(v.x, v.y, v.z);
}

export function vec3IsFinite(v: Vector3): boolean {
  return Number.isFinite(v.x) && Number.isFinite(v.y) && Number.isFinite(v.z);
}

/** True when every component is within `eps` of zero. */
export function vec3NearZero(v: Vector3, eps = 1e-8): boolean {
  return Math.abs(v.x) < eps && Math.abs(v.y) < eps && Math.abs(v.z) < eps;
}

export function clamp(value: number, min: number, max: number): number {
  return value < min ? min : value > max ? max : value;
}

// ---------------------------------------------------------------------------
// Reflection & refraction
// ---------------------------------------------------------------------------

/** Mirror `incident` about `normal`: I - 2(I·N)N. */
export function vec3Reflect(incident: Vector3, normal: Vector3): Vector3 {
  return vec3Sub(incident, vec3Scale(normal, 2 * vec3Dot(incident, normal)));
}

export type Refraction =
  | { readonly kind: 'transmitted'; readonly direction: Vector3 }
  | { readonly kind: 'total-internal-reflection' };

/**
 * Snell's law refraction of a unit `incident` direction through a surface
 * with unit `normal`.
 *
 * `normal` may point either way. When the ray leaves the medium (it travels
 * along the normal) the normal is flipped and the two indices swapped.
 *
 * @param etaT Index of refraction of the medium the normal points out of.
 * @param etaI Index of refraction of the medium on the normal's side.
 */
export function vec3Refract(
  incident: Vector3,
  normal: Vector3,
  etaT: number,
  etaI = 1,
): Refraction {
  const cosi = -clamp(vec3Dot(incident, normal), -1, 1);
  if (cosi < 0) return vec3Refract(incident, vec3Negate(normal), etaI, etaT);

  const eta = etaI / etaT;
  const k = 1 - eta * eta * (1 - cosi * cosi);
  if (k < 0) return { kind: 'total-internal-reflection' };

  return {
    kind: 'transmitted',
    direction: vec3Add(vec3Scale(incident, eta), vec3Scale(normal, eta * cosi - Math.sqrt(k))),
  };
}

/** Direction the historical renderer emitted on total internal reflection. */
export const TIR_SENTINEL_DIRECTION: Readonly<Vector3> = Object.freeze({ x: 1, y: 0, z: 0 });

/**
 * Turn a refraction result into a ray direction.
 *
 * - `legacy-sentinel`: total internal reflection yields the fixed
 *   (1, 0, 0) direction, so the transmitted contribution samples whatever
 *   lies along +X. Output matches renders made before the policy existed.
 * - `reflect`: total internal reflection yields the mirror direction, so
 *   the refraction weight behaves as extra reflection.
 */
export function resolveRefraction(
  refraction: Refraction,
  incident: Vector3,
  normal: Vector3,
  policy: TirPolicy,
): Vector3 {
  if (refraction.kind === 'transmitted') return refraction.direction;
  if (policy === 'reflect') return vec3Reflect(incident, normal);
  return { ...TIR_SENTINEL_DIRECTION };
}
