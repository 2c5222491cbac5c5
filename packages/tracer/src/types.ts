// ---------------------------------------------------------------------------
// @prism/tracer: Core Types
// ---------------------------------------------------------------------------

// ---------------------------------------------------------------------------
// PRNG (mulberry32)
// ---------------------------------------------------------------------------

/** Seedable PRNG function returning floats in [0, 1). */
export type PRNG = () => number;

/** Create a seedable PRNG using the mulberry32 algorithm. */
export function createPRNG(seed: number): PRNG {
  return () => {
    seed |= 0;
    seed = (seed + 0x6d2b79f5) | 0;
    let t = Math.imul(seed ^ (seed >>> 15), 1 | seed);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Derive an independent 32-bit seed for one image row so rows can be traced
 * in any order (or any partition) and still reproduce the same pixels.
 */
export function rowSeed(seed: number, row: number): number {
  let h = Math.imul(seed ^ 0x9e3779b9, 0x85ebca6b);
  h ^= Math.imul(row + 1, 0xc2b2ae35);
  h ^= h >>> 16;
  h = Math.imul(h, 0x7feb352d);
  h ^= h >>> 15;
  return h | 0;
}

// ---------------------------------------------------------------------------
// Geometry
// ---------------------------------------------------------------------------

/** 3D vector. */
export interface Vector3 {
  x: number;
  y: number;
  z: number;
}

/** Linear RGB color; x = red, y = green, z = blue. */
export type Color = Vector3;

/** Half-line with a unit-length direction. */
export interface Ray {
  readonly origin: Vector3;
  readonly direction: Vector3;
}

// ---------------------------------------------------------------------------
// Scene model
// ---------------------------------------------------------------------------

/**
 * Blend weights of a surface's color contributions. They are not normalized:
 * a polished mirror may carry a specular weight well above 1.
 */
export interface Albedo {
  readonly diffuse: number;
  readonly specular: number;
  readonly reflection: number;
  readonly refraction: number;
}

/** Immutable surface description, shared by reference between spheres. */
export interface Material {
  readonly name: string;
  readonly albedo: Albedo;
  readonly diffuseColor: Readonly<Vector3>;
  /** Phong exponent, > 0. */
  readonly specularExponent: number;
  /** Index of refraction relative to vacuum, >= 1. */
  readonly refractiveIndex: number;
}

/**
 * A sphere in the scene. The center is the only mutable scene state: an
 * animation driver may move it between frames, never during one.
 */
export interface Sphere {
  readonly name?: string;
  center: Vector3;
  readonly radius: number;
  readonly material: Material;
}

/** Point light. */
export interface Light {
  readonly position: Readonly<Vector3>;
  readonly intensity: number;
}

export interface Scene {
  readonly spheres: readonly Sphere[];
  readonly lights: readonly Light[];
  readonly materials: ReadonlyMap<string, Material>;
}

/** Result of a nearest-hit query. */
export interface HitRecord {
  /** Ray parameter of the hit. */
  readonly distance: number;
  readonly point: Vector3;
  /** Unit normal facing the incoming ray. */
  readonly normal: Vector3;
  /** Unit normal pointing out of the sphere. */
  readonly outwardNormal: Vector3;
  /** True when the ray arrives from outside the sphere. */
  readonly frontFace: boolean;
  readonly material: Material;
  readonly sphereIndex: number;
}

// ---------------------------------------------------------------------------
// Frame output
// ---------------------------------------------------------------------------

/** Row-major RGBA8 image. */
export interface PixelBuffer {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;
}

/** Ray and fallback counters collected while tracing a frame. */
export interface TraceStats {
  primaryRays: number;
  /** Reflection, refraction and scatter rays. */
  secondaryRays: number;
  shadowRays: number;
  /** Samples whose radiance was non-finite and got replaced. */
  nonFiniteSamples: number;
}

export function createTraceStats(): TraceStats {
  return { primaryRays: 0, secondaryRays: 0, shadowRays: 0, nonFiniteSamples: 0 };
}
