// ---------------------------------------------------------------------------
// Whitted-style recursive ray tracing: local Phong shading with hard
// shadows, plus recursive mirror reflection and refraction.
// ---------------------------------------------------------------------------

import type { TirPolicy } from '@prism/config';
import type { Color, HitRecord, Ray, Scene, TraceStats, Vector3 } from '../types.js';
import {
  resolveRefraction,
  vec3Add,
  vec3Dot,
  vec3Length,
  vec3Normalize,
  vec3Reflect,
  vec3Refract,
  vec3Scale,
  vec3Sub,
} from '../math/vector.js';
import { DEFAULT_FAR_PLANE, sceneIntersect } from '../geometry/scene-intersect.js';
import { BLACK, guardRadiance, type Integrator } from './types.js';

export const WHITTED_MAX_DEPTH = 4;
export const SURFACE_EPSILON = 1e-3;
export const DEFAULT_BACKGROUND: Readonly<Color> = Object.freeze({ x: 0.2, y: 0.7, z: 0.8 });

export interface WhittedOptions {
  /** Deepest recursion level still shaded. Default 4. */
  maxDepth?: number;
  background?: Readonly<Color>;
  farPlane?: number;
  epsilon?: number;
  tirPolicy?: TirPolicy;
  /** Returned in place of a non-finite result. Default black. */
  fallbackColor?: Readonly<Color>;
}

export interface WhittedContext {
  readonly scene: Scene;
  readonly maxDepth: number;
  readonly background: Readonly<Color>;
  readonly farPlane: number;
  readonly epsilon: number;
  readonly tirPolicy: TirPolicy;
  readonly stats: TraceStats;
}

/**
 * Nudge `point` off the surface along the normal, to the side `direction`
 * leaves towards, so a secondary ray does not re-hit its own surface.
 */
export function offsetOrigin(
  point: Vector3,
  direction: Vector3,
  normal: Vector3,
  epsilon: number,
): Vector3 {
  const offset = vec3Scale(normal, epsilon);
  return vec3Dot(direction, normal) < 0 ? vec3Sub(point, offset) : vec3Add(point, offset);
}

/** Summed diffuse and specular light intensity at a hit. */
export interface LocalShading {
  diffuse: number;
  specular: number;
}

/**
 * Accumulate diffuse (Lambert) and specular (Phong) intensity over every
 * light that is not occluded. One boolean shadow test per light.
 */
export function shadeLocal(hit: HitRecord, direction: Vector3, ctx: WhittedContext): LocalShading {
  const n = hit.outwardNormal;
  const shading: LocalShading = { diffuse: 0, specular: 0 };

  for (const light of ctx.scene.lights) {
    const toLight = vec3Sub(light.position, hit.point);
    const lightDistance = vec3Length(toLight);
    if (lightDistance === 0) continue;
    const lightDir = vec3Scale(toLight, 1 / lightDistance);

    const shadowOrigin = offsetOrigin(hit.point, lightDir, n, ctx.epsilon);
    ctx.stats.shadowRays++;
    const occluder = sceneIntersect(ctx.scene, shadowOrigin, lightDir, { tMax: ctx.farPlane });
    if (occluder && occluder.distance < lightDistance) continue;

    shading.diffuse += Math.max(0, vec3Dot(lightDir, n)) * light.intensity;
    shading.specular +=
      Math.pow(Math.max(0, vec3Dot(vec3Reflect(lightDir, n), direction)), hit.material.specularExponent) *
      light.intensity;
  }

  return shading;
}

/**
 * Color seen along `ray`. `depth` counts bounces so far; past `maxDepth`
 * (or on a miss) the background is returned.
 */
export function traceWhitted(ray: Ray, depth: number, ctx: WhittedContext): Color {
  if (depth > ctx.maxDepth) return { ...ctx.background };

  const hit = sceneIntersect(ctx.scene, ray.origin, ray.direction, { tMax: ctx.farPlane });
  if (!hit) return { ...ctx.background };

  const { albedo } = hit.material;
  const n = hit.outwardNormal;

  let reflectColor: Color = { ...BLACK };
  if (albedo.reflection !== 0) {
    const direction = vec3Normalize(vec3Reflect(ray.direction, n));
    ctx.stats.secondaryRays++;
    reflectColor = traceWhitted(
      { origin: offsetOrigin(hit.point, direction, n, ctx.epsilon), direction },
      depth + 1,
      ctx,
    );
  }

  let refractColor: Color = { ...BLACK };
  if (albedo.refraction !== 0) {
    const refraction = vec3Refract(ray.direction, n, hit.material.refractiveIndex, 1);
    const direction = vec3Normalize(resolveRefraction(refraction, ray.direction, n, ctx.tirPolicy));
    ctx.stats.secondaryRays++;
    refractColor = traceWhitted(
      { origin: offsetOrigin(hit.point, direction, n, ctx.epsilon), direction },
      depth + 1,
      ctx,
    );
  }

  const { diffuse, specular } = shadeLocal(hit, ray.direction, ctx);

  const diffuseTerm = vec3Scale(hit.material.diffuseColor, diffuse * albedo.diffuse);
  const specularTerm = specular * albedo.specular;
  return vec3Add(
    vec3Add(diffuseTerm, { x: specularTerm, y: specularTerm, z: specularTerm }),
    vec3Add(vec3Scale(reflectColor, albedo.reflection), vec3Scale(refractColor, albedo.refraction)),
  );
}

/** Deterministic integrator: ignores the random stream. */
export function createWhittedIntegrator(scene: Scene, options: WhittedOptions = {}): Integrator {
  const maxDepth = options.maxDepth ?? WHITTED_MAX_DEPTH;
  const background = options.background ?? DEFAULT_BACKGROUND;
  const farPlane = options.farPlane ?? DEFAULT_FAR_PLANE;
  const epsilon = options.epsilon ?? SURFACE_EPSILON;
  const tirPolicy = options.tirPolicy ?? 'legacy-sentinel';
  const fallback = options.fallbackColor ?? BLACK;

  return {
    kind: 'whitted',
    radiance(ray, _rng, stats) {
      stats.primaryRays++;
      const ctx: WhittedContext = { scene, maxDepth, background, farPlane, epsilon, tirPolicy, stats };
      return guardRadiance(traceWhitted(ray, 0, ctx), fallback, stats);
    },
  };
}
