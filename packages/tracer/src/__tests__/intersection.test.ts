import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  buildScene,
  sceneIntersect,
  sphereIntersect,
  sphereRoots,
  vec3,
  vec3Length,
  vec3Normalize,
  DEFAULT_FAR_PLANE,
} from '../index.js';
import type { Scene, SphereSpec, Sphere } from '../index.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const MATTE = {
  albedo: { diffuse: 1, specular: 0, reflection: 0, refraction: 0 },
  diffuseColor: { x: 1, y: 1, z: 1 },
  specularExponent: 1,
};

function sceneOf(...spheres: Omit<SphereSpec, 'material'>[]): Scene {
  return buildScene({
    materials: { matte: MATTE },
    spheres: spheres.map((s) => ({ ...s, material: 'matte' })),
  });
}

function sphereAt(x: number, y: number, z: number, radius: number): Sphere {
  return sceneOf({ center: { x, y, z }, radius }).spheres[0]!;
}

const ORIGIN = vec3(0, 0, 0);
const FORWARD = vec3(0, 0, -1);

// ---------------------------------------------------------------------------
// sphereRoots / sphereIntersect
// ---------------------------------------------------------------------------

describe('sphereRoots', () => {
  it('returns roots symmetric about the closest approach for a ray through the center', () => {
    const roots = sphereRoots(sphereAt(0, 0, -5, 1), ORIGIN, FORWARD);
    expect(roots).toEqual({ near: 4, far: 6 });
  });

  it('returns a single tangent root when the miss distance equals the radius', () => {
    const roots = sphereRoots(sphereAt(1, 0, -5, 1), ORIGIN, FORWARD);
    expect(roots).not.toBeNull();
    expect(roots!.near).toBeCloseTo(5, 9);
    expect(roots!.far).toBeCloseTo(5, 9);
  });

  it('misses when the closest approach is outside the sphere', () => {
    expect(sphereRoots(sphereAt(2, 0, -5, 1), ORIGIN, FORWARD)).toBeNull();
  });

  it('keeps roots symmetric for any ray direction through the center', () => {
    fc.assert(
      fc.property(
        fc.double({ min: -1, max: 1, noNaN: true }),
        fc.double({ min: -1, max: 1, noNaN: true }),
        fc.double({ min: 0.5, max: 20, noNaN: true }),
        (dx, dy, radius) => {
          const direction = vec3Normalize(vec3(dx, dy, -1));
          const center = vec3(direction.x * 50, direction.y * 50, direction.z * 50);
          const roots = sphereRoots(sphereAt(center.x, center.y, center.z, radius), ORIGIN, direction);
          expect(roots).not.toBeNull();
          expect((roots!.near + roots!.far) / 2).toBeCloseTo(50, 6);
          expect(roots!.far - roots!.near).toBeCloseTo(2 * radius, 6);
        },
      ),
    );
  });
});

describe('sphereIntersect', () => {
  it('returns the near root when the sphere is ahead', () => {
    expect(sphereIntersect(sphereAt(0, 0, -5, 1), ORIGIN, FORWARD)).toBe(4);
  });

  it('returns the far root when the origin is inside the sphere', () => {
    expect(sphereIntersect(sphereAt(0, 0, 0, 1), ORIGIN, FORWARD)).toBe(1);
  });

  it('returns null when the sphere is entirely behind the ray', () => {
    expect(sphereIntersect(sphereAt(0, 0, 5, 1), ORIGIN, FORWARD)).toBeNull();
  });

  it('skips the near root when it is before tMin', () => {
    expect(sphereIntersect(sphereAt(0, 0, -5, 1), ORIGIN, FORWARD, 4.5)).toBe(6);
  });

  it('returns null when both roots are past tMax', () => {
    expect(sphereIntersect(sphereAt(0, 0, -5, 1), ORIGIN, FORWARD, 0, 3)).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// sceneIntersect
// ---------------------------------------------------------------------------

describe('sceneIntersect', () => {
  it('always misses in an empty scene', () => {
    const empty = sceneOf();
    fc.assert(
      fc.property(
        fc.double({ min: -1, max: 1, noNaN: true }),
        fc.double({ min: -1, max: 1, noNaN: true }),
        (dx, dy) => {
          expect(sceneIntersect(empty, ORIGIN, vec3Normalize(vec3(dx, dy, -1)))).toBeNull();
        },
      ),
    );
  });

  it('keeps the nearest of several hits', () => {
    const scene = sceneOf(
      { center: { x: 0, y: 0, z: -10 }, radius: 1 },
      { center: { x: 0, y: 0, z: -5 }, radius: 1 },
    );
    const hit = sceneIntersect(scene, ORIGIN, FORWARD);
    expect(hit).not.toBeNull();
    expect(hit!.sphereIndex).toBe(1);
    expect(hit!.distance).toBe(4);
    expect(hit!.point).toEqual({ x: 0, y: 0, z: -4 });
    expect(hit!.normal).toEqual({ x: 0, y: 0, z: 1 });
    expect(hit!.frontFace).toBe(true);
  });

  it('breaks exact ties in favor of the earlier sphere', () => {
    const scene = sceneOf(
      { center: { x: 0, y: 0, z: -5 }, radius: 1 },
      { center: { x: 0, y: 0, z: -5 }, radius: 1 },
    );
    expect(sceneIntersect(scene, ORIGIN, FORWARD)!.sphereIndex).toBe(0);
  });

  it('orients the normal against the ray for hits from inside', () => {
    const scene = sceneOf({ center: { x: 0, y: 0, z: 0 }, radius: 2 });
    const hit = sceneIntersect(scene, ORIGIN, FORWARD);
    expect(hit).not.toBeNull();
    expect(hit!.frontFace).toBe(false);
    expect(hit!.outwardNormal.z).toBe(-1);
    expect(hit!.normal.z).toBe(1);
    expect(vec3Length(hit!.normal)).toBe(1);
  });

  it('treats hits beyond the far plane as background', () => {
    const scene = sceneOf({ center: { x: 0, y: 0, z: -(DEFAULT_FAR_PLANE + 10) }, radius: 1 });
    expect(sceneIntersect(scene, ORIGIN, FORWARD)).toBeNull();
    expect(sceneIntersect(scene, ORIGIN, FORWARD, { tMax: Infinity })).not.toBeNull();
  });

  it('honours a configurable far plane', () => {
    const scene = sceneOf({ center: { x: 0, y: 0, z: -5 }, radius: 1 });
    expect(sceneIntersect(scene, ORIGIN, FORWARD, { tMax: 4 })).toBeNull();
    expect(sceneIntersect(scene, ORIGIN, FORWARD, { tMax: 4.5 })!.distance).toBe(4);
  });
});
