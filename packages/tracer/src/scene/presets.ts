// ---------------------------------------------------------------------------
// Built-in scene descriptions.
// ---------------------------------------------------------------------------

import type { MaterialSpec, SceneDescription } from './schema.js';

export const IVORY: MaterialSpec = {
  albedo: { diffuse: 0.6, specular: 0.3, reflection: 0.1, refraction: 0 },
  diffuseColor: { x: 0.4, y: 0.4, z: 0.3 },
  specularExponent: 50,
  refractiveIndex: 1,
};

export const GLASS: MaterialSpec = {
  albedo: { diffuse: 0, specular: 0.5, reflection: 0.1, refraction: 0.8 },
  diffuseColor: { x: 0.6, y: 0.7, z: 0.8 },
  specularExponent: 125,
  refractiveIndex: 1.5,
};

export const RUBBER: MaterialSpec = {
  albedo: { diffuse: 0.9, specular: 0.1, reflection: 0, refraction: 0 },
  diffuseColor: { x: 0.3, y: 0.1, z: 0.1 },
  specularExponent: 10,
  refractiveIndex: 1,
};

export const MIRROR: MaterialSpec = {
  albedo: { diffuse: 0, specular: 10, reflection: 0.8, refraction: 0 },
  diffuseColor: { x: 1, y: 1, z: 1 },
  specularExponent: 1425,
  refractiveIndex: 1,
};

/**
 * Four spheres under three lights, viewed from the origin down -Z.
 * Sphere 0 is the one the bobbing animation moves.
 */
export const CLASSIC_SCENE: SceneDescription = {
  materials: { ivory: IVORY, glass: GLASS, rubber: RUBBER, mirror: MIRROR },
  spheres: [
    { name: 'ivory', center: { x: -3, y: 0, z: -16 }, radius: 2, material: 'ivory' },
    { name: 'small-mirror', center: { x: -1, y: -1.5, z: -12 }, radius: 2, material: 'mirror' },
    { name: 'rubber', center: { x: 1.5, y: -0.5, z: -18 }, radius: 3, material: 'rubber' },
    { name: 'large-mirror', center: { x: 7, y: 5, z: -18 }, radius: 4, material: 'mirror' },
  ],
  lights: [
    { position: { x: -20, y: 20, z: 20 }, intensity: 1.5 },
    { position: { x: 30, y: 50, z: -25 }, intensity: 1.8 },
    { position: { x: 30, y: 20, z: 30 }, intensity: 1.7 },
  ],
};

/**
 * A small sphere resting on a huge "ground" sphere, for the path tracer.
 * Lights and materials are ignored by diffuse path tracing; the matte
 * material only satisfies the scene model.
 */
export const TWO_SPHERE_SCENE: SceneDescription = {
  materials: {
    matte: {
      albedo: { diffuse: 1, specular: 0, reflection: 0, refraction: 0 },
      diffuseColor: { x: 0.5, y: 0.5, z: 0.5 },
      specularExponent: 1,
    },
  },
  spheres: [
    { name: 'subject', center: { x: 0, y: 0, z: -1 }, radius: 0.5, material: 'matte' },
    { name: 'ground', center: { x: 0, y: -100.5, z: -1 }, radius: 100, material: 'matte' },
  ],
  lights: [],
};
