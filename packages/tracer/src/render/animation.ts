// ---------------------------------------------------------------------------
// Scene animation drivers. They run between frames, never during one.
// ---------------------------------------------------------------------------

import type { Scene, Sphere } from '../types.js';

export interface SceneAnimation {
  /** Move scene objects to their pose at `timeMs`. */
  apply(scene: Scene, timeMs: number): void;
}

export interface BobbingOptions {
  /** Index of the sphere to move. Default 0. */
  sphereIndex?: number;
  /** Peak vertical offset in world units. Default 1. */
  amplitude?: number;
  /** Milliseconds per radian of the sine. Default 1000. */
  periodMs?: number;
}

/**
 * Bob one sphere vertically: `y = baseY + amplitude * sin(t / periodMs)`.
 * The base height is the sphere's Y when the animation first touches it.
 */
export function createBobbingAnimation(options: BobbingOptions = {}): SceneAnimation {
  const sphereIndex = options.sphereIndex ?? 0;
  const amplitude = options.amplitude ?? 1;
  const periodMs = options.periodMs ?? 1000;
  const baseY = new WeakMap<Sphere, number>();

  return {
    apply(scene, timeMs) {
      const sphere = scene.spheres[sphereIndex];
      if (!sphere) {
        throw new RangeError(
          `Bobbing animation targets sphere ${sphereIndex}, scene has ${scene.spheres.length}`,
        );
      }
      let base = baseY.get(sphere);
      if (base === undefined) {
        base = sphere.center.y;
        baseY.set(sphere, base);
      }
      sphere.center = { ...sphere.center, y: base + amplitude * Math.sin(timeMs / periodMs) };
    },
  };
}
