// ---------------------------------------------------------------------------
// Primary-ray generation. Pixel (0, 0) is the top-left corner; world +Y is
// up, so image rows run from max Y downwards.
// ---------------------------------------------------------------------------

import type { Ray, Vector3 } from '../types.js';
import { vec3, vec3Add, vec3Normalize, vec3Scale, vec3Sub } from '../math/vector.js';

export interface Camera {
  readonly width: number;
  readonly height: number;
  /**
   * Ray through pixel (`x`, `y`) at sub-pixel offset (`jitterX`, `jitterY`),
   * each in [0, 1). The pixel center is (0.5, 0.5).
   */
  generateRay(x: number, y: number, jitterX: number, jitterY: number): Ray;
}

export interface PerspectiveCameraOptions {
  width: number;
  height: number;
  /** Vertical field of view in radians. Default π/3. */
  fov?: number;
  origin?: Vector3;
}

/**
 * Pinhole camera looking down -Z with the image plane at the distance that
 * gives the requested vertical field of view, measured in pixels.
 */
export function createPerspectiveCamera(options: PerspectiveCameraOptions): Camera {
  const { width, height } = options;
  const fov = options.fov ?? Math.PI / 3;
  const origin = options.origin ?? vec3(0, 0, 0);
  const planeZ = -height / (2 * Math.tan(fov / 2));

  return {
    width,
    height,
    generateRay(x, y, jitterX, jitterY) {
      const direction = vec3Normalize({
        x: x + jitterX - width / 2,
        y: -(y + jitterY) + height / 2,
        z: planeZ,
      });
      return { origin, direction };
    },
  };
}

export interface ViewportCameraOptions {
  width: number;
  height: number;
  /** World-space height of the image plane. Default 2. */
  viewportHeight?: number;
  /** Distance from the origin to the image plane. Default 1. */
  focalLength?: number;
  origin?: Vector3;
}

/**
 * Camera defined by an explicit viewport rectangle at `focalLength` along
 * -Z. Pixel coordinates map to (u, v) in [0, 1] over the viewport.
 */
export function createViewportCamera(options: ViewportCameraOptions): Camera {
  const { width, height } = options;
  const viewportHeight = options.viewportHeight ?? 2;
  const focalLength = options.focalLength ?? 1;
  const origin = options.origin ?? vec3(0, 0, 0);

  const viewportWidth = (width / height) * viewportHeight;
  const horizontal = vec3(viewportWidth, 0, 0);
  const vertical = vec3(0, viewportHeight, 0);
  const lowerLeft = vec3Sub(
    vec3Sub(vec3Sub(origin, vec3Scale(horizontal, 0.5)), vec3Scale(vertical, 0.5)),
    vec3(0, 0, focalLength),
  );
  // A single row or column still needs a finite step.
  const uSpan = Math.max(1, width - 1);
  const vSpan = Math.max(1, height - 1);

  return {
    width,
    height,
    generateRay(x, y, jitterX, jitterY) {
      const u = (x + jitterX) / uSpan;
      const v = (height - (y + jitterY)) / vSpan;
      const target = vec3Add(vec3Add(lowerLeft, vec3Scale(horizontal, u)), vec3Scale(vertical, v));
      return { origin, direction: vec3Normalize(vec3Sub(target, origin)) };
    },
  };
}
