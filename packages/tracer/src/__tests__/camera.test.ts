import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { createPerspectiveCamera, createViewportCamera, vec3, vec3Length } from '../index.js';

describe('createPerspectiveCamera', () => {
  it('aims the exact image center straight down -Z', () => {
    const camera = createPerspectiveCamera({ width: 4, height: 2 });
    const ray = camera.generateRay(2, 1, 0, 0);
    expect(ray.origin).toEqual({ x: 0, y: 0, z: 0 });
    expect(ray.direction.x).toBe(0);
    expect(ray.direction.y).toBe(0);
    expect(ray.direction.z).toBe(-1);
  });

  it('puts row 0 at the top of the image', () => {
    const camera = createPerspectiveCamera({ width: 8, height: 6 });
    expect(camera.generateRay(4, 0, 0.5, 0.5).direction.y).toBeGreaterThan(0);
    expect(camera.generateRay(4, 5, 0.5, 0.5).direction.y).toBeLessThan(0);
    expect(camera.generateRay(0, 3, 0.5, 0.5).direction.x).toBeLessThan(0);
  });

  it('spans the requested vertical field of view', () => {
    const camera = createPerspectiveCamera({ width: 4, height: 2, fov: Math.PI / 2 });
    // Top edge of the image plane sits 45° above the axis.
    const d = camera.generateRay(2, 0, 0, 0).direction;
    expect(d.x).toBe(0);
    expect(d.y).toBeCloseTo(Math.SQRT1_2, 12);
    expect(d.z).toBeCloseTo(-Math.SQRT1_2, 12);
  });

  it('starts rays at a custom origin', () => {
    const camera = createPerspectiveCamera({ width: 2, height: 2, origin: vec3(1, 2, 3) });
    expect(camera.generateRay(0, 0, 0.5, 0.5).origin).toEqual({ x: 1, y: 2, z: 3 });
  });
});

describe('createViewportCamera', () => {
  it('maps (u, v) = (0.5, 0.5) to the viewport center', () => {
    const camera = createViewportCamera({ width: 3, height: 3 });
    const d = camera.generateRay(1, 2, 0, 0).direction;
    expect(d.x).toBe(0);
    expect(d.y).toBe(0);
    expect(d.z).toBe(-1);
  });

  it('maps (u, v) = (0, 0) to the lower-left corner', () => {
    const camera = createViewportCamera({ width: 3, height: 3 });
    const d = camera.generateRay(0, 3, 0, 0).direction;
    const s = 1 / Math.sqrt(3);
    expect(d.x).toBeCloseTo(-s, 12);
    expect(d.y).toBeCloseTo(-s, 12);
    expect(d.z).toBeCloseTo(-s, 12);
  });

  it('widens the viewport with the aspect ratio', () => {
    const camera = createViewportCamera({ width: 5, height: 3 });
    // u = 1, v = 0.5: right edge at x = (5 / 3) * 2 / 2
    const d = camera.generateRay(4, 2, 0, 0).direction;
    expect(d.x / -d.z).toBeCloseTo(5 / 3, 12);
    expect(d.y).toBeCloseTo(0, 12);
  });
});

describe('camera rays', () => {
  it('always have unit directions', () => {
    const cameras = [
      createPerspectiveCamera({ width: 64, height: 40 }),
      createViewportCamera({ width: 64, height: 40 }),
    ];
    fc.assert(
      fc.property(
        fc.integer({ min: 0, max: 63 }),
        fc.integer({ min: 0, max: 39 }),
        fc.double({ min: 0, max: 0.999, noNaN: true }),
        fc.double({ min: 0, max: 0.999, noNaN: true }),
        (x, y, jx, jy) => {
          for (const camera of cameras) {
            expect(vec3Length(camera.generateRay(x, y, jx, jy).direction)).toBeCloseTo(1, 12);
          }
        },
      ),
    );
  });
});
