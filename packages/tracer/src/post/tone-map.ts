// ---------------------------------------------------------------------------
// Frame post-process: per-pixel tone mapping and 8-bit quantization.
// ---------------------------------------------------------------------------

import type { Color, PixelBuffer } from '../types.js';
import { RenderTargetError } from '../errors.js';
import { clamp, vec3IsFinite, vec3MaxComponent, vec3Scale } from '../math/vector.js';

/**
 * - `soft-clip`: average the samples, then rescale so the brightest channel
 *   is at most 1 (hue-preserving).
 * - `gamma-clamp`: gamma-2 encode the average, then clamp each channel to
 *   [0, 0.999].
 */
export type ToneMapping = 'soft-clip' | 'gamma-clamp';

export const GAMMA_CLAMP_MAX = 0.999;

/** Divide by the largest channel when it exceeds 1. Non-finite input is returned unchanged. */
export function softClip(color: Color): Color {
  if (!vec3IsFinite(color)) return color;
  const max = vec3MaxComponent(color);
  return max > 1 ? vec3Scale(color, 1 / max) : color;
}

/** `sqrt(sum / samples)` per channel; approximates gamma 2. */
export function gammaEncode(sum: Color, samples: number): Color {
  const scale = 1 / samples;
  return {
    x: Math.sqrt(Math.max(0, sum.x * scale)),
    y: Math.sqrt(Math.max(0, sum.y * scale)),
    z: Math.sqrt(Math.max(0, sum.z * scale)),
  };
}

export function clampChannels(color: Color, min: number, max: number): Color {
  return { x: clamp(color.x, min, max), y: clamp(color.y, min, max), z: clamp(color.z, min, max) };
}

/** Map the accumulated radiance of `samples` samples to a display color in [0, 1]. */
export function toneMap(sum: Color, samples: number, mode: ToneMapping): Color {
  if (mode === 'gamma-clamp') return clampChannels(gammaEncode(sum, samples), 0, GAMMA_CLAMP_MAX);
  return clampChannels(softClip(vec3Scale(sum, 1 / samples)), 0, 1);
}

/** `trunc(255 * v)`, clamped into [0, 255]; NaN maps to 0. */
export function quantize(value: number): number {
  if (!(value > 0)) return 0;
  return Math.min(255, Math.trunc(255 * value));
}

export function createPixelBuffer(width: number, height: number): PixelBuffer {
  return { width, height, data: new Uint8Array(width * height * 4) };
}

/** Throws RenderTargetError unless `buffer` is `width` x `height`. */
export function assertBufferSize(buffer: PixelBuffer, width: number, height: number): void {
  if (buffer.width !== width || buffer.height !== height || buffer.data.length !== width * height * 4) {
    throw new RenderTargetError({ width, height }, { width: buffer.width, height: buffer.height });
  }
}

/** Store a display color at (x, y) with opaque alpha. */
export function writePixel(buffer: PixelBuffer, x: number, y: number, color: Color): void {
  const i = (x + y * buffer.width) * 4;
  buffer.data[i] = quantize(color.x);
  buffer.data[i + 1] = quantize(color.y);
  buffer.data[i + 2] = quantize(color.z);
  buffer.data[i + 3] = 255;
}

/** Read back (r, g, b, a) at (x, y). */
export function readPixel(buffer: PixelBuffer, x: number, y: number): [number, number, number, number] {
  const i = (x + y * buffer.width) * 4;
  return [buffer.data[i]!, buffer.data[i + 1]!, buffer.data[i + 2]!, buffer.data[i + 3]!];
}
