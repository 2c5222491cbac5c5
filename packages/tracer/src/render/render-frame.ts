// ---------------------------------------------------------------------------
// Frame renderer: exhaustive, synchronous loop over every pixel.
// ---------------------------------------------------------------------------

import type { PixelBuffer, TraceStats } from '../types.js';
import { createPRNG, createTraceStats, rowSeed } from '../types.js';
import { vec3Add } from '../math/vector.js';
import { assertBufferSize, createPixelBuffer, toneMap, writePixel } from '../post/index.js';
import type { RenderPipeline } from './pipeline.js';

export interface RenderStats extends TraceStats {
  readonly width: number;
  readonly height: number;
  readonly samplesPerPixel: number;
  elapsedMs: number;
}

export interface RenderResult {
  readonly buffer: PixelBuffer;
  readonly stats: RenderStats;
}

export interface RenderFrameOptions {
  /** Buffer to overwrite instead of allocating; must match the camera size. */
  target?: PixelBuffer;
}

/**
 * Trace rows `[yStart, yEnd)` into `buffer`.
 *
 * Each row draws from its own generator seeded by (seed, row), so rendering
 * any partition of the rows yields the same pixels as one full pass.
 */
export function renderRows(
  pipeline: RenderPipeline,
  buffer: PixelBuffer,
  yStart: number,
  yEnd: number,
  stats: TraceStats,
): void {
  const { camera, integrator, samplesPerPixel, toneMapping, jitter, logger } = pipeline;
  const progress = logger.isEnabled('debug');

  for (let y = yStart; y < yEnd; y++) {
    const rng = createPRNG(rowSeed(pipeline.seed, y));
    for (let x = 0; x < camera.width; x++) {
      let sum = { x: 0, y: 0, z: 0 };
      for (let s = 0; s < samplesPerPixel; s++) {
        const jx = jitter ? rng() : 0.5;
        const jy = jitter ? rng() : 0.5;
        sum = vec3Add(sum, integrator.radiance(camera.generateRay(x, y, jx, jy), rng, stats));
      }
      writePixel(buffer, x, y, toneMap(sum, samplesPerPixel, toneMapping));
    }
    if (progress) logger.debug('row traced', { row: y, rowsRemaining: yEnd - y - 1 });
  }
}

/** Render one full frame. */
export function renderFrame(pipeline: RenderPipeline, options: RenderFrameOptions = {}): RenderResult {
  const { camera, logger, now } = pipeline;
  const buffer = options.target ?? createPixelBuffer(camera.width, camera.height);
  assertBufferSize(buffer, camera.width, camera.height);

  const stats: RenderStats = {
    ...createTraceStats(),
    width: camera.width,
    height: camera.height,
    samplesPerPixel: pipeline.samplesPerPixel,
    elapsedMs: 0,
  };

  logger.info('frame started', {
    mode: pipeline.integrator.kind,
    width: camera.width,
    height: camera.height,
    samplesPerPixel: pipeline.samplesPerPixel,
  });
  const start = now();
  renderRows(pipeline, buffer, 0, camera.height, stats);
  stats.elapsedMs = now() - start;

  if (stats.nonFiniteSamples > 0) {
    logger.warn('non-finite radiance replaced', { samples: stats.nonFiniteSamples });
  }
  logger.info('frame finished', {
    ms: Number(stats.elapsedMs.toFixed(1)),
    primaryRays: stats.primaryRays,
    secondaryRays: stats.secondaryRays,
    shadowRays: stats.shadowRays,
  });

  return { buffer, stats };
}
