// ---------------------------------------------------------------------------
// Render pipeline: binds a scene to a camera, an integrator and a tone
// mapping according to validated render settings.
// ---------------------------------------------------------------------------

import type { RenderSettings } from '@prism/config';
import type { Color, Scene } from '../types.js';
import { createPerspectiveCamera, createViewportCamera, type Camera } from '../camera/index.js';
import { createPathIntegrator, createWhittedIntegrator, type Integrator } from '../integrators/index.js';
import type { ToneMapping } from '../post/index.js';
import { createLogger, type Logger } from '../lib/logger.js';

export interface RenderPipeline {
  readonly scene: Scene;
  readonly camera: Camera;
  readonly integrator: Integrator;
  readonly samplesPerPixel: number;
  readonly toneMapping: ToneMapping;
  /** Random sub-pixel offsets; off means every sample goes through the pixel center. */
  readonly jitter: boolean;
  readonly seed: number;
  readonly logger: Logger;
  /** Millisecond clock used for frame timing. */
  readonly now: () => number;
}

export interface PipelineOverrides {
  logger?: Logger;
  now?: () => number;
  /** Whitted miss color. */
  background?: Readonly<Color>;
  /** Color substituted for non-finite radiance. */
  fallbackColor?: Readonly<Color>;
}

export function createRenderPipeline(
  scene: Scene,
  settings: RenderSettings,
  overrides: PipelineOverrides = {},
): RenderPipeline {
  const { width, height, samplesPerPixel, seed } = settings;
  const logger = overrides.logger ?? createLogger({ level: settings.logLevel });
  const now = overrides.now ?? (() => performance.now());

  if (settings.mode === 'path') {
    return {
      scene,
      camera: createViewportCamera({ width, height }),
      integrator: createPathIntegrator(scene, {
        maxDepth: settings.maxDepth,
        ...(overrides.fallbackColor ? { fallbackColor: overrides.fallbackColor } : {}),
      }),
      samplesPerPixel,
      toneMapping: 'gamma-clamp',
      jitter: true,
      seed,
      logger,
      now,
    };
  }

  return {
    scene,
    camera: createPerspectiveCamera({ width, height, fov: (settings.fovDegrees * Math.PI) / 180 }),
    integrator: createWhittedIntegrator(scene, {
      maxDepth: settings.maxDepth,
      farPlane: settings.farPlane,
      epsilon: settings.epsilon,
      tirPolicy: settings.tirPolicy,
      ...(overrides.background ? { background: overrides.background } : {}),
      ...(overrides.fallbackColor ? { fallbackColor: overrides.fallbackColor } : {}),
    }),
    samplesPerPixel,
    toneMapping: 'soft-clip',
    jitter: samplesPerPixel > 1,
    seed,
    logger,
    now,
  };
}
