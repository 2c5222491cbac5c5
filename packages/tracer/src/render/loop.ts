// ---------------------------------------------------------------------------
// Platform loop glue. A display surface only receives finished frames; the
// window system behind it lives outside this package.
// ---------------------------------------------------------------------------

import type { PixelBuffer } from '../types.js';
import { FrameTimer, type FrameSample } from '../lib/timer.js';
import { RingBuffer } from '../lib/ring-buffer.js';
import type { SceneAnimation } from './animation.js';
import type { RenderPipeline } from './pipeline.js';
import { renderFrame, type RenderResult, type RenderStats } from './render-frame.js';

/** Accepts a complete RGBA frame; must not keep a reference past the call. */
export interface DisplaySurface {
  present(buffer: Readonly<PixelBuffer>): void;
}

/** In-process surface that keeps a copy of every presented frame. */
export interface MemorySurface extends DisplaySurface {
  readonly frames: PixelBuffer[];
}

export function createMemorySurface(): MemorySurface {
  const frames: PixelBuffer[] = [];
  return {
    frames,
    present(buffer) {
      frames.push({ width: buffer.width, height: buffer.height, data: buffer.data.slice() });
    },
  };
}

/** Frame samples kept by the animated loop (two seconds at 60 fps). */
export const FRAME_HISTORY_SIZE = 120;

export interface AnimatedLoopOptions {
  pipeline: RenderPipeline;
  surface: DisplaySurface;
  animation?: SceneAnimation;
  /** Milliseconds since the loop started. Defaults to the pipeline clock. */
  clock?: () => number;
  /** Polled before each frame; true ends the loop. */
  shouldQuit?: (frameIndex: number) => boolean;
  maxFrames?: number;
  /** Most recent frame samples to keep. Default {@link FRAME_HISTORY_SIZE}. */
  historySize?: number;
}

export interface LoopSummary {
  readonly frames: number;
  /** Timings of the last `historySize` frames, oldest first. */
  readonly samples: readonly FrameSample[];
  readonly lastStats: RenderStats | null;
}

/**
 * Animated loop: each iteration applies the animation at the current time,
 * renders a full frame into a reused buffer and presents it. Without
 * `shouldQuit` or `maxFrames` it runs until the process exits.
 */
export function runAnimated(options: AnimatedLoopOptions): LoopSummary {
  const { pipeline, surface, animation } = options;
  const start = pipeline.now();
  const clock = options.clock ?? (() => pipeline.now() - start);
  const maxFrames = options.maxFrames ?? Infinity;
  const timer = new FrameTimer(pipeline.now);
  const history = new RingBuffer<FrameSample>(options.historySize ?? FRAME_HISTORY_SIZE);

  let target: PixelBuffer | undefined;
  let lastStats: RenderStats | null = null;
  let frame = 0;

  while (frame < maxFrames && !(options.shouldQuit?.(frame) ?? false)) {
    timer.beginFrame();

    timer.beginPhase('animate');
    animation?.apply(pipeline.scene, clock());

    timer.beginPhase('trace');
    const result: RenderResult = renderFrame(pipeline, target ? { target } : {});
    target = result.buffer;
    lastStats = result.stats;

    timer.beginPhase('present');
    surface.present(result.buffer);

    history.push(timer.endFrame());
    frame++;
  }

  pipeline.logger.info('loop stopped', { frames: frame });
  return { frames: frame, samples: history.toArray(), lastStats };
}

/** Static variant: render a single frame and present it. */
export function renderOnce(pipeline: RenderPipeline, surface: DisplaySurface): RenderResult {
  const result = renderFrame(pipeline);
  surface.present(result.buffer);
  return result;
}
