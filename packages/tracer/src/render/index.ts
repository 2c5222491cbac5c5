export { createRenderPipeline, type RenderPipeline, type PipelineOverrides } from './pipeline.js';
export {
  renderFrame,
  renderRows,
  type RenderResult,
  type RenderStats,
  type RenderFrameOptions,
} from './render-frame.js';
export { createBobbingAnimation, type SceneAnimation, type BobbingOptions } from './animation.js';
export {
  runAnimated,
  FRAME_HISTORY_SIZE,
  renderOnce,
  createMemorySurface,
  type DisplaySurface,
  type MemorySurface,
  type AnimatedLoopOptions,
  type LoopSummary,
} from './loop.js';
