// ---------------------------------------------------------------------------
// @prism/tracer: Sphere Ray Tracing Core
// ---------------------------------------------------------------------------
// Barrel re-export: Whitted and Monte-Carlo path tracing over a shared
// intersection engine, plus cameras, post-process and the frame loop.
// ---------------------------------------------------------------------------

// Infrastructure: types, PRNG, errors
export * from './types.js';
export * from './errors.js';

// Vector math & sampling
export * from './math/index.js';

// Scene model, validation, presets
export * from './scene/index.js';

// Intersection engine
export * from './geometry/index.js';

// Light transport
export * from './integrators/index.js';

// Cameras
export * from './camera/index.js';

// Tone mapping & pixel buffers
export * from './post/index.js';

// Frame rendering, animation, platform loop
export * from './render/index.js';

// Logging & timing
export { createLogger, silentLogger, type Logger, type LoggerOptions, type LogFields } from './lib/logger.js';
export { FrameTimer, ScopedTimer, type FrameSample } from './lib/timer.js';
export { RingBuffer } from './lib/ring-buffer.js';
