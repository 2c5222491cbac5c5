export { BLACK, guardRadiance, type Integrator } from './types.js';
export {
  createWhittedIntegrator,
  traceWhitted,
  shadeLocal,
  offsetOrigin,
  DEFAULT_BACKGROUND,
  WHITTED_MAX_DEPTH,
  SURFACE_EPSILON,
  type WhittedOptions,
  type WhittedContext,
  type LocalShading,
} from './whitted.js';
export {
  createPathIntegrator,
  tracePath,
  skyColor,
  scatterDirection,
  PATH_MAX_DEPTH,
  DEFAULT_ATTENUATION,
  SCATTER_T_MIN,
  SKY_HORIZON,
  SKY_ZENITH,
  type PathOptions,
  type PathContext,
} from './path.js';
