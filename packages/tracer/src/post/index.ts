export {
  softClip,
  gammaEncode,
  clampChannels,
  toneMap,
  quantize,
  createPixelBuffer,
  assertBufferSize,
  writePixel,
  readPixel,
  GAMMA_CLAMP_MAX,
  type ToneMapping,
} from './tone-map.js';
