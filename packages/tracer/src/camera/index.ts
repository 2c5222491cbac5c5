export {
  createPerspectiveCamera,
  createViewportCamera,
  type Camera,
  type PerspectiveCameraOptions,
  type ViewportCameraOptions,
} from './camera.js';
