export { sphereIntersect, sphereRoots } from './sphere.js';
export { sceneIntersect, DEFAULT_FAR_PLANE, type IntersectOptions } from './scene-intersect.js';
