export * from './vector.js';
export { randomRange, randomInUnitSphere, randomUnitVector } from './sampling.js';
