export { buildScene, loadSceneFile } from './build.js';
export {
  sceneDescriptionSchema,
  materialSpecSchema,
  sphereSpecSchema,
  lightSpecSchema,
  albedoSchema,
  vector3Schema,
  type SceneDescription,
  type ParsedSceneDescription,
  type MaterialSpec,
  type SphereSpec,
  type LightSpec,
} from './schema.js';
export { CLASSIC_SCENE, TWO_SPHERE_SCENE, IVORY, GLASS, RUBBER, MIRROR } from './presets.js';
