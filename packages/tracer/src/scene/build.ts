// ---------------------------------------------------------------------------
// Scene construction: validate a description once, up front, and intern
// materials so spheres share them by reference.
// ---------------------------------------------------------------------------

import { readFile } from 'node:fs/promises';
import type { Light, Material, Scene, Sphere } from '../types.js';
import { SceneValidationError } from '../errors.js';
import { sceneDescriptionSchema } from './schema.js';

/**
 * Build a {@link Scene} from an untrusted description.
 *
 * @throws SceneValidationError listing every failing path.
 */
export function buildScene(description: unknown): Scene {
  const result = sceneDescriptionSchema.safeParse(description);
  if (!result.success) {
    throw new SceneValidationError(
      result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    );
  }
  const parsed = result.data;

  const materials = new Map<string, Material>();
  for (const [name, spec] of Object.entries(parsed.materials)) {
    materials.set(
      name,
      Object.freeze({
        name,
        albedo: Object.freeze({ ...spec.albedo }),
        diffuseColor: Object.freeze({ ...spec.diffuseColor }),
        specularExponent: spec.specularExponent,
        refractiveIndex: spec.refractiveIndex,
      }),
    );
  }

  const spheres: Sphere[] = parsed.spheres.map((spec, index) => {
    const material = materials.get(spec.material);
    if (!material) {
      throw new SceneValidationError([
        { path: `spheres.${index}.material`, message: `Unknown material '${spec.material}'` },
      ]);
    }
    return {
      ...(spec.name !== undefined ? { name: spec.name } : {}),
      center: { ...spec.center },
      radius: spec.radius,
      material,
    };
  });

  const lights: Light[] = parsed.lights.map((spec) =>
    Object.freeze({ position: Object.freeze({ ...spec.position }), intensity: spec.intensity }),
  );

  return { spheres, lights, materials };
}

/** Read and build a JSON scene description from disk. */
export async function loadSceneFile(path: string): Promise<Scene> {
  const text = await readFile(path, 'utf8');
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SceneValidationError([{ path: '', message: `${path} is not valid JSON: ${reason}` }]);
  }
  return buildScene(json);
}
