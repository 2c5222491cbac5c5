// ---------------------------------------------------------------------------
// Scene description schemas (zod). A description is plain data: JSON files,
// presets and tests all go through the same validation.
// ---------------------------------------------------------------------------

import { z } from 'zod';

const coordinate = z.number().finite();

export const vector3Schema = z.object({ x: coordinate, y: coordinate, z: coordinate });

const weight = z.number().finite().min(0, 'Albedo weights must be >= 0');

export const albedoSchema = z.object({
  diffuse: weight,
  specular: weight,
  reflection: weight,
  refraction: weight,
});

export const materialSpecSchema = z.object({
  albedo: albedoSchema,
  diffuseColor: vector3Schema,
  specularExponent: z.number().finite().positive('Specular exponent must be > 0'),
  refractiveIndex: z.number().finite().min(1, 'Refractive index must be >= 1').default(1),
});

export const sphereSpecSchema = z.object({
  name: z.string().min(1).optional(),
  center: vector3Schema,
  radius: z.number().finite().positive('Radius must be > 0'),
  material: z.string().min(1, 'Material name is required'),
});

export const lightSpecSchema = z.object({
  position: vector3Schema,
  intensity: z.number().finite().positive('Light intensity must be > 0'),
});

export const sceneDescriptionSchema = z
  .object({
    materials: z.record(z.string(), materialSpecSchema),
    spheres: z.array(sphereSpecSchema),
    lights: z.array(lightSpecSchema).default([]),
  })
  .superRefine((scene, ctx) => {
    scene.spheres.forEach((sphere, index) => {
      if (!Object.hasOwn(scene.materials, sphere.material)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['spheres', index, 'material'],
          message: `Unknown material '${sphere.material}'`,
        });
      }
    });
  });

/** Authoring shape (defaults optional). */
export type SceneDescription = z.input<typeof sceneDescriptionSchema>;
/** Validated shape (defaults filled in). */
export type ParsedSceneDescription = z.output<typeof sceneDescriptionSchema>;
export type MaterialSpec = z.input<typeof materialSpecSchema>;
export type SphereSpec = z.input<typeof sphereSpecSchema>;
export type LightSpec = z.input<typeof lightSpecSchema>;
