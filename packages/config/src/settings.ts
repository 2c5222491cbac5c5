import { z } from 'zod'

/** Renderer variant: recursive Whitted tracing or Monte-Carlo path tracing. */
export const RENDER_MODES = ['whitted', 'path'] as const
export type RenderMode = (typeof RENDER_MODES)[number]

/**
 * What the Whitted integrator does when refraction hits total internal
 * reflection. `legacy-sentinel` keeps the historical (1, 0, 0) direction,
 * `reflect` sends the ray along the mirror direction instead.
 */
export const TIR_POLICIES = ['legacy-sentinel', 'reflect'] as const
export type TirPolicy = (typeof TIR_POLICIES)[number]

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

export const renderSettingsSchema = z.object({
  mode: z.enum(RENDER_MODES),
  width: z.number().int().min(1).max(16384),
  height: z.number().int().min(1).max(16384),
  maxDepth: z.number().int().min(0).max(1000),
  samplesPerPixel: z.number().int().min(1).max(100000),
  seed: z.number().int(),
  fovDegrees: z.number().gt(0).lt(180),
  farPlane: z.number().positive(),
  epsilon: z.number().positive(),
  tirPolicy: z.enum(TIR_POLICIES),
  logLevel: z.enum(LOG_LEVELS),
})

export type RenderSettings = z.infer<typeof renderSettingsSchema>

/** Raw, unvalidated settings as read from the environment. */
export type EnvSettings = { [K in keyof RenderSettings]?: unknown }

/** Environment variable carrying each setting. */
export const SETTING_ENV_KEYS: Record<keyof RenderSettings, string> = {
  mode: 'RAYTRACER_MODE',
  width: 'RAYTRACER_WIDTH',
  height: 'RAYTRACER_HEIGHT',
  maxDepth: 'RAYTRACER_MAX_DEPTH',
  samplesPerPixel: 'RAYTRACER_SAMPLES',
  seed: 'RAYTRACER_SEED',
  fovDegrees: 'RAYTRACER_FOV_DEG',
  farPlane: 'RAYTRACER_FAR_PLANE',
  epsilon: 'RAYTRACER_EPSILON',
  tirPolicy: 'RAYTRACER_TIR_POLICY',
  logLevel: 'RAYTRACER_LOG_LEVEL',
}

const NUMERIC_KEYS: ReadonlySet<keyof RenderSettings> = new Set<keyof RenderSettings>([
  'width',
  'height',
  'maxDepth',
  'samplesPerPixel',
  'seed',
  'fovDegrees',
  'farPlane',
  'epsilon',
])

/** Defaults for the deterministic recursive tracer. */
export const WHITTED_DEFAULTS: RenderSettings = {
  mode: 'whitted',
  width: 640,
  height: 400,
  maxDepth: 4,
  samplesPerPixel: 1,
  seed: 0,
  fovDegrees: 60,
  farPlane: 1000,
  epsilon: 1e-3,
  tirPolicy: 'legacy-sentinel',
  logLevel: 'info',
}

/** Defaults for the stochastic path tracer. */
export const PATH_DEFAULTS: RenderSettings = {
  ...WHITTED_DEFAULTS,
  mode: 'path',
  maxDepth: 50,
  samplesPerPixel: 100,
}

export const MODE_DEFAULTS: Record<RenderMode, RenderSettings> = {
  whitted: WHITTED_DEFAULTS,
  path: PATH_DEFAULTS,
}

/** Thrown when merged settings fail validation. */
export class SettingsValidationError extends Error {
  constructor(public readonly fields: Record<string, string[]>) {
    super(
      `Invalid render settings: ${Object.entries(fields)
        .map(([key, messages]) => `${key} (${messages.join('; ')})`)
        .join(', ')}`,
    )
    this.name = 'SettingsValidationError'
  }
}

type Env = Record<string, string | undefined>

function processEnv(): Env {
  if (typeof process !== 'undefined' && process.env) return process.env
  return {}
}

/**
 * Read `RAYTRACER_*` variables. Numeric values are converted with `Number`,
 * so garbage surfaces as NaN and is rejected by validation.
 */
export function readEnvSettings(env: Env = processEnv()): EnvSettings {
  const out: EnvSettings = {}
  for (const name of renderSettingsSchema.keyof().options) {
    const raw = env[SETTING_ENV_KEYS[name]]
    if (raw === undefined || raw === '') continue
    out[name] = NUMERIC_KEYS.has(name) ? Number(raw) : raw
  }
  return out
}

/** Resolve settings: explicit overrides > environment > mode defaults. */
export function resolveSettings(
  overrides: Partial<RenderSettings> = {},
  env: Env = processEnv(),
): RenderSettings {
  const fromEnv = readEnvSettings(env)
  const modeResult = z.enum(RENDER_MODES).safeParse(overrides.mode ?? fromEnv.mode ?? 'whitted')
  if (!modeResult.success) {
    throw new SettingsValidationError({
      mode: [`Expected one of ${RENDER_MODES.join(', ')}`],
    })
  }

  const merged = { ...MODE_DEFAULTS[modeResult.data], ...fromEnv, ...overrides }
  const result = renderSettingsSchema.safeParse(merged)
  if (!result.success) {
    const fieldErrors: Record<string, string[]> = {}
    for (const [key, messages] of Object.entries(result.error.flatten().fieldErrors)) {
      if (messages && messages.length > 0) fieldErrors[key] = messages
    }
    throw new SettingsValidationError(fieldErrors)
  }
  return result.data
}
