// Shared configuration: render settings, per-mode defaults, environment
// overrides. Validation runs once at resolve time so the tracer never sees
// an out-of-range value.

export {
  resolveSettings,
  readEnvSettings,
  renderSettingsSchema,
  SettingsValidationError,
  WHITTED_DEFAULTS,
  PATH_DEFAULTS,
  MODE_DEFAULTS,
  SETTING_ENV_KEYS,
  RENDER_MODES,
  TIR_POLICIES,
  LOG_LEVELS,
  type RenderSettings,
  type RenderMode,
  type TirPolicy,
  type LogLevel,
  type EnvSettings,
} from './settings.js'
