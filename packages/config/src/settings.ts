import { z } from 'zod'

/** Log thresholds, from quietest to noisiest. */
export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

const settingsSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
  LAW_SAMPLE_LIMIT: z.coerce.number().int().positive().default(1000),
})

/** Runtime settings. Each key is read from the environment as `KITTEN_<KEY>`. */
export type Settings = z.infer<typeof settingsSchema>

export type SettingsKey = keyof Settings

export const SETTINGS_KEYS: SettingsKey[] = ['LOG_LEVEL', 'LAW_SAMPLE_LIMIT']

export const DEFAULT_SETTINGS: Settings = {
  LOG_LEVEL: 'warn',
  LAW_SAMPLE_LIMIT: 1000,
}

export type Env = Readonly<Record<string, string | undefined>>

export const ENV_PREFIX = 'KITTEN_'

function readProcessEnv(): Env {
  if (typeof process !== 'undefined' && process.env) return process.env
  return {}
}

/**
 * Parse settings from an environment object. Unset variables fall back to
 * DEFAULT_SETTINGS; a malformed value throws, naming the variable.
 */
export function loadSettings(env: Env = readProcessEnv()): Settings {
  const raw: Partial<Record<SettingsKey, string>> = {}
  for (const key of SETTINGS_KEYS) {
    const val = env[`${ENV_PREFIX}${key}`]
    if (val !== undefined) raw[key] = val
  }

  const result = settingsSchema.safeParse(raw)
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${ENV_PREFIX}${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid configuration: ${problems}`)
  }
  return result.data
}

/** Settings resolved from process.env at import time. */
export const settings: Settings = loadSettings()
