// Shared configuration: environment-driven settings for the category packages.

export {
  settings,
  loadSettings,
  DEFAULT_SETTINGS,
  SETTINGS_KEYS,
  LOG_LEVELS,
  ENV_PREFIX,
  type Settings,
  type SettingsKey,
  type LogLevel,
  type Env,
} from './settings'
