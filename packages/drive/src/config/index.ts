export {
  validateConfig,
  parseConfig,
  validateCredentials,
  parseCredentials,
  type ValidationResult,
} from "./validator.js";
export {
  loadAppConfig,
  loadCredentials,
  resolveSettings,
  type Settings,
  type SettingsOverrides,
} from "./settings.js";
