import { ConfigError, type AppConfig, type Credentials } from "@mailstash/shared";

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

const CONFIG_KEYS = [
  "base_folder",
  "max_part_size",
  "folder_separator",
  "trash_folder",
  "timeout_ms",
  "log_to_file",
];

const CREDENTIAL_KEYS = ["address", "password", "host", "port"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value > 0;
}

function unknownKeys(data: Record<string, unknown>, known: string[]): string[] {
  return Object.keys(data)
    .filter((key) => !known.includes(key))
    .map((key) => `unknown key: ${key}`);
}

/**
 * Validate a config.json object. Every key is optional.
 */
export function validateConfig(data: unknown): ValidationResult {
  if (!isRecord(data)) {
    return { valid: false, errors: ["config must be a JSON object"] };
  }

  const errors = unknownKeys(data, CONFIG_KEYS);

  if (data.base_folder !== undefined && !isNonEmptyString(data.base_folder)) {
    errors.push("base_folder must be a non-empty string");
  }
  if (data.max_part_size !== undefined && !isPositiveInteger(data.max_part_size)) {
    errors.push("max_part_size must be a positive integer (bytes)");
  }
  if (data.folder_separator !== undefined && !isNonEmptyString(data.folder_separator)) {
    errors.push("folder_separator must be a non-empty string");
  }
  if (data.trash_folder !== undefined && !isNonEmptyString(data.trash_folder)) {
    errors.push("trash_folder must be a non-empty string");
  }
  if (data.timeout_ms !== undefined && !isPositiveInteger(data.timeout_ms)) {
    errors.push("timeout_ms must be a positive integer");
  }
  if (data.log_to_file !== undefined && typeof data.log_to_file !== "boolean") {
    errors.push("log_to_file must be true or false");
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Validated copy of a config.json object. Throws ConfigError listing every problem.
 */
export function parseConfig(data: unknown, source = "config"): AppConfig {
  const result = validateConfig(data);
  if (!result.valid || !isRecord(data)) throw new ConfigError(source, result.errors);

  const config: AppConfig = {};
  if (isNonEmptyString(data.base_folder)) config.base_folder = data.base_folder;
  if (isPositiveInteger(data.max_part_size)) config.max_part_size = data.max_part_size;
  if (isNonEmptyString(data.folder_separator)) config.folder_separator = data.folder_separator;
  if (isNonEmptyString(data.trash_folder)) config.trash_folder = data.trash_folder;
  if (isPositiveInteger(data.timeout_ms)) config.timeout_ms = data.timeout_ms;
  if (typeof data.log_to_file === "boolean") config.log_to_file = data.log_to_file;
  return config;
}

/**
 * Validate a credentials file: { address, password, host?, port? }.
 */
export function validateCredentials(data: unknown): ValidationResult {
  if (!isRecord(data)) {
    return { valid: false, errors: ["credentials must be a JSON object"] };
  }

  const errors = unknownKeys(data, CREDENTIAL_KEYS);

  if (!isNonEmptyString(data.address) || !data.address.includes("@")) {
    errors.push("address must be an email address");
  }
  if (!isNonEmptyString(data.password)) {
    errors.push("password is required");
  }
  if (data.host !== undefined && !isNonEmptyString(data.host)) {
    errors.push("host must be a non-empty string");
  }
  if (data.port !== undefined && !(isPositiveInteger(data.port) && data.port <= 65535)) {
    errors.push("port must be an integer between 1 and 65535");
  }

  return { valid: errors.length === 0, errors };
}

export function parseCredentials(data: unknown, source = "credentials"): Credentials {
  const result = validateCredentials(data);
  if (!result.valid || !isRecord(data) || !isNonEmptyString(data.address) || !isNonEmptyString(data.password)) {
    throw new ConfigError(source, result.errors);
  }

  const credentials: Credentials = { address: data.address, password: data.password };
  if (isNonEmptyString(data.host)) credentials.host = data.host;
  if (isPositiveInteger(data.port)) credentials.port = data.port;
  return credentials;
}
