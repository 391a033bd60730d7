import { readFile } from "node:fs/promises";
import {
  ConfigError,
  DEFAULTS,
  configPath,
  credentialsSearchPaths,
  logsDir,
  messageOf,
  type AppConfig,
  type Credentials,
  type DriveConfig,
} from "@mailstash/shared";
import { isErrnoCode } from "../local-fs.js";
import { parseConfig, parseCredentials } from "./validator.js";

/** Everything one CLI invocation runs with. */
export interface Settings {
  drive: DriveConfig;
  credentials: Required<Credentials>;
  trashFolder: string | undefined;
  timeoutMs: number;
  /** Null when file logging is off. */
  logDir: string | null;
}

export interface SettingsOverrides {
  /** --credentials */
  credentialsPath?: string;
  /** --root */
  baseFolder?: string;
  /** --trash */
  trashFolder?: string;
  /** Config directory; ~/.config/mailstash when omitted. */
  configDir?: string;
  cwd?: string;
}

/** Read and parse a JSON file. Null when it doesn't exist. */
async function readJson(path: string, source: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (isErrnoCode(err, "ENOENT")) return null;
    throw new ConfigError(source, [`cannot read ${path}: ${messageOf(err)}`]);
  }

  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(source, [`${path} is not valid JSON: ${messageOf(err)}`]);
  }
}

/**
 * Load config.json. A missing file means all defaults.
 */
export async function loadAppConfig(base?: string): Promise<AppConfig> {
  const path = configPath(base);
  const data = await readJson(path, path);
  return data === null ? {} : parseConfig(data, path);
}

/**
 * Load credentials from `explicitPath`, or from the first file found in
 * the working directory and then the config directory.
 */
export async function loadCredentials(
  explicitPath: string | undefined,
  cwd: string,
  base?: string
): Promise<Credentials> {
  const candidates = explicitPath !== undefined ? [explicitPath] : credentialsSearchPaths(cwd, base);

  for (const path of candidates) {
    const data = await readJson(path, path);
    if (data !== null) return parseCredentials(data, path);
  }

  throw new ConfigError("credentials", [
    explicitPath !== undefined
      ? `${explicitPath} does not exist`
      : `no credentials file found (looked in ${candidates.join(", ")})`,
  ]);
}

/**
 * Merge defaults, config.json and command-line overrides.
 */
export async function resolveSettings(overrides: SettingsOverrides = {}): Promise<Settings> {
  const base = overrides.configDir;
  const config = await loadAppConfig(base);
  const credentials = await loadCredentials(overrides.credentialsPath, overrides.cwd ?? process.cwd(), base);

  if (overrides.baseFolder !== undefined && overrides.baseFolder.trim().length === 0) {
    throw new ConfigError("--root", ["the base folder cannot be empty"]);
  }

  return {
    drive: {
      baseFolder: overrides.baseFolder ?? config.base_folder ?? DEFAULTS.baseFolder,
      folderSeparator: config.folder_separator ?? DEFAULTS.folderSeparator,
      maxPartSize: config.max_part_size ?? DEFAULTS.maxPartSize,
    },
    credentials: {
      address: credentials.address,
      password: credentials.password,
      host: credentials.host ?? DEFAULTS.imapHost,
      port: credentials.port ?? DEFAULTS.imapPort,
    },
    trashFolder: overrides.trashFolder ?? config.trash_folder,
    timeoutMs: config.timeout_ms ?? DEFAULTS.timeoutMs,
    logDir: config.log_to_file === false ? null : logsDir(base),
  };
}
