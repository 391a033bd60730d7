import { join } from "node:path";
import { MAILSTASH_CONFIG_DIR, CONFIG_FILES } from "../constants.js";

/** Resolve the config directory, with optional override for testing. */
export function configDir(override?: string): string {
  return override ?? MAILSTASH_CONFIG_DIR;
}

/** ~/.config/mailstash/config.json */
export function configPath(base?: string): string {
  return join(configDir(base), CONFIG_FILES.config);
}

/** ~/.config/mailstash/logs/ */
export function logsDir(base?: string): string {
  return join(configDir(base), "logs");
}

/**
 * Places searched for credentials when none is given explicitly, in order:
 *   ./credentials.json
 *   ~/.config/mailstash/credentials.json
 */
export function credentialsSearchPaths(cwd: string, base?: string): string[] {
  return [
    join(cwd, CONFIG_FILES.credentials),
    join(configDir(base), CONFIG_FILES.credentials),
  ];
}
