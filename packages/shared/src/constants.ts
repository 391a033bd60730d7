import { homedir } from "node:os";
import { join } from "node:path";

/** Local configuration directory (config.json, credentials.json, logs/) */
export const MAILSTASH_CONFIG_DIR = join(homedir(), ".config", "mailstash");

/** Local file names */
export const CONFIG_FILES = {
  config: "config.json",
  credentials: "credentials.json",
  log: "mailstash.log",
} as const;

/** Payload bytes per message. Stays ~100 KiB under Yahoo's ~29.1 MiB attachment ceiling. */
export const DEFAULT_MAX_PART_SIZE = 29 * 2 ** 20;

/** Header carrying the decoded attachment length, so listings need no download */
export const ATTACHMENT_SIZE_HEADER = "X-Attachment-Size";

/** Log levels, least severe first */
export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

/** Default config values */
export const DEFAULTS = {
  baseFolder: "mailstash",
  folderSeparator: "/",
  maxPartSize: DEFAULT_MAX_PART_SIZE,
  imapHost: "imap.mail.yahoo.com",
  imapPort: 993,
  timeoutMs: 120_000,
  logLevel: "error",
} as const;
