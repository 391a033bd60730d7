import type { LOG_LEVELS } from "./constants.js";

// ── Parts ───────────────────────────────────────────────────────────

/** What every part message carries so it can be told apart and reassembled. */
export interface PartMetadata {
  name: string;
  index: number; // 0-based
  totalParts: number;
}

export interface Part extends PartMetadata {
  payload: Buffer;
}

/** Byte range [start, end) of one part within its file. */
export interface PartRange {
  index: number;
  start: number;
  end: number;
}

/** Transport-message fields produced by the codec. */
export interface MessageFields {
  subject: string;
}

// ── Listing ─────────────────────────────────────────────────────────

export interface FileEntry {
  kind: "file";
  folderPath: string[];
  name: string;
  totalParts: number;
  partsPresent: number; // distinct indices
  size: number; // bytes, summed over distinct parts
  valid: boolean;
  lastModified: string | null; // ISO 8601, newest part
}

export interface FolderEntry {
  kind: "folder";
  folderPath: string[]; // parent
  name: string;
}

export type ListingEntry = FileEntry | FolderEntry;

// ── Uploads ─────────────────────────────────────────────────────────

export interface UploadedFile {
  folderPath: string[];
  name: string;
  size: number;
  totalParts: number;
  /** Parts sent by this call; fewer than totalParts when resuming. */
  sentParts: number;
}

// ── Config ──────────────────────────────────────────────────────────

/** How virtual folder paths map onto the mailbox namespace. */
export interface FolderLayout {
  baseFolder: string;
  folderSeparator: string;
}

export interface DriveConfig extends FolderLayout {
  maxPartSize: number;
}

export type LogLevel = (typeof LOG_LEVELS)[number];

// ── config.json ─────────────────────────────────────────────────────

export interface AppConfig {
  base_folder?: string;
  max_part_size?: number;
  folder_separator?: string;
  trash_folder?: string;
  timeout_ms?: number;
  log_to_file?: boolean;
}

// ── credentials.json ────────────────────────────────────────────────

export interface Credentials {
  address: string;
  password: string;
  host?: string;
  port?: number;
}
