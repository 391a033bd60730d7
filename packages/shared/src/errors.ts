import type { UploadedFile } from "./types.js";

export type DriveErrorKind =
  | "invalid_segment"
  | "malformed_part"
  | "incomplete_part_set"
  | "duplicate_part"
  | "part_count_mismatch"
  | "not_found"
  | "name_collision"
  | "partial_upload"
  | "partial_remove"
  | "destination_exists"
  | "transport"
  | "invalid_config"
  | "usage";

/**
 * Base class for every error mailstash raises on purpose.
 * `kind` is stable and meant for programmatic handling (and the CLI output).
 */
export class DriveError extends Error {
  readonly kind: DriveErrorKind;

  constructor(kind: DriveErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DriveError";
    this.kind = kind;
  }

  /** Structured details for debug output. */
  details(): Record<string, unknown> {
    return {};
  }
}

// ── Paths ───────────────────────────────────────────────────────────

export class InvalidSegmentError extends DriveError {
  readonly segment: string;

  constructor(segment: string, reason: string) {
    super("invalid_segment", `Invalid path segment "${segment}": ${reason}`);
    this.name = "InvalidSegmentError";
    this.segment = segment;
  }

  override details(): Record<string, unknown> {
    return { segment: this.segment };
  }
}

// ── Parts ───────────────────────────────────────────────────────────

export class MalformedPartError extends DriveError {
  readonly subject: string;

  constructor(subject: string, reason: string) {
    super("malformed_part", `Malformed part "${subject}": ${reason}`);
    this.name = "MalformedPartError";
    this.subject = subject;
  }

  override details(): Record<string, unknown> {
    return { subject: this.subject };
  }
}

export class IncompletePartSetError extends DriveError {
  readonly fileName: string;
  readonly expected: number;
  readonly observed: number;
  readonly missing: number[];

  constructor(fileName: string, expected: number, observed: number, missing: number[]) {
    super(
      "incomplete_part_set",
      `File "${fileName}" is incomplete: ${observed}/${expected} part(s) present, missing part index(es) ${missing.join(", ")}`
    );
    this.name = "IncompletePartSetError";
    this.fileName = fileName;
    this.expected = expected;
    this.observed = observed;
    this.missing = missing;
  }

  override details(): Record<string, unknown> {
    return {
      file: this.fileName,
      expected: this.expected,
      observed: this.observed,
      missing: this.missing,
    };
  }
}

export class DuplicatePartError extends DriveError {
  readonly fileName: string;
  readonly index: number;

  constructor(fileName: string, index: number) {
    super(
      "duplicate_part",
      `File "${fileName}" has conflicting copies of part index ${index}`
    );
    this.name = "DuplicatePartError";
    this.fileName = fileName;
    this.index = index;
  }

  override details(): Record<string, unknown> {
    return { file: this.fileName, index: this.index };
  }
}

export class PartCountMismatchError extends DriveError {
  readonly fileName: string;
  readonly declaredCounts: number[];

  constructor(fileName: string, declaredCounts: number[]) {
    super(
      "part_count_mismatch",
      `File "${fileName}" parts disagree on the total part count (${declaredCounts.join(" vs ")})`
    );
    this.name = "PartCountMismatchError";
    this.fileName = fileName;
    this.declaredCounts = declaredCounts;
  }

  override details(): Record<string, unknown> {
    return { file: this.fileName, declaredCounts: this.declaredCounts };
  }
}

// ── Lookup ──────────────────────────────────────────────────────────

export class NotFoundError extends DriveError {
  readonly target: string;

  constructor(target: string, message?: string) {
    super("not_found", message ?? `"${target}" was not found`);
    this.name = "NotFoundError";
    this.target = target;
  }

  override details(): Record<string, unknown> {
    return { target: this.target };
  }
}

export class FolderNotFoundError extends NotFoundError {
  constructor(folderId: string) {
    super(folderId, `Folder "${folderId}" was not found on the server`);
    this.name = "FolderNotFoundError";
  }
}

export class NameCollisionError extends DriveError {
  readonly fileName: string;
  readonly folderId: string;

  constructor(fileName: string, folderId: string) {
    super(
      "name_collision",
      `A file named "${fileName}" already exists in "${folderId}"`
    );
    this.name = "NameCollisionError";
    this.fileName = fileName;
    this.folderId = folderId;
  }

  override details(): Record<string, unknown> {
    return { file: this.fileName, folder: this.folderId };
  }
}

export class DestinationExistsError extends DriveError {
  readonly path: string;

  constructor(path: string) {
    super("destination_exists", `Destination "${path}" already exists`);
    this.name = "DestinationExistsError";
    this.path = path;
  }

  override details(): Record<string, unknown> {
    return { path: this.path };
  }
}

// ── Non-transactional writes ────────────────────────────────────────

export interface PartialUploadInfo {
  localPath: string;
  fileName: string;
  folderId: string;
  totalParts: number;
  sentParts: number;
  /** Index to pass as `startPart` to resume. */
  nextPart: number;
  /** Files of the same upload stored in full before the failure. */
  completedFiles: UploadedFile[];
}

export class PartialUploadError extends DriveError {
  readonly info: PartialUploadInfo;

  constructor(info: PartialUploadInfo, cause: unknown) {
    const completed =
      info.completedFiles.length > 0 ? `, after ${info.completedFiles.length} complete file(s)` : "";
    super(
      "partial_upload",
      `Upload of "${info.fileName}" stopped at part index ${info.nextPart} of ${info.totalParts} (${info.sentParts} part(s) sent this run${completed}): ${messageOf(cause)}`,
      { cause }
    );
    this.name = "PartialUploadError";
    this.info = info;
  }

  override details(): Record<string, unknown> {
    return { ...this.info };
  }
}

export class PartialRemoveError extends DriveError {
  readonly fileName: string;
  readonly deleted: number;
  readonly total: number;

  constructor(fileName: string, deleted: number, total: number, cause: unknown) {
    super(
      "partial_remove",
      `Removal of "${fileName}" stopped after ${deleted}/${total} message(s); remaining parts must be cleaned up: ${messageOf(cause)}`,
      { cause }
    );
    this.name = "PartialRemoveError";
    this.fileName = fileName;
    this.deleted = deleted;
    this.total = total;
  }

  override details(): Record<string, unknown> {
    return { file: this.fileName, deleted: this.deleted, total: this.total };
  }
}

// ── Environment ─────────────────────────────────────────────────────

export class TransportError extends DriveError {
  readonly operation: string;
  readonly retryable: boolean;

  constructor(operation: string, message: string, options: { cause?: unknown; retryable?: boolean } = {}) {
    super("transport", `${operation} failed: ${message}`, { cause: options.cause });
    this.name = "TransportError";
    this.operation = operation;
    this.retryable = options.retryable ?? true;
  }

  override details(): Record<string, unknown> {
    return { operation: this.operation, retryable: this.retryable };
  }
}

export class ConfigError extends DriveError {
  readonly source: string;
  readonly problems: string[];

  constructor(source: string, problems: string[]) {
    super("invalid_config", `Invalid ${source}: ${problems.join("; ")}`);
    this.name = "ConfigError";
    this.source = source;
    this.problems = problems;
  }

  override details(): Record<string, unknown> {
    return { source: this.source, problems: this.problems };
  }
}

/** Bad command-line usage: unknown command or flag, missing argument. */
export class UsageError extends DriveError {
  constructor(message: string) {
    super("usage", message);
    this.name = "UsageError";
  }
}

/** Best-effort message of an unknown thrown value. */
export function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
