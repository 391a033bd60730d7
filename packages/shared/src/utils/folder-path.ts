import { InvalidSegmentError } from "../errors.js";
import type { FolderLayout } from "../types.js";

/** Separator of user-facing virtual paths ("photos/2024/summer"). */
export const VIRTUAL_SEPARATOR = "/";

/**
 * Check that a folder segment can be placed in the mailbox namespace.
 * Segments are never escaped: anything ambiguous is rejected instead.
 */
export function validateSegment(segment: string, separator: string): void {
  if (segment.length === 0) {
    throw new InvalidSegmentError(segment, "segments cannot be empty");
  }
  if (segment === "." || segment === "..") {
    throw new InvalidSegmentError(segment, "relative segments are not allowed");
  }
  if (segment.includes(separator)) {
    throw new InvalidSegmentError(segment, `segments cannot contain the folder separator "${separator}"`);
  }
}

/**
 * Transport folder id of a virtual folder.
 *   []          → "<base>"
 *   ["a", "b"]  → "<base>/a/b"
 */
export function encodeFolderPath(segments: readonly string[], layout: FolderLayout): string {
  for (const segment of segments) {
    validateSegment(segment, layout.folderSeparator);
  }
  return [layout.baseFolder, ...segments].join(layout.folderSeparator);
}

/**
 * Virtual path of a transport folder id.
 * Returns null if the folder isn't the base folder or one of its descendants.
 */
export function decodeFolderPath(folderId: string, layout: FolderLayout): string[] | null {
  const { baseFolder, folderSeparator } = layout;
  if (folderId === baseFolder) return [];

  const prefix = baseFolder + folderSeparator;
  if (!folderId.startsWith(prefix)) return null;

  const segments = folderId.slice(prefix.length).split(folderSeparator);
  if (segments.some((s) => s.length === 0)) return null;
  return segments;
}

/**
 * Parse a user-supplied virtual path. Leading and trailing slashes are
 * ignored; "" and "/" are the root.
 */
export function parseVirtualPath(input: string): string[] {
  const trimmed = input.replace(/^\/+/, "").replace(/\/+$/, "");
  if (trimmed.length === 0) return [];

  const segments = trimmed.split(VIRTUAL_SEPARATOR);
  for (const segment of segments) {
    if (segment.length === 0) {
      throw new InvalidSegmentError(segment, `empty segment in "${input}"`);
    }
  }
  return segments;
}

export function formatVirtualPath(segments: readonly string[]): string {
  return segments.join(VIRTUAL_SEPARATOR);
}

/**
 * Split "a/b/file.txt" into its folder and file name.
 */
export function splitRemotePath(input: string): { folderPath: string[]; name: string } {
  const segments = parseVirtualPath(input);
  const name = segments.pop();
  if (name === undefined) {
    throw new InvalidSegmentError(input, "a file name is required");
  }
  return { folderPath: segments, name };
}
