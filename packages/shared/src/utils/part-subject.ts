import { InvalidSegmentError, MalformedPartError } from "../errors.js";
import type { MessageFields, PartMetadata } from "../types.js";

/**
 * Subject of a part message, in the format:
 *   <escaped name>.part<index + 1>of<totalParts>
 *
 * Example: report.pdf.part2of3
 *
 * The marker is matched at the end of the subject, so names that themselves
 * contain ".part" keep working. `%`, `/`, `=`, `?` and control characters
 * are percent-encoded, and so is whitespace at either end of the name: mail
 * libraries trim subjects and decode `=?...?=` sequences.
 */
const PART_SUBJECT_PATTERN = /^(.+)\.part([1-9]\d*)of([1-9]\d*)$/;

const ESCAPED_CHARS = /[%\/=?\u0000-\u001f\u007f]/g;
const EDGE_WHITESPACE = /^\s+|\s+$/g;

export function partSubject(meta: PartMetadata): string {
  const { name, index, totalParts } = meta;
  if (name.length === 0) {
    throw new InvalidSegmentError(name, "file names cannot be empty");
  }
  if (!Number.isInteger(totalParts) || totalParts < 1) {
    throw new RangeError(`totalParts must be a positive integer, got ${totalParts}`);
  }
  if (!Number.isInteger(index) || index < 0 || index >= totalParts) {
    throw new RangeError(`index must be in [0, ${totalParts}), got ${index}`);
  }
  return `${escapeName(name)}.part${index + 1}of${totalParts}`;
}

/**
 * Parse a part subject back into its metadata.
 * Returns null if the subject doesn't match the expected pattern.
 */
export function parsePartSubject(subject: string): PartMetadata | null {
  const match = subject.match(PART_SUBJECT_PATTERN);
  if (!match) return null;

  const [, escapedName, partNumber, total] = match;
  const name = unescapeName(escapedName);
  if (name === null) return null;

  const index = Number(partNumber) - 1;
  const totalParts = Number(total);
  if (!Number.isSafeInteger(totalParts) || index >= totalParts) return null;

  return { name, index, totalParts };
}

export function encodePartMetadata(meta: PartMetadata): MessageFields {
  return { subject: partSubject(meta) };
}

/** Like parsePartSubject, but says why a message is not one of ours. */
export function decodePartMetadata(fields: Partial<MessageFields>): PartMetadata {
  const subject = fields.subject;
  if (subject === undefined || subject.length === 0) {
    throw new MalformedPartError("", "missing subject");
  }

  const match = subject.match(PART_SUBJECT_PATTERN);
  if (!match) {
    throw new MalformedPartError(subject, "no .part<N>of<TOTAL> marker");
  }

  const parsed = parsePartSubject(subject);
  if (parsed === null) {
    const [, , partNumber, total] = match;
    if (Number(partNumber) > Number(total)) {
      throw new MalformedPartError(subject, `part ${partNumber} is beyond the declared total of ${total}`);
    }
    throw new MalformedPartError(subject, "invalid name escape or counter");
  }
  return parsed;
}

function escapeName(name: string): string {
  return name
    .replace(ESCAPED_CHARS, (char) => `%${char.charCodeAt(0).toString(16).toUpperCase().padStart(2, "0")}`)
    .replace(EDGE_WHITESPACE, (run) => [...run].map((char) => encodeURIComponent(char)).join(""));
}

function unescapeName(escaped: string): string | null {
  try {
    return decodeURIComponent(escaped);
  } catch {
    return null;
  }
}
