import {
  MalformedPartError,
  decodePartMetadata,
  inspectPartSet,
  type FileEntry,
  type PartMetadata,
} from "@mailstash/shared";
import type { TransportMessage } from "../transport/types.js";

/** A message known to be one part of a logical file. */
export interface PartRef extends PartMetadata {
  messageId: string;
  size: number;
  date: Date | null;
}

export interface SkippedMessage {
  messageId: string;
  reason: string;
}

export interface FolderContents {
  /** Parts keyed by logical file name. */
  files: Map<string, PartRef[]>;
  skipped: SkippedMessage[];
}

/**
 * Sort a folder's messages into logical files. Messages whose subject
 * doesn't decode are foreign and end up in `skipped`.
 */
export function groupParts(messages: readonly TransportMessage[]): FolderContents {
  const files = new Map<string, PartRef[]>();
  const skipped: SkippedMessage[] = [];

  for (const msg of messages) {
    let meta: PartMetadata;
    try {
      meta = decodePartMetadata(msg.fields);
    } catch (err) {
      if (!(err instanceof MalformedPartError)) throw err;
      skipped.push({ messageId: msg.id, reason: err.message });
      continue;
    }

    const ref: PartRef = {
      ...meta,
      messageId: msg.id,
      size: msg.attachments.reduce((sum, a) => sum + a.size, 0),
      date: msg.date,
    };
    const parts = files.get(meta.name);
    if (parts) parts.push(ref);
    else files.set(meta.name, [ref]);
  }

  return { files, skipped };
}

/** Listing entry of one logical file, computed from its parts' metadata. */
export function summarizeFile(folderPath: string[], name: string, parts: readonly PartRef[]): FileEntry {
  const { declaredCounts, present, missing } = inspectPartSet(parts);

  const sizeByIndex = new Map<number, number>();
  let newest: Date | null = null;
  for (const part of parts) {
    if (!sizeByIndex.has(part.index)) sizeByIndex.set(part.index, part.size);
    if (part.date && (newest === null || part.date.getTime() > newest.getTime())) newest = part.date;
  }

  return {
    kind: "file",
    folderPath,
    name,
    totalParts: Math.max(...declaredCounts),
    partsPresent: present.length,
    size: [...sizeByIndex.values()].reduce((sum, size) => sum + size, 0),
    valid: declaredCounts.length === 1 && missing.length === 0,
    lastModified: newest ? newest.toISOString() : null,
  };
}
