import { join } from "node:path";
import {
  DestinationExistsError,
  InvalidSegmentError,
  assertPartSetComplete,
  atomicWriteFile,
  encodeFolderPath,
  joinParts,
  type Part,
} from "@mailstash/shared";
import type { DriveContext } from "../context.js";
import { statIfExists } from "../local-fs.js";
import { findFileParts } from "./find.js";

export interface DownloadResult {
  path: string;
  size: number;
}

/**
 * Reassemble a logical file. Sets that can't be complete (missing indices,
 * disagreeing totals) fail before any attachment is fetched.
 */
export async function downloadFile(
  ctx: DriveContext,
  folderPath: readonly string[],
  name: string
): Promise<Buffer> {
  const folderId = encodeFolderPath(folderPath, ctx.config);
  const refs = await findFileParts(ctx, folderId, folderPath, name);
  assertPartSetComplete(refs);

  const parts: Part[] = [];
  for (const ref of refs) {
    const payload = await ctx.transport.fetchAttachment(folderId, ref.messageId);
    await ctx.logger.debug(`Fetched part ${ref.index + 1}/${ref.totalParts} of "${name}" (${payload.length} bytes)`);
    parts.push({ name: ref.name, index: ref.index, totalParts: ref.totalParts, payload });
  }
  return joinParts(parts);
}

/**
 * Download into a local file. A directory destination receives a file named
 * after the logical file. Existing files are never overwritten.
 */
export async function downloadToPath(
  ctx: DriveContext,
  folderPath: readonly string[],
  name: string,
  destination: string
): Promise<DownloadResult> {
  let target = destination;
  const existing = await statIfExists(destination);
  if (existing?.isDirectory()) {
    if (name === "." || name === ".." || /[\\/]/.test(name)) {
      throw new InvalidSegmentError(name, "cannot be used as a local file name");
    }
    target = join(destination, name);
    if ((await statIfExists(target)) !== null) {
      throw new DestinationExistsError(target);
    }
  } else if (existing !== null) {
    throw new DestinationExistsError(destination);
  }

  const data = await downloadFile(ctx, folderPath, name);
  await atomicWriteFile(target, data);
  await ctx.logger.info(`Downloaded "${name}" to "${target}" (${data.length} bytes)`);
  return { path: target, size: data.length };
}
