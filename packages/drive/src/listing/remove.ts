import { PartialRemoveError, encodeFolderPath } from "@mailstash/shared";
import type { DriveContext } from "../context.js";
import { findFileParts } from "./find.js";

export interface RemoveResult {
  deleted: number;
}

/**
 * Delete every message of a logical file. Not atomic: a failure after some
 * deletions raises PartialRemoveError with the number already gone.
 */
export async function removeFile(
  ctx: DriveContext,
  folderPath: readonly string[],
  name: string
): Promise<RemoveResult> {
  const folderId = encodeFolderPath(folderPath, ctx.config);
  const parts = await findFileParts(ctx, folderId, folderPath, name);

  let deleted = 0;
  for (const part of parts) {
    try {
      await ctx.transport.deleteMessage(folderId, part.messageId);
    } catch (err) {
      if (deleted === 0) throw err;
      throw new PartialRemoveError(name, deleted, parts.length, err);
    }
    deleted++;
  }

  await ctx.logger.info(`Removed "${name}" from "${folderId}" (${deleted} message(s))`);
  return { deleted };
}
