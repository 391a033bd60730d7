import { NotFoundError, formatVirtualPath } from "@mailstash/shared";
import type { DriveContext } from "../context.js";
import { groupParts, type PartRef, type SkippedMessage } from "./group.js";

export async function logSkipped(
  ctx: DriveContext,
  folderId: string,
  skipped: readonly SkippedMessage[]
): Promise<void> {
  for (const skip of skipped) {
    await ctx.logger.debug(`Skipping message ${skip.messageId} in "${folderId}": ${skip.reason}`);
  }
}

/**
 * Every part message of `name` in a folder, ordered by index.
 * Throws NotFoundError when there is none.
 */
export async function findFileParts(
  ctx: DriveContext,
  folderId: string,
  folderPath: readonly string[],
  name: string
): Promise<PartRef[]> {
  const { files, skipped } = groupParts(await ctx.transport.listMessages(folderId));
  await logSkipped(ctx, folderId, skipped);

  const parts = files.get(name);
  if (!parts) {
    const path = formatVirtualPath([...folderPath, name]);
    throw new NotFoundError(path, `File "${path}" was not found`);
  }
  return [...parts].sort((a, b) => a.index - b.index);
}
