import { DEFAULTS, encodePartMetadata, type DriveConfig } from "@mailstash/shared";
import { Logger } from "./logger.js";
import { MemoryTransport } from "./transport/memory-transport.js";

export interface MemoryContext {
  transport: MemoryTransport;
  config: DriveConfig;
  logger: Logger;
}

/** Drive context over an in-memory mailbox, for tests. */
export function memoryContext(overrides: Partial<DriveConfig> & { trashFolder?: string } = {}): MemoryContext {
  const { trashFolder, ...config } = overrides;
  const resolved: DriveConfig = {
    baseFolder: DEFAULTS.baseFolder,
    folderSeparator: DEFAULTS.folderSeparator,
    maxPartSize: DEFAULTS.maxPartSize,
    ...config,
  };
  return {
    transport: new MemoryTransport({ folderSeparator: resolved.folderSeparator, trashFolder }),
    config: resolved,
    logger: Logger.quiet(),
  };
}

/** Store one part message directly, bypassing the upload pipeline. */
export async function putPart(
  ctx: MemoryContext,
  folderId: string,
  name: string,
  index: number,
  totalParts: number,
  payload: string
): Promise<string> {
  const fields = encodePartMetadata({ name, index, totalParts });
  return ctx.transport.sendMessage(folderId, fields, {
    filename: fields.subject,
    content: Buffer.from(payload),
  });
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}
