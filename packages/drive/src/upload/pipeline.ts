import { open, readdir, stat, type FileHandle } from "node:fs/promises";
import { basename, join } from "node:path";
import {
  NameCollisionError,
  NotFoundError,
  PartialUploadError,
  encodeFolderPath,
  encodePartMetadata,
  formatVirtualPath,
  parsePartSubject,
  partCount,
  partRanges,
  validateSegment,
  type PartRange,
  type UploadedFile,
} from "@mailstash/shared";
import type { DriveContext } from "../context.js";
import { statLocal } from "../local-fs.js";

export interface UploadProgress {
  name: string;
  folderPath: string[];
  index: number;
  totalParts: number;
  bytesSent: number;
  totalBytes: number;
}

export interface UploadOptions {
  /** Resume a single-file upload from this part index. */
  startPart?: number;
  /** "allow" (default) uploads a second copy next to an existing file of the same name. */
  onCollision?: "allow" | "reject";
  onProgress?: (progress: UploadProgress) => void;
}

export interface PlannedFile {
  localPath: string;
  folderPath: string[];
  name: string;
  size: number;
}

export interface UploadPlan {
  /** Every destination folder, parents first. */
  folders: string[][];
  files: PlannedFile[];
}

export interface UploadResult {
  folders: string[][];
  files: UploadedFile[];
}

/**
 * Work out what uploading `localPath` into `destFolder` will create.
 * Purely local: every folder name is validated before anything is sent.
 * A directory's contents land in `destFolder`; subdirectories become subfolders.
 */
export async function planUpload(
  ctx: DriveContext,
  localPath: string,
  destFolder: readonly string[]
): Promise<UploadPlan> {
  encodeFolderPath(destFolder, ctx.config);
  const info = await statLocal(localPath);

  if (info.isFile()) {
    return {
      folders: [[...destFolder]],
      files: [{ localPath, folderPath: [...destFolder], name: basename(localPath), size: info.size }],
    };
  }
  if (!info.isDirectory()) {
    throw new NotFoundError(localPath, `"${localPath}" is neither a file nor a directory`);
  }

  const plan: UploadPlan = { folders: [], files: [] };

  const walk = async (dir: string, folderPath: string[]): Promise<void> => {
    plan.folders.push(folderPath);
    const entries = await readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        validateSegment(entry.name, ctx.config.folderSeparator);
        await walk(full, [...folderPath, entry.name]);
      } else if (entry.isFile()) {
        const { size } = await stat(full);
        plan.files.push({ localPath: full, folderPath, name: entry.name, size });
      } else {
        await ctx.logger.warn(`Skipping "${full}": not a regular file or directory`);
      }
    }
  };

  await walk(localPath, [...destFolder]);
  return plan;
}

/**
 * Upload a file or a directory tree into a virtual folder.
 */
export async function uploadPath(
  ctx: DriveContext,
  localPath: string,
  destFolder: readonly string[],
  options: UploadOptions = {}
): Promise<UploadResult> {
  const plan = await planUpload(ctx, localPath, destFolder);
  if (options.startPart !== undefined && plan.files.length !== 1) {
    throw new RangeError("startPart can only be used when uploading a single file");
  }

  for (const folder of plan.folders) {
    await ctx.transport.createFolder(encodeFolderPath(folder, ctx.config));
  }

  const files: UploadedFile[] = [];
  for (const item of plan.files) {
    try {
      files.push(await sendFile(ctx, item, options));
    } catch (err) {
      if (files.length === 0) throw err;
      // Files already stored travel with the error.
      const completedFiles = [...files];
      if (err instanceof PartialUploadError) {
        throw new PartialUploadError({ ...err.info, completedFiles }, err.cause);
      }
      throw new PartialUploadError(
        {
          localPath: item.localPath,
          fileName: item.name,
          folderId: encodeFolderPath(item.folderPath, ctx.config),
          totalParts: partCount(item.size, ctx.config.maxPartSize),
          sentParts: 0,
          nextPart: 0,
          completedFiles,
        },
        err
      );
    }
  }
  await ctx.logger.info(
    `Uploaded ${files.length} file(s) into "${formatVirtualPath(destFolder)}"`
  );
  return { folders: plan.folders, files };
}

/**
 * Upload one file: one message per part, in index order. The destination
 * folder and its ancestors are created if missing.
 */
export async function uploadFile(
  ctx: DriveContext,
  localPath: string,
  destFolder: readonly string[],
  options: UploadOptions = {}
): Promise<UploadedFile> {
  const folderId = encodeFolderPath(destFolder, ctx.config);
  const info = await statLocal(localPath);
  if (!info.isFile()) {
    throw new NotFoundError(localPath, `"${localPath}" is not a regular file`);
  }

  await ctx.transport.createFolder(folderId);
  return sendFile(ctx, {
    localPath,
    folderPath: [...destFolder],
    name: basename(localPath),
    size: info.size,
  }, options);
}

async function sendFile(
  ctx: DriveContext,
  item: PlannedFile,
  options: UploadOptions
): Promise<UploadedFile> {
  const { transport, config, logger } = ctx;
  const folderId = encodeFolderPath(item.folderPath, config);
  const ranges = partRanges(item.size, config.maxPartSize);
  const totalParts = ranges.length;

  const startPart = options.startPart ?? 0;
  if (!Number.isInteger(startPart) || startPart < 0 || startPart >= totalParts) {
    throw new RangeError(`startPart must be in [0, ${totalParts}) for "${item.name}", got ${startPart}`);
  }

  if (startPart === 0 && options.onCollision === "reject") {
    const existing = await transport.listMessages(folderId);
    if (existing.some((m) => parsePartSubject(m.fields.subject ?? "")?.name === item.name)) {
      throw new NameCollisionError(item.name, folderId);
    }
  }

  const handle = await open(item.localPath, "r");
  let sentParts = 0;
  let bytesSent = 0;
  try {
    for (const range of ranges.slice(startPart)) {
      try {
        const payload = await readRange(handle, range, item.localPath);
        const fields = encodePartMetadata({ name: item.name, index: range.index, totalParts });
        const id = await transport.sendMessage(folderId, fields, {
          filename: fields.subject,
          content: payload,
        });
        await logger.debug(`Sent "${fields.subject}" to "${folderId}" (${payload.length} bytes, id ${id ?? "unknown"})`);
        sentParts++;
        bytesSent += payload.length;
      } catch (err) {
        throw new PartialUploadError(
          {
            localPath: item.localPath,
            fileName: item.name,
            folderId,
            totalParts,
            sentParts,
            nextPart: range.index,
            completedFiles: [],
          },
          err
        );
      }
      options.onProgress?.({
        name: item.name,
        folderPath: item.folderPath,
        index: range.index,
        totalParts,
        bytesSent,
        totalBytes: item.size,
      });
    }
  } finally {
    await handle.close();
  }

  await logger.info(`Uploaded "${item.name}" to "${folderId}" in ${totalParts} part(s)`);
  return {
    folderPath: item.folderPath,
    name: item.name,
    size: item.size,
    totalParts,
    sentParts,
  };
}

async function readRange(handle: FileHandle, range: PartRange, path: string): Promise<Buffer> {
  const buf = Buffer.alloc(range.end - range.start);
  let offset = 0;
  while (offset < buf.length) {
    const { bytesRead } = await handle.read(buf, offset, buf.length - offset, range.start + offset);
    if (bytesRead === 0) {
      throw new Error(`"${path}" shrank while it was being uploaded`);
    }
    offset += bytesRead;
  }
  return buf;
}
