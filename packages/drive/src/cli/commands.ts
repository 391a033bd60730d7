import {
  UsageError,
  formatVirtualPath,
  parseVirtualPath,
  splitRemotePath,
  type ListingEntry,
} from "@mailstash/shared";
import type { DriveContext } from "../context.js";
import { downloadToPath, listAllFolders, listFolder, removeFile } from "../listing/index.js";
import { uploadPath } from "../upload/index.js";
import { integerFlag, type ParsedArgs } from "./args.js";

export const USAGE = [
  "list, ls [remote-folder]      List files and folders (--recurse/-r, --max-depth N, --long/-l)",
  "download, d <remote> <local>  Download a file; <local> may be a directory",
  "upload, u <local>             Upload a file or directory into --folder (--start-part N, --reject-existing)",
  "remove, rm <remote>           Delete every part of a file",
  "list-folders, lsf             List every folder",
  "help                          Show this help",
  "",
  "Global flags:",
  "  --credentials, -c PATH  credentials JSON (default ./credentials.json, then ~/.config/mailstash/credentials.json)",
  "  --folder, -f PATH       virtual folder to work in (default: the root)",
  "  --root NAME             mailbox folder holding everything (default: mailstash)",
  "  --trash NAME            move removed messages to this folder instead of deleting them",
  "  --debug                 verbose logging and error details",
];

/** Output of `mailstash help`, which needs no connection. */
export function helpData(): { commands: string[] } {
  return { commands: [...USAGE] };
}

function requireArg(parsed: ParsedArgs, index: number, name: string): string {
  const value = parsed.args[index];
  if (value === undefined) {
    throw new UsageError(`${parsed.command} needs <${name}>. Run: mailstash help`);
  }
  return value;
}

function workingFolder(parsed: ParsedArgs): string[] {
  return parseVirtualPath(parsed.flags.folder ?? "");
}

/** A remote path relative to --folder. */
function remoteFile(parsed: ParsedArgs, remote: string): { folderPath: string[]; name: string } {
  const { folderPath, name } = splitRemotePath(remote);
  return { folderPath: [...workingFolder(parsed), ...folderPath], name };
}

function shortEntry(entry: ListingEntry): string {
  const path = formatVirtualPath([...entry.folderPath, entry.name]);
  if (entry.kind === "folder") return `${path}/`;
  return entry.valid ? path : `${path} [invalid]`;
}

/**
 * Run a parsed command against a connected drive and return its JSON data.
 */
export async function runCommand(ctx: DriveContext, parsed: ParsedArgs): Promise<unknown> {
  const { flags } = parsed;

  switch (parsed.command) {
    case "list": {
      const folder = [...workingFolder(parsed), ...parseVirtualPath(parsed.args[0] ?? "")];
      const entries: ListingEntry[] = [];
      for await (const entry of listFolder(ctx, folder, {
        recurse: flags.recurse === "true",
        maxDepth: integerFlag(flags, "max-depth"),
      })) {
        entries.push(entry);
      }
      return flags.long === "true" ? entries : entries.map(shortEntry);
    }

    case "download": {
      const { folderPath, name } = remoteFile(parsed, requireArg(parsed, 0, "remote"));
      const local = requireArg(parsed, 1, "local");
      return downloadToPath(ctx, folderPath, name, local);
    }

    case "upload": {
      const local = requireArg(parsed, 0, "local");
      const result = await uploadPath(ctx, local, workingFolder(parsed), {
        startPart: integerFlag(flags, "start-part"),
        onCollision: flags["reject-existing"] === "true" ? "reject" : "allow",
      });
      return {
        folders: result.folders.map(formatVirtualPath),
        files: result.files.map((file) => ({
          path: formatVirtualPath([...file.folderPath, file.name]),
          size: file.size,
          totalParts: file.totalParts,
          sentParts: file.sentParts,
        })),
      };
    }

    case "remove": {
      const { folderPath, name } = remoteFile(parsed, requireArg(parsed, 0, "remote"));
      const { deleted } = await removeFile(ctx, folderPath, name);
      return { path: formatVirtualPath([...folderPath, name]), deleted };
    }

    case "list-folders":
      return (await listAllFolders(ctx)).map(formatVirtualPath);

    default:
      throw new UsageError(`Unknown command "${parsed.command}". Run: mailstash help`);
  }
}
