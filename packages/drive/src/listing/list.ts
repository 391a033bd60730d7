import {
  decodeFolderPath,
  encodeFolderPath,
  type FolderEntry,
  type ListingEntry,
} from "@mailstash/shared";
import type { DriveContext } from "../context.js";
import { logSkipped } from "./find.js";
import { groupParts, summarizeFile } from "./group.js";

export interface ListOptions {
  recurse?: boolean;
  /** Levels below the listed folder whose contents are shown. Unlimited when omitted. */
  maxDepth?: number;
}

interface FolderNode {
  /** Null for folders only implied by a deeper mailbox. */
  folderId: string | null;
  children: Map<string, FolderNode>;
}

/**
 * Entries of a virtual folder: its files (by name), then each subfolder
 * followed by that subfolder's own entries when within the depth limit.
 *
 * Every iteration queries the transport afresh.
 */
export function listFolder(
  ctx: DriveContext,
  folderPath: readonly string[],
  options: ListOptions = {}
): AsyncIterable<ListingEntry> {
  const rootId = encodeFolderPath(folderPath, ctx.config);
  const { maxDepth } = options;
  if (options.recurse && maxDepth !== undefined && (!Number.isInteger(maxDepth) || maxDepth < 0)) {
    throw new RangeError(`maxDepth must be a non-negative integer, got ${maxDepth}`);
  }
  const depthLimit = options.recurse ? (maxDepth ?? Infinity) : 0;

  return {
    [Symbol.asyncIterator]: () => walk(ctx, [...folderPath], rootId, depthLimit),
  };
}

/** Virtual paths of every folder below the base folder, sorted. */
export async function listAllFolders(ctx: DriveContext): Promise<string[][]> {
  const { baseFolder } = ctx.config;
  const tree = await folderTree(ctx, baseFolder, []);

  const paths: string[][] = [];
  const collect = (node: FolderNode, path: string[]): void => {
    for (const name of sortedNames(node.children)) {
      const child = node.children.get(name);
      if (!child) continue;
      paths.push([...path, name]);
      collect(child, [...path, name]);
    }
  };
  collect(tree, []);
  return paths;
}

async function* walk(
  ctx: DriveContext,
  rootPath: string[],
  rootId: string,
  depthLimit: number
): AsyncGenerator<ListingEntry> {
  const root = await folderTree(ctx, rootId, rootPath);

  async function* visit(node: FolderNode, path: string[], depth: number): AsyncGenerator<ListingEntry> {
    if (node.folderId !== null) {
      const messages = await ctx.transport.listMessages(node.folderId);
      const { files, skipped } = groupParts(messages);
      await logSkipped(ctx, node.folderId, skipped);
      for (const name of sortedNames(files)) {
        const parts = files.get(name);
        if (parts) yield summarizeFile([...path], name, parts);
      }
    }

    for (const name of sortedNames(node.children)) {
      const child = node.children.get(name);
      if (!child) continue;
      const entry: FolderEntry = { kind: "folder", folderPath: [...path], name };
      yield entry;
      if (depth + 1 <= depthLimit) {
        yield* visit(child, [...path, name], depth + 1);
      }
    }
  }

  yield* visit(root, rootPath, 0);
}

/**
 * Folder hierarchy below `rootId`, built from the transport's folder list.
 * Intermediate folders with no mailbox of their own are included.
 */
async function folderTree(ctx: DriveContext, rootId: string, rootPath: string[]): Promise<FolderNode> {
  const root: FolderNode = { folderId: rootId, children: new Map() };

  for (const id of await ctx.transport.listFolders(rootId)) {
    const segments = decodeFolderPath(id, ctx.config);
    if (segments === null || segments.length <= rootPath.length) continue;
    if (!rootPath.every((segment, i) => segments[i] === segment)) continue;

    let node = root;
    for (const segment of segments.slice(rootPath.length)) {
      let child = node.children.get(segment);
      if (!child) {
        child = { folderId: null, children: new Map() };
        node.children.set(segment, child);
      }
      node = child;
    }
    node.folderId = id;
  }
  return root;
}

function sortedNames(map: Map<string, unknown>): string[] {
  return [...map.keys()].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}
