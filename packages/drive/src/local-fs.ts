import { stat } from "node:fs/promises";
import type { Stats } from "node:fs";
import { NotFoundError } from "@mailstash/shared";

export function isErrnoCode(err: unknown, code: string): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === code;
}

/** stat() that reports a missing path as NotFoundError. */
export async function statLocal(localPath: string): Promise<Stats> {
  try {
    return await stat(localPath);
  } catch (err) {
    if (isErrnoCode(err, "ENOENT")) {
      throw new NotFoundError(localPath, `Local path "${localPath}" does not exist`);
    }
    throw err;
  }
}

/** Like statLocal, but null when nothing is there. */
export async function statIfExists(localPath: string): Promise<Stats | null> {
  try {
    return await stat(localPath);
  } catch (err) {
    if (isErrnoCode(err, "ENOENT")) return null;
    throw err;
  }
}
