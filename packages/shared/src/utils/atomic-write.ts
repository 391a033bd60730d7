import { writeFile, rename, mkdir, rm } from "node:fs/promises";
import { dirname } from "node:path";
import { randomBytes } from "node:crypto";

/**
 * Write data to a file atomically by writing to a .tmp sibling first,
 * then renaming. Prevents partial reads, and partial files on failure.
 */
export async function atomicWriteFile(
  filePath: string,
  data: string | Uint8Array
): Promise<void> {
  const dir = dirname(filePath);
  await mkdir(dir, { recursive: true });

  const tmpName = `${filePath}.${randomBytes(6).toString("hex")}.tmp`;
  try {
    await writeFile(tmpName, data);
    await rename(tmpName, filePath);
  } catch (err) {
    await rm(tmpName, { force: true });
    throw err;
  }
}
