/**
 * @fileoverview Filesystem helpers shared by the fetch and write stages.
 * @module src/utils/internal/fileSystem
 */
import { randomUUID } from 'node:crypto';
import { access, mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

/**
 * Writes `data` to a temporary sibling of `targetPath` and renames it into place,
 * so readers observe either the previous file or the complete new one.
 * The temporary file is removed if any step fails; the original error is rethrown.
 */
export async function atomicWriteFile(
  targetPath: string,
  data: string | Uint8Array,
): Promise<void> {
  const directory = dirname(targetPath);
  const tempPath = join(
    directory,
    `.${basename(targetPath)}.${process.pid}.${randomUUID()}.tmp`,
  );

  await mkdir(directory, { recursive: true });
  try {
    await writeFile(tempPath, data);
    await rename(tempPath, targetPath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}
