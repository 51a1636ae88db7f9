import { readFile, writeFile, mkdir, rename, rm, access } from 'fs/promises';
import { dirname } from 'path';

/**
 * Ensure a directory exists, creating it recursively if needed
 */
export async function ensureDir(dirPath: string): Promise<void> {
  try {
    await access(dirPath);
  } catch {
    await mkdir(dirPath, { recursive: true });
  }
}

/**
 * Read file content, returns null if the file doesn't exist
 */
export async function readFileSafeAsync(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
}

/**
 * Write through a temp file and rename, so readers never see a torn file
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  await ensureDir(dirname(filePath));
  const tempPath = `${filePath}.${process.pid}.tmp`;
  await writeFile(tempPath, content, 'utf-8');
  await rename(tempPath, filePath);
}

/**
 * Delete a file; a missing file is not an error
 */
export async function removeFileSafe(filePath: string): Promise<void> {
  await rm(filePath, { force: true });
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
