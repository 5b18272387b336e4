import fs from 'fs/promises';
import path from 'path';
import { PersistenceError } from './errors.js';

/**
 * Writes to a temporary sibling, then renames into place.
 * A failed write never leaves a partial file under the final name and
 * surfaces as PersistenceError.
 */
export async function writeFileAtomic(filePath: string, data: string | Buffer): Promise<void> {
  await ensureDirectory(path.dirname(filePath));
  const tmpPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await fs.writeFile(tmpPath, data);
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true });
    throw new PersistenceError(filePath, error);
  }
}

export async function ensureDirectory(directory: string): Promise<void> {
  try {
    await fs.mkdir(directory, { recursive: true });
  } catch (error) {
    throw new PersistenceError(directory, error);
  }
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
