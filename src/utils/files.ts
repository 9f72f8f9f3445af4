import { promises as fs } from 'fs';

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Remove a file if present. Resolves to whether anything was removed.
 */
export async function removeIfExists(filePath: string): Promise<boolean> {
  if (!(await fileExists(filePath))) {
    return false;
  }
  await fs.unlink(filePath);
  return true;
}
