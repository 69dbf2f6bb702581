import { promises as fs } from 'fs';

/** True if `target` exists, following symlinks so a dangling link counts as missing */
export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.stat(target);
    return true;
  } catch (e) {
    if (isFsError(e) && (e.code === 'ENOENT' || e.code === 'ENOTDIR')) return false;
    throw e;
  }
}

export function isFsError(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'syscall' in e && typeof e.syscall === 'string';
}

/** Move a file, replacing `dest` where the platform does not overwrite on rename */
export async function moveFile(source: string, dest: string, platform: NodeJS.Platform = process.platform): Promise<void> {
  if (source === dest) return;
  if (platform === 'win32') await fs.rm(dest, { force: true });
  await fs.rename(source, dest);
}
