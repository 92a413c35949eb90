import { mkdir, mkdtemp, rm } from 'fs/promises';
import { join } from 'path';

/**
 * Runs `use` with the path of a fresh temporary file and removes it afterwards,
 * whether `use` resolves or throws.
 *
 * The file lives alone in a new directory created under `parentDir`, so the
 * whole directory can be dropped on release. The file itself is not created;
 * callers write to the path.
 */
export async function withTempFile<T>(
  parentDir: string,
  prefix: string,
  use: (filePath: string) => Promise<T>,
): Promise<T> {
  await mkdir(parentDir, { recursive: true });
  const dir = await mkdtemp(join(parentDir, prefix));

  try {
    return await use(join(dir, 'download'));
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
