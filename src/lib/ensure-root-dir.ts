import { mkdir, stat } from 'fs/promises';
import * as path from 'path';
import type { Logger } from '../types.ts';
import { errorCode } from './errors.ts';

/**
 * Make sure the download directory exists, creating it (and its parents) if needed.
 *
 * @returns Absolute path of the directory
 * @throws Error if the path exists but is not a directory, or cannot be created
 */
export async function ensureRootDir(rootDir: string, logger: Logger): Promise<string> {
  const resolved = path.resolve(rootDir);

  try {
    const stats = await stat(resolved);
    if (stats.isDirectory()) return resolved;
  } catch (error) {
    if (errorCode(error) !== 'ENOENT') throw error;
    await mkdir(resolved, { recursive: true, mode: 0o755 });
    logger.info(`Created directory '${resolved}'`);
    return resolved;
  }

  throw new Error(`Download directory path exists but is not a directory: ${resolved}`);
}
