import { basename, extname, join } from 'path';
import { readdir, rm, stat, unlink } from 'fs/promises';
import type { Stats } from 'fs';
import { FRAME_EXTENSION, FRAMES_DIR_NAME } from '@/config/constants';
import { ValidationError } from '@/utils/errors';
import { logger } from '@/utils/logger';
import type { CleanupResult, FrameCleaner } from './frame-cleanup.types';

const statOrNull = (path: string): Promise<Stats | null> => stat(path).catch(() => null);

export function isFramesDirectoryName(path: string): boolean {
  return basename(path).toLowerCase() === FRAMES_DIR_NAME;
}

/**
 * Deletes extracted PNG frames. The target is either a frames directory or a
 * video's parent directory holding one.
 */
export class FrameCleanupService implements FrameCleaner {
  async cleanup(targetPath: string): Promise<CleanupResult> {
    const targetStats = await statOrNull(targetPath);

    if (!targetStats) {
      logger.warn({ targetPath }, `Path does not exist: '${targetPath}'. Nothing to delete.`);
      return { directory: null, deleted: [], failed: [], removedDirectory: false };
    }

    const directory = await this.resolveDirectory(targetPath, targetStats);
    const result: CleanupResult = { directory, deleted: [], failed: [], removedDirectory: false };

    const pngFiles = await this.listFrameFiles(directory);
    if (pngFiles.length === 0) {
      logger.info({ directory }, `No ${FRAME_EXTENSION} files found in '${directory}'.`);
      return result;
    }

    logger.info({ directory, count: pngFiles.length }, `Deleting ${pngFiles.length} ${FRAME_EXTENSION} files`);

    for (const filePath of pngFiles) {
      try {
        await unlink(filePath);
        result.deleted.push(filePath);
      } catch (error) {
        logger.error({ file: filePath, error }, 'Error deleting file, skipping');
        result.failed.push(filePath);
      }
    }

    result.removedDirectory = await this.removeIfEmptyFramesDirectory(directory);

    return result;
  }

  private async resolveDirectory(targetPath: string, targetStats: Stats): Promise<string> {
    let directory = targetPath;

    if (targetStats.isDirectory() && !isFramesDirectoryName(targetPath)) {
      const candidate = join(targetPath, FRAMES_DIR_NAME);
      const candidateStats = await statOrNull(candidate);

      if (candidateStats?.isDirectory()) {
        directory = candidate;
      } else {
        logger.warn(
          { targetPath },
          `No '${FRAMES_DIR_NAME}' subdirectory in '${targetPath}'. Deleting ${FRAME_EXTENSION} files from it directly.`,
        );
      }
    }

    if (directory === targetPath && !targetStats.isDirectory()) {
      throw new ValidationError(`Resolved path is not a directory: '${directory}'.`);
    }

    return directory;
  }

  private async listFrameFiles(directory: string): Promise<string[]> {
    const entries = await readdir(directory, { withFileTypes: true });

    return entries
      .filter((entry) => entry.isFile() && extname(entry.name) === FRAME_EXTENSION)
      .map((entry) => join(directory, entry.name))
      .sort();
  }

  private async removeIfEmptyFramesDirectory(directory: string): Promise<boolean> {
    if (!isFramesDirectoryName(directory)) {
      return false;
    }

    try {
      const remaining = await readdir(directory);
      if (remaining.length > 0) {
        return false;
      }

      await rm(directory, { recursive: true });
      logger.info({ directory }, `Removed empty frames directory: '${directory}'`);
      return true;
    } catch (error) {
      logger.warn({ directory, error }, 'Could not remove empty frames directory');
      return false;
    }
  }
}
