import { existsSync } from 'fs';
import { basename, dirname, join } from 'path';
import { FRAMES_DIR_NAME } from '@/config/constants';
import type { CleanupResult, FrameCleaner } from '@/modules/frame-cleanup';
import type { FrameExtractor } from '@/modules/frame-extraction';
import { NotFoundError, getErrorMessage } from '@/utils/errors';
import { logger } from '@/utils/logger';
import { isManifestPath, loadManifest } from './jobs.manifest';
import type { ExtractJobOptions, ExtractRunSummary } from './jobs.types';

export interface JobsDependencies {
  // Called once per extract run; resolving the toolchain may throw
  getExtractor: () => FrameExtractor;
  cleaner: FrameCleaner;
}

export function defaultOutputDirectory(videoPath: string): string {
  return join(dirname(videoPath), FRAMES_DIR_NAME);
}

/**
 * Turns a CLI invocation into extraction or cleanup work. Videos run one at
 * a time in manifest order; a failing video never stops the batch.
 */
export class JobsService {
  constructor(private readonly deps: JobsDependencies) {}

  async runExtract(options: ExtractJobOptions): Promise<ExtractRunSummary> {
    const extractor = this.deps.getExtractor();
    const videos = await this.resolveVideos(options.path);

    logger.info({ count: videos.length }, `Found ${videos.length} video(s) to process.`);

    const summary: ExtractRunSummary = { total: videos.length, completed: [], skipped: [], failed: [] };
    const customOutputDir = videos.length === 1 ? options.outputDir : undefined;

    if (videos.length > 1 && options.outputDir !== undefined) {
      logger.warn({ outputDir: options.outputDir }, 'Custom output directory is ignored for batch processing');
    }

    for (const videoPath of videos) {
      const outputDirectory = customOutputDir ?? defaultOutputDirectory(videoPath);

      try {
        const result = await extractor.extractFrames({ videoPath, outputDirectory, mode: options.mode });

        if (result.status === 'completed') {
          summary.completed.push(videoPath);
        } else {
          summary.skipped.push(videoPath);
        }
      } catch (error) {
        const message = getErrorMessage(error);
        logger.error(
          { videoPath, error: message },
          `Could not process '${basename(videoPath)}': ${message}. Continuing to next video.`,
        );
        summary.failed.push({ videoPath, message });
      }
    }

    logger.info(
      {
        total: summary.total,
        completed: summary.completed.length,
        skipped: summary.skipped.length,
        failed: summary.failed.length,
      },
      'Extraction run finished',
    );

    return summary;
  }

  async runDelete(targetPath: string): Promise<CleanupResult> {
    return this.deps.cleaner.cleanup(targetPath);
  }

  private async resolveVideos(inputPath: string): Promise<string[]> {
    if (!existsSync(inputPath)) {
      throw new NotFoundError(`Input path does not exist: ${inputPath}`);
    }

    if (!isManifestPath(inputPath)) {
      return [inputPath];
    }

    logger.info({ inputPath }, 'Detected JSON file for batch processing');
    const manifest = await loadManifest(inputPath);
    return manifest.videos;
  }
}
