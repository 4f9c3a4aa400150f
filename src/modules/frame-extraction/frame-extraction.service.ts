/**
 * Frame Extraction Service
 * Samples still frames from a video in a single FFmpeg pass
 */

import { basename, join } from 'path';
import { mkdir, stat } from 'fs/promises';
import ffmpeg from 'fluent-ffmpeg';
import { FRAME_FILENAME_PATTERN } from '@/config/constants';
import type { MediaToolchain } from '@/config/toolchain';
import type { MetadataService } from '@/modules/metadata';
import { ExternalToolError, NotFoundError, ValidationError } from '@/utils/errors';
import { logger } from '@/utils/logger';
import { assertValidSamplingMode, isUsableRate, planTargetFps } from './frame-extraction.planner';
import type {
  ExtractionRequest,
  FrameExtractionResult,
  FrameExtractor,
} from './frame-extraction.types';

/**
 * Output options for sampling at a fixed rate. `-vsync 0` passes every
 * sampled frame through instead of duplicating or dropping to match an
 * output frame rate.
 */
export function buildExtractionOptions(targetFps: number): string[] {
  return ['-vf', `fps=${targetFps}`, '-vsync', '0'];
}

export class FrameExtractionService implements FrameExtractor {
  constructor(
    private readonly toolchain: Pick<MediaToolchain, 'ffmpegPath'>,
    private readonly metadataService: Pick<MetadataService, 'probe'>,
  ) {}

  async extractFrames(request: ExtractionRequest): Promise<FrameExtractionResult> {
    const { videoPath, outputDirectory, mode } = request;

    assertValidSamplingMode(mode);
    await this.assertVideoFile(videoPath);

    const metadata = await this.metadataService.probe(videoPath);
    const plan = planTargetFps(metadata, mode);

    if (plan.fallback) {
      logger.warn(
        { videoPath, duration: metadata.durationSeconds, targetFps: plan.targetFps },
        'Video duration is 0 or less, falling back to a fixed sampling rate',
      );
    }

    if (!isUsableRate(plan.targetFps)) {
      logger.error({ videoPath, targetFps: plan.targetFps }, 'Invalid target FPS, frame extraction aborted');
      return {
        status: 'skipped',
        videoPath,
        outputDirectory,
        reason: `Invalid target FPS: ${plan.targetFps}`,
      };
    }

    await mkdir(outputDirectory, { recursive: true });

    const startTime = Date.now();
    await this.runFfmpegExtraction(videoPath, outputDirectory, plan.targetFps);
    const extractionTimeMs = Date.now() - startTime;

    logger.info({ videoPath, timeMs: extractionTimeMs }, `Frames extracted to '${outputDirectory}'`);

    return {
      status: 'completed',
      videoPath,
      outputDirectory,
      targetFps: plan.targetFps,
      extractionTimeMs,
    };
  }

  private async assertVideoFile(videoPath: string): Promise<void> {
    const stats = await stat(videoPath).catch(() => null);

    if (!stats) {
      throw new NotFoundError(`Video file not found at: ${videoPath}`);
    }
    if (!stats.isFile()) {
      throw new ValidationError(`Provided path is not a file: ${videoPath}`);
    }
  }

  private runFfmpegExtraction(videoPath: string, outputDir: string, targetFps: number): Promise<void> {
    const outputPattern = join(outputDir, FRAME_FILENAME_PATTERN);
    const videoName = basename(videoPath);

    return new Promise<void>((resolve, reject) => {
      ffmpeg(videoPath)
        .setFfmpegPath(this.toolchain.ffmpegPath)
        .outputOptions(buildExtractionOptions(targetFps))
        .output(outputPattern)
        .on('start', (commandLine: string) => {
          logger.info({ videoPath }, `FFmpeg command for ${videoName}: ${commandLine}`);
        })
        .on('end', () => {
          logger.debug({ outputPattern }, 'FFmpeg frame extraction completed');
          resolve();
        })
        .on('error', (err: Error, stdout: string | null, stderr: string | null) => {
          logger.error({ videoPath, stdout, stderr }, `FFmpeg process failed for ${videoName}`);
          reject(
            new ExternalToolError(
              `FFmpeg failed during extraction of ${videoName}: ${err.message}`,
              stdout ?? '',
              stderr ?? '',
            ),
          );
        })
        .run();
    });
  }
}
