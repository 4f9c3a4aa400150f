import { existsSync } from 'fs';
import ffmpeg from 'fluent-ffmpeg';
import type { FfprobeData } from 'fluent-ffmpeg';
import type { MediaToolchain } from '@/config/toolchain';
import { ExternalToolError, NotFoundError, getErrorMessage } from '@/utils/errors';
import { logger } from '@/utils/logger';
import { parseProbeData } from './metadata.parser';
import type { VideoMetadata } from './metadata.types';

export class MetadataService {
  constructor(private readonly toolchain: Pick<MediaToolchain, 'ffprobePath'>) {}

  async probe(videoPath: string): Promise<VideoMetadata> {
    if (!existsSync(videoPath)) {
      throw new NotFoundError(`Video file not found: ${videoPath}`);
    }

    const startTime = Date.now();
    const data = await this.runProbe(videoPath);
    const metadata = parseProbeData(data, videoPath);
    const durationMs = Date.now() - startTime;

    logger.debug(
      {
        videoPath,
        durationMs,
        metadata: {
          duration: metadata.durationSeconds,
          resolution: `${metadata.width}x${metadata.height}`,
          fps: metadata.fps,
        },
      },
      `ffprobe completed in ${durationMs}ms`,
    );

    if (metadata.durationSeconds <= 0 || metadata.fps <= 0) {
      logger.warn(
        { videoPath, duration: metadata.durationSeconds, fps: metadata.fps },
        'Invalid video metadata',
      );
    }

    return metadata;
  }

  private runProbe(videoPath: string): Promise<FfprobeData> {
    return new Promise((resolve, reject) => {
      ffmpeg(videoPath)
        .setFfprobePath(this.toolchain.ffprobePath)
        .ffprobe((err: unknown, data: FfprobeData) => {
          if (err) {
            const diagnostic = getErrorMessage(err);
            logger.error({ videoPath, error: diagnostic }, 'ffprobe failed');
            reject(
              new ExternalToolError(
                `Could not get video metadata for ${videoPath}: ${diagnostic}`,
                '',
                diagnostic,
              ),
            );
            return;
          }
          resolve(data);
        });
    });
  }
}
