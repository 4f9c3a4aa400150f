import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync } from 'fs';
import { mkdir, readdir } from 'fs/promises';
import { dirname, join } from 'path';
import { FrameExtractionService, buildExtractionOptions } from '@/modules/frame-extraction';
import type { VideoMetadata } from '@/modules/metadata';
import { ExternalToolError, NotFoundError, ValidationError } from '@/utils/errors';
import { fakeFfmpeg } from '../helpers/fake-ffmpeg';
import type { FakeFfmpegCommand } from '../helpers/fake-ffmpeg';
import { createTempDir, removeTempDir, touch } from '../helpers/test-utils';

vi.mock('fluent-ffmpeg', async () => {
  const { createFakeFfmpegModule } = await import('../helpers/fake-ffmpeg');
  return createFakeFfmpegModule();
});

async function writeFrames(command: FakeFfmpegCommand, count: number): Promise<void> {
  const outputDir = dirname(command.outputPath ?? '');
  for (let i = 1; i <= count; i++) {
    await touch(join(outputDir, `frame_${String(i).padStart(4, '0')}.png`));
  }
}

describe('FrameExtractionService', () => {
  let tempDir: string;
  let videoPath: string;
  let outputDirectory: string;
  let metadata: VideoMetadata;
  const probe = vi.fn(async () => metadata);
  const service = new FrameExtractionService({ ffmpegPath: '/opt/ffmpeg/ffmpeg' }, { probe });

  beforeEach(async () => {
    fakeFfmpeg.reset();
    probe.mockClear();
    metadata = { durationSeconds: 20, width: 640, height: 360, fps: 25 };
    tempDir = await createTempDir();
    videoPath = await touch(join(tempDir, 'clip.mp4'));
    outputDirectory = join(tempDir, 'out', 'nested');
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  it('should build fps sampling options with passthrough sync', () => {
    expect(buildExtractionOptions(0.5)).toEqual(['-vf', 'fps=0.5', '-vsync', '0']);
  });

  it('should create the output directory and run ffmpeg at the planned rate', async () => {
    fakeFfmpeg.runHandler = async (command) => {
      await writeFrames(command, 3);
      return {};
    };

    const result = await service.extractFrames({
      videoPath,
      outputDirectory,
      mode: { kind: 'frame-count', frameCount: 10 },
    });

    expect(fakeFfmpeg.ran).toHaveLength(1);
    const command = fakeFfmpeg.ran[0];
    expect(command.input).toBe(videoPath);
    expect(command.ffmpegPath).toBe('/opt/ffmpeg/ffmpeg');
    expect(command.options).toEqual(['-vf', 'fps=0.5', '-vsync', '0']);
    expect(command.outputPath).toBe(join(outputDirectory, 'frame_%04d.png'));

    expect(result).toEqual({
      status: 'completed',
      videoPath,
      outputDirectory,
      targetFps: 0.5,
      extractionTimeMs: expect.any(Number),
    });
    expect(await readdir(outputDirectory)).toEqual(['frame_0001.png', 'frame_0002.png', 'frame_0003.png']);
  });

  it('should not report frames left over from an earlier run', async () => {
    await touch(join(outputDirectory, 'frame_9999.png'));
    await touch(join(outputDirectory, 'frame_10000.png'));

    const result = await service.extractFrames({
      videoPath,
      outputDirectory,
      mode: { kind: 'interval', intervalSeconds: 2 },
    });

    expect(result).toEqual({
      status: 'completed',
      videoPath,
      outputDirectory,
      targetFps: 0.5,
      extractionTimeMs: expect.any(Number),
    });
  });

  it('should sample at one frame per interval', async () => {
    await service.extractFrames({ videoPath, outputDirectory, mode: { kind: 'interval', intervalSeconds: 4 } });

    expect(fakeFfmpeg.ran[0].options).toEqual(['-vf', 'fps=0.25', '-vsync', '0']);
    expect(existsSync(outputDirectory)).toBe(true);
  });

  it('should use the fixed fallback rate when the duration is unknown', async () => {
    metadata = { ...metadata, durationSeconds: 0 };

    const result = await service.extractFrames({
      videoPath,
      outputDirectory,
      mode: { kind: 'frame-count', frameCount: 10 },
    });

    expect(result.status).toBe('completed');
    expect(fakeFfmpeg.ran[0].options).toEqual(['-vf', 'fps=1', '-vsync', '0']);
  });

  it('should reject a non-positive interval before probing', async () => {
    await expect(
      service.extractFrames({ videoPath, outputDirectory, mode: { kind: 'interval', intervalSeconds: 0 } }),
    ).rejects.toBeInstanceOf(ValidationError);

    expect(probe).not.toHaveBeenCalled();
    expect(fakeFfmpeg.ran).toHaveLength(0);
  });

  it('should skip without raising when the planned rate is not positive', async () => {
    const result = await service.extractFrames({
      videoPath,
      outputDirectory,
      mode: { kind: 'frame-count', frameCount: 0 },
    });

    expect(result).toEqual({
      status: 'skipped',
      videoPath,
      outputDirectory,
      reason: 'Invalid target FPS: 0',
    });
    expect(fakeFfmpeg.ran).toHaveLength(0);
    expect(existsSync(outputDirectory)).toBe(false);
  });

  it('should raise NotFoundError for a missing video', async () => {
    await expect(
      service.extractFrames({
        videoPath: join(tempDir, 'missing.mp4'),
        outputDirectory,
        mode: { kind: 'frame-count', frameCount: 5 },
      }),
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should reject a directory given as the video path', async () => {
    const folder = join(tempDir, 'folder.mp4');
    await mkdir(folder);

    await expect(
      service.extractFrames({ videoPath: folder, outputDirectory, mode: { kind: 'frame-count', frameCount: 5 } }),
    ).rejects.toThrow(`Provided path is not a file: ${folder}`);
    expect(probe).not.toHaveBeenCalled();
  });

  it('should carry stdout and stderr when ffmpeg fails and keep partial frames', async () => {
    fakeFfmpeg.runHandler = async (command) => {
      await writeFrames(command, 1);
      return {
        error: new Error('ffmpeg exited with code 1'),
        stdout: 'partial output',
        stderr: 'Error while decoding stream',
      };
    };

    const error = await service
      .extractFrames({ videoPath, outputDirectory, mode: { kind: 'interval', intervalSeconds: 1 } })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExternalToolError);
    expect(error).toMatchObject({
      message: 'FFmpeg failed during extraction of clip.mp4: ffmpeg exited with code 1',
      stdout: 'partial output',
      stderr: 'Error while decoding stream',
    });
    expect(existsSync(join(outputDirectory, 'frame_0001.png'))).toBe(true);
  });
});
