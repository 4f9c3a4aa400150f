import { FALLBACK_TARGET_FPS } from '@/config/constants';
import { ValidationError } from '@/utils/errors';
import type { VideoMetadata } from '@/modules/metadata';
import type { RatePlan, SamplingMode } from './frame-extraction.types';

/**
 * Reject modes that can never produce a rate. Runs before ffprobe so a bad
 * interval fails without spawning anything.
 */
export function assertValidSamplingMode(mode: SamplingMode): void {
  if (mode.kind === 'interval' && !(Number.isFinite(mode.intervalSeconds) && mode.intervalSeconds > 0)) {
    throw new ValidationError('Interval seconds must be greater than 0.');
  }
  if (mode.kind === 'frame-count' && !Number.isInteger(mode.frameCount)) {
    throw new ValidationError(`Frame count must be an integer (got ${mode.frameCount}).`);
  }
}

export function planTargetFps(metadata: Pick<VideoMetadata, 'durationSeconds'>, mode: SamplingMode): RatePlan {
  assertValidSamplingMode(mode);

  if (mode.kind === 'interval') {
    return { targetFps: 1 / mode.intervalSeconds, fallback: false };
  }

  if (metadata.durationSeconds <= 0) {
    return { targetFps: FALLBACK_TARGET_FPS, fallback: true };
  }

  return { targetFps: mode.frameCount / metadata.durationSeconds, fallback: false };
}

export function isUsableRate(targetFps: number): boolean {
  return Number.isFinite(targetFps) && targetFps > 0;
}
