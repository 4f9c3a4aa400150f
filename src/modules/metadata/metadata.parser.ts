import { ValidationError } from '@/utils/errors';
import { validateSchema } from '@/utils/validation';
import { probeDataSchema, videoDimensionsSchema } from './metadata.schemas';
import type { ProbeData, ProbeStream } from './metadata.schemas';
import type { FrameRateField, VideoMetadata } from './metadata.types';

export const parseNumeric = (value: unknown): number | null => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};

/**
 * Parse an ffprobe rate such as "30000/1001" or "25".
 * Returns null for a zero denominator or anything non-numeric.
 */
export function parseFrameRate(value: unknown): number | null {
  if (typeof value === 'string' && value.includes('/')) {
    const [num, den] = value.split('/').map(parseNumeric);
    if (num === null || den === null || den === 0) {
      return null;
    }
    return num / den;
  }

  return parseNumeric(value);
}

export interface FrameRateStrategy {
  field: FrameRateField;
  parse: (stream: ProbeStream) => number | null;
}

/** Tried in order; the first one yielding a positive rate wins. */
export const FRAME_RATE_STRATEGIES: readonly FrameRateStrategy[] = [
  { field: 'avg_frame_rate', parse: (stream) => parseFrameRate(stream.avg_frame_rate) },
  { field: 'r_frame_rate', parse: (stream) => parseFrameRate(stream.r_frame_rate) },
];

export function resolveFps(
  stream: ProbeStream,
  strategies: readonly FrameRateStrategy[] = FRAME_RATE_STRATEGIES,
): number {
  for (const strategy of strategies) {
    const fps = strategy.parse(stream);
    if (fps !== null && fps > 0) {
      return fps;
    }
  }
  return 0;
}

export function resolveDuration(stream: ProbeStream, format: ProbeData['format']): number {
  return parseNumeric(stream.duration) ?? parseNumeric(format.duration) ?? 0;
}

export function parseProbeData(data: unknown, videoPath: string): VideoMetadata {
  const probe = validateSchema(probeDataSchema, data, `Unexpected ffprobe output for ${videoPath}`);

  const videoStream = probe.streams.find((s) => s.codec_type === 'video');
  if (!videoStream) {
    throw new ValidationError(`No video stream found in ${videoPath}`);
  }

  const { width, height } = validateSchema(
    videoDimensionsSchema,
    videoStream,
    `Video stream in ${videoPath} has no usable dimensions`,
  );

  return {
    durationSeconds: resolveDuration(videoStream, probe.format),
    width,
    height,
    fps: resolveFps(videoStream),
  };
}
