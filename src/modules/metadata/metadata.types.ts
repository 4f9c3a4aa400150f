/**
 * Metadata Types
 * Values read from ffprobe for a single video
 */

export interface VideoMetadata {
  durationSeconds: number; // 0 when neither the stream nor the container reports one
  width: number;
  height: number;
  fps: number; // 0 when no frame rate field is usable
}

export type FrameRateField = 'avg_frame_rate' | 'r_frame_rate';
