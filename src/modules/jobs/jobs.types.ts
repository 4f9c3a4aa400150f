import type { SamplingMode } from '@/modules/frame-extraction';

export interface ExtractJobOptions {
  path: string; // Single video, or a .json batch manifest
  outputDir?: string; // Only honoured when exactly one video is processed
  mode: SamplingMode;
}

export interface FailedVideo {
  videoPath: string;
  message: string;
}

export interface ExtractRunSummary {
  total: number;
  completed: string[];
  skipped: string[];
  failed: FailedVideo[];
}
