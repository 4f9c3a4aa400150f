/**
 * Frame Extraction Types
 * Sampling modes, requests and results for a single extraction run
 */

/**
 * How frames are sampled. Exactly one mode per request.
 */
export type SamplingMode =
  | { kind: 'frame-count'; frameCount: number } // Total frames spread over the video
  | { kind: 'interval'; intervalSeconds: number }; // Seconds between frames

export interface ExtractionRequest {
  videoPath: string;
  outputDirectory: string;
  mode: SamplingMode;
}

export interface RatePlan {
  targetFps: number;
  fallback: boolean; // Duration was unusable, fixed rate substituted
}

export interface CompletedExtraction {
  status: 'completed';
  videoPath: string;
  outputDirectory: string;
  targetFps: number;
  extractionTimeMs: number;
}

export interface SkippedExtraction {
  status: 'skipped';
  videoPath: string;
  outputDirectory: string;
  reason: string;
}

export type FrameExtractionResult = CompletedExtraction | SkippedExtraction;

export interface FrameExtractor {
  extractFrames(request: ExtractionRequest): Promise<FrameExtractionResult>;
}
