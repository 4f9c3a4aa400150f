/**
 * Frame Extraction Module
 * Rate planning and FFmpeg-driven frame sampling
 */

export * from './frame-extraction.types';
export * from './frame-extraction.planner';
export * from './frame-extraction.service';
