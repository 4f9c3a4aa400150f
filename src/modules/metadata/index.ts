/**
 * Metadata Module
 * ffprobe-backed video metadata
 */

export * from './metadata.types';
export * from './metadata.parser';
export * from './metadata.service';
