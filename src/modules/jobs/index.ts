/**
 * Jobs Module
 * Resolves CLI input into sequential extraction and cleanup runs
 */

export * from './jobs.types';
export * from './jobs.schemas';
export * from './jobs.manifest';
export * from './jobs.service';
