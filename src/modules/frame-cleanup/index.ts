export * from './frame-cleanup.types';
export * from './frame-cleanup.service';
