/**
 * Frame Cleanup Types
 */

export interface CleanupResult {
  directory: string | null; // Resolved directory, null when the target did not exist
  deleted: string[];
  failed: string[];
  removedDirectory: boolean;
}

export interface FrameCleaner {
  cleanup(targetPath: string): Promise<CleanupResult>;
}
