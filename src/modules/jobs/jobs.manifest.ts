import { readFile } from 'fs/promises';
import { extname } from 'path';
import { MANIFEST_EXTENSION } from '@/config/constants';
import { FileSystemError, ValidationError, getErrorMessage } from '@/utils/errors';
import { validateSchema } from '@/utils/validation';
import { batchManifestSchema } from './jobs.schemas';
import type { BatchManifest } from './jobs.schemas';

export function isManifestPath(path: string): boolean {
  return extname(path).toLowerCase() === MANIFEST_EXTENSION;
}

export async function loadManifest(manifestPath: string): Promise<BatchManifest> {
  let raw: string;
  try {
    raw = await readFile(manifestPath, 'utf-8');
  } catch (error) {
    throw new FileSystemError(`Failed to read batch file ${manifestPath}: ${getErrorMessage(error)}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`Failed to parse batch file ${manifestPath}: ${getErrorMessage(error)}`);
  }

  return validateSchema(
    batchManifestSchema,
    data,
    `Batch file ${manifestPath} must have a 'videos' key with a list of file paths`,
  );
}
