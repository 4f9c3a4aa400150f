import { z } from 'zod';

export const batchManifestSchema = z.object({
  videos: z.array(z.string().min(1)),
});

export type BatchManifest = z.infer<typeof batchManifestSchema>;
