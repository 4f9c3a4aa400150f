import { z } from 'zod';

// ffprobe reports numbers as strings ("30000/1001", "N/A"); fluent-ffmpeg
// converts the plain numeric ones, so both shapes show up here
const rawValue = z.union([z.number(), z.string()]).optional();

export const probeStreamSchema = z
  .object({
    codec_type: z.string().optional(),
    width: rawValue,
    height: rawValue,
    duration: rawValue,
    avg_frame_rate: rawValue,
    r_frame_rate: rawValue,
  })
  .passthrough();

export const probeDataSchema = z.object({
  streams: z.array(probeStreamSchema),
  format: z
    .object({
      duration: rawValue,
    })
    .passthrough()
    .default({}),
});

export const videoDimensionsSchema = z.object({
  width: z.coerce.number().int().positive(),
  height: z.coerce.number().int().positive(),
});

export type ProbeStream = z.infer<typeof probeStreamSchema>;
export type ProbeData = z.infer<typeof probeDataSchema>;
