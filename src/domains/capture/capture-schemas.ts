import { z } from 'zod';
import { IMAGE_FORMATS } from '../config/settings';
import { CaptureValidationError } from './errors';

export const captureRequestSchema = z.object({
  resolution: z.string().trim().toLowerCase().nullish(),
  quality: z.number().int().min(1).max(100).nullish(),
  format: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(IMAGE_FORMATS, { errorMap: () => ({ message: "Format must be either 'jpeg' or 'png'." }) }))
    .nullish(),
  use_extra: z.boolean().nullish().transform((value) => value ?? false),
});

export type CaptureRequest = z.infer<typeof captureRequestSchema>;
export type CaptureRequestInput = z.input<typeof captureRequestSchema>;

/** An absent or null body means every field takes its configured default. */
export function parseCaptureRequest(body: unknown): CaptureRequest {
  const parsed = captureRequestSchema.safeParse(body ?? {});
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new CaptureValidationError(problems);
  }
  return parsed.data;
}

export interface CaptureImageItem {
  index: number;
  image_id: string;
  image_url_or_path: string;
}

export interface CaptureResponse {
  image_id: string;
  image_url_or_path: string;
  /** UTC, ISO-8601 with a `Z` suffix. */
  timestamp: string;
  /** Present only for fan-out requests; index 0 is the primary. */
  images?: CaptureImageItem[];
}
