import { z } from "zod";
import { mediaItemSchema } from "@/modules/media-library/media-library.schemas";

export { errorResponseSchema } from "@/utils/validation";

// Request schemas
// Interval takes any JSON value: anything that isn't a positive integer
// falls back to the default inside the service.
export const createExtractionSchema = z.object({
  sourcePath: z.string().max(4096).nullish(),
  destinationDirectory: z.string().max(4096).nullish(),
  interval: z.unknown(),
});

// Response schemas
const extractionResultSchema = z.object({
  request: z.object({
    sourcePath: z.string(),
    destinationDirectory: z.string(),
    intervalSeconds: z.number(),
  }),
  intervalFallback: z.boolean(),
  commandLine: z.string(),
  checkedPaths: z.array(z.string()),
  producedFiles: z.array(z.string()),
  savedItems: z.array(mediaItemSchema),
  failedHandoffs: z.array(
    z.object({
      filePath: z.string(),
      message: z.string(),
    }),
  ),
  elapsedMs: z.number(),
});

export const extractionResponseSchema = z.object({
  success: z.literal(true),
  data: extractionResultSchema,
  message: z.string().optional(),
});

export const extractionStatusResponseSchema = z.object({
  success: z.literal(true),
  data: z.object({
    busy: z.boolean(),
  }),
});
