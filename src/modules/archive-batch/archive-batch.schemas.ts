import { z } from "zod";

export { errorResponseSchema, paginationSchema } from "@/utils/validation";

const archiveVideoResultSchema = z.discriminatedUnion("status", [
  z.object({
    status: z.literal("processed"),
    videoId: z.string(),
    title: z.string(),
    frameDirectory: z.string(),
    framesProduced: z.number(),
    downloadRemoved: z.boolean(),
  }),
  z.object({
    status: z.literal("download-failed"),
    videoId: z.string(),
    title: z.string(),
    message: z.string(),
  }),
  z.object({
    status: z.literal("extraction-failed"),
    videoId: z.string(),
    title: z.string(),
    reason: z.string(),
    message: z.string(),
  }),
]);

export const archiveBatchRunResponseSchema = z.object({
  success: z.literal(true),
  data: z.object({
    listed: z.number(),
    skipped: z.array(z.string()),
    results: z.array(archiveVideoResultSchema),
    processedCount: z.number(),
    failedCount: z.number(),
    elapsedMs: z.number(),
  }),
  message: z.string().optional(),
});

export const processedVideoSchema = z.object({
  video_id: z.string(),
  title: z.string(),
  frame_directory: z.string(),
  frames_produced: z.number(),
  processed_at: z.string(),
});

export const processedVideoListResponseSchema = z.object({
  success: z.literal(true),
  data: z.array(processedVideoSchema),
  pagination: z.object({
    page: z.number(),
    limit: z.number(),
    total: z.number(),
  }),
});

export const archiveBatchStatusResponseSchema = z.object({
  success: z.literal(true),
  data: z.object({
    running: z.boolean(),
  }),
});
