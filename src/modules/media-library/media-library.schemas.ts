import { z } from "zod";

export { paginationSchema } from "@/utils/validation";

export const mediaItemSchema = z.object({
  id: z.number(),
  source_frame_path: z.string(),
  file_path: z.string(),
  file_size_bytes: z.number(),
  width: z.number().nullable(),
  height: z.number().nullable(),
  content_hash: z.string(),
  saved_at: z.string(),
});

export const mediaItemListResponseSchema = z.object({
  success: z.literal(true),
  data: z.array(mediaItemSchema),
  pagination: z.object({
    page: z.number(),
    limit: z.number(),
    total: z.number(),
  }),
});
