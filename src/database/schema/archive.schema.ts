import { pgTable, text, integer, timestamp, index } from 'drizzle-orm/pg-core';

// Channel archive videos whose frames were extracted; a row means "don't fetch again"
export const processedVideosTable = pgTable('processed_videos', {
  videoId: text('video_id').primaryKey(),
  title: text('title').notNull(),
  frameDirectory: text('frame_directory').notNull(),
  framesProduced: integer('frames_produced').notNull(),
  processedAt: timestamp('processed_at').defaultNow().notNull(),
}, (table) => ({
  processedAtIdx: index('idx_processed_videos_processed_at').on(table.processedAt),
}));

// Inferred types
export type ProcessedVideoRow = typeof processedVideosTable.$inferSelect;
export type NewProcessedVideoRow = typeof processedVideosTable.$inferInsert;
