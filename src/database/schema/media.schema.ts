import { pgTable, serial, text, integer, timestamp, index } from 'drizzle-orm/pg-core';

// Media library items (frames saved out of an extraction)
export const mediaItemsTable = pgTable('media_items', {
  id: serial('id').primaryKey(),
  sourceFramePath: text('source_frame_path').notNull(),
  filePath: text('file_path').notNull().unique(),
  fileSizeBytes: integer('file_size_bytes').notNull(),
  width: integer('width'),
  height: integer('height'),
  contentHash: text('content_hash').notNull().unique(),
  savedAt: timestamp('saved_at').defaultNow().notNull(),
}, (table) => ({
  savedAtIdx: index('idx_media_items_saved_at').on(table.savedAt),
}));

// Inferred types
export type MediaItemRow = typeof mediaItemsTable.$inferSelect;
export type NewMediaItemRow = typeof mediaItemsTable.$inferInsert;
