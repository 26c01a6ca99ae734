import { count, desc, eq } from 'drizzle-orm';
import { db } from '@/config/drizzle';
import { mediaItemsTable } from '@/database/schema';
import type { MediaItemRow, NewMediaItemRow } from '@/database/schema';
import type { Pagination } from '@/utils/validation';
import type { MediaItemRepository } from './media-library.types';

export class DrizzleMediaItemRepository implements MediaItemRepository {
  async findByContentHash(contentHash: string): Promise<MediaItemRow | null> {
    const rows = await db
      .select()
      .from(mediaItemsTable)
      .where(eq(mediaItemsTable.contentHash, contentHash))
      .limit(1);

    return rows[0] ?? null;
  }

  async insert(values: NewMediaItemRow): Promise<MediaItemRow> {
    const rows = await db.insert(mediaItemsTable).values(values).returning();

    if (rows.length === 0) {
      throw new Error('Failed to insert media item');
    }

    return rows[0];
  }

  async list(pagination: Pagination): Promise<{ rows: MediaItemRow[]; total: number }> {
    const { page, limit } = pagination;

    const rows = await db
      .select()
      .from(mediaItemsTable)
      .orderBy(desc(mediaItemsTable.savedAt), desc(mediaItemsTable.id))
      .limit(limit)
      .offset((page - 1) * limit);

    const [{ total }] = await db.select({ total: count() }).from(mediaItemsTable);

    return { rows, total };
  }
}
