import { count, desc, inArray } from 'drizzle-orm';
import { db } from '@/config/drizzle';
import { processedVideosTable } from '@/database/schema';
import type { NewProcessedVideoRow, ProcessedVideoRow } from '@/database/schema';
import type { Pagination } from '@/utils/validation';
import type { ProcessedVideoLedger } from './archive-batch.types';

export class DrizzleProcessedVideoLedger implements ProcessedVideoLedger {
  async findProcessedIds(videoIds: readonly string[]): Promise<Set<string>> {
    if (videoIds.length === 0) {
      return new Set();
    }

    const rows = await db
      .select({ videoId: processedVideosTable.videoId })
      .from(processedVideosTable)
      .where(inArray(processedVideosTable.videoId, [...videoIds]));

    return new Set(rows.map((row) => row.videoId));
  }

  async record(values: NewProcessedVideoRow): Promise<ProcessedVideoRow> {
    const rows = await db
      .insert(processedVideosTable)
      .values(values)
      .onConflictDoUpdate({
        target: processedVideosTable.videoId,
        set: {
          title: values.title,
          frameDirectory: values.frameDirectory,
          framesProduced: values.framesProduced,
          processedAt: values.processedAt,
        },
      })
      .returning();

    if (rows.length === 0) {
      throw new Error('Failed to record processed video');
    }

    return rows[0];
  }

  async list(pagination: Pagination): Promise<{ rows: ProcessedVideoRow[]; total: number }> {
    const { page, limit } = pagination;

    const rows = await db
      .select()
      .from(processedVideosTable)
      .orderBy(desc(processedVideosTable.processedAt))
      .limit(limit)
      .offset((page - 1) * limit);

    const [{ total }] = await db.select({ total: count() }).from(processedVideosTable);

    return { rows, total };
  }
}
