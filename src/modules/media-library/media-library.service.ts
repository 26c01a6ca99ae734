/**
 * Media Library Service
 * Copies extracted frames into the managed library directory and indexes them.
 * Identical content is stored once.
 */

import { copyFile, mkdir, rm, stat } from 'fs/promises';
import { extname, join } from 'path';
import sharp from 'sharp';
import { env } from '@/config/env';
import type { MediaItemRow } from '@/database/schema';
import { NotFoundError } from '@/utils/errors';
import { computeFileHash, formatBytes } from '@/utils/file-utils';
import { logger } from '@/utils/logger';
import type { Pagination } from '@/utils/validation';
import { DrizzleMediaItemRepository } from './media-library.repository';
import type {
  MediaItem,
  MediaItemPage,
  MediaItemRepository,
  MediaLibraryWriter,
} from './media-library.types';

export class MediaLibraryService implements MediaLibraryWriter {
  constructor(
    private readonly repository: MediaItemRepository,
    private readonly libraryDir: string = env.MEDIA_LIBRARY_DIR,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async save(filePath: string): Promise<MediaItem> {
    const stats = await stat(filePath).catch(() => null);
    if (!stats || !stats.isFile()) {
      throw new NotFoundError(`Frame file not found: ${filePath}`);
    }

    const contentHash = await computeFileHash(filePath);

    const existing = await this.repository.findByContentHash(contentHash);
    if (existing) {
      logger.debug({ filePath, mediaItemId: existing.id }, 'Frame already in media library');
      return this.mapToSnakeCase(existing);
    }

    // One folder per day, files named after their content hash
    const savedAt = this.clock();
    const day = savedAt.toISOString().slice(0, 10);
    const targetDir = join(this.libraryDir, day);
    await mkdir(targetDir, { recursive: true });

    const targetPath = join(targetDir, `${contentHash}${extname(filePath).toLowerCase()}`);
    await copyFile(filePath, targetPath);

    const { width, height } = await this.readDimensions(targetPath);

    let row: MediaItemRow;
    try {
      row = await this.repository.insert({
        sourceFramePath: filePath,
        filePath: targetPath,
        fileSizeBytes: stats.size,
        width,
        height,
        contentHash,
        savedAt,
      });
    } catch (error) {
      // Another writer may have indexed the same content meanwhile; its row owns the file
      const winner = await this.repository.findByContentHash(contentHash);
      if (winner && winner.filePath === targetPath) {
        logger.debug({ filePath, mediaItemId: winner.id }, 'Frame indexed concurrently');
        return this.mapToSnakeCase(winner);
      }

      await rm(targetPath, { force: true });
      throw error;
    }

    logger.debug(
      { filePath, targetPath, size: formatBytes(stats.size) },
      'Frame saved to media library',
    );

    return this.mapToSnakeCase(row);
  }

  async list(pagination: Pagination): Promise<MediaItemPage> {
    const { rows, total } = await this.repository.list(pagination);

    return {
      items: rows.map((row) => this.mapToSnakeCase(row)),
      total,
      page: pagination.page,
      limit: pagination.limit,
    };
  }

  private async readDimensions(
    imagePath: string,
  ): Promise<{ width: number | null; height: number | null }> {
    try {
      const metadata = await sharp(imagePath).metadata();
      return {
        width: metadata.width ?? null,
        height: metadata.height ?? null,
      };
    } catch (error) {
      logger.warn({ imagePath, error }, 'Could not read image dimensions');
      return { width: null, height: null };
    }
  }

  private mapToSnakeCase(row: MediaItemRow): MediaItem {
    return {
      id: row.id,
      source_frame_path: row.sourceFramePath,
      file_path: row.filePath,
      file_size_bytes: row.fileSizeBytes,
      width: row.width,
      height: row.height,
      content_hash: row.contentHash,
      saved_at: row.savedAt.toISOString(),
    };
  }
}

// Singleton instance
let serviceInstance: MediaLibraryService | null = null;

export function getMediaLibraryService(): MediaLibraryService {
  if (!serviceInstance) {
    serviceInstance = new MediaLibraryService(new DrizzleMediaItemRepository());
  }
  return serviceInstance;
}
