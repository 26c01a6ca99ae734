import type { MediaItemRow, NewMediaItemRow } from '@/database/schema';
import type { Pagination } from '@/utils/validation';

export interface MediaItem {
  id: number;
  source_frame_path: string;
  file_path: string;
  file_size_bytes: number;
  width: number | null;
  height: number | null;
  content_hash: string;
  saved_at: string;
}

export interface MediaItemPage {
  items: MediaItem[];
  total: number;
  page: number;
  limit: number;
}

/**
 * Accepts one existing file and persists it into the media library
 */
export interface MediaLibraryWriter {
  save(filePath: string): Promise<MediaItem>;
}

export interface MediaItemRepository {
  findByContentHash(contentHash: string): Promise<MediaItemRow | null>;
  insert(values: NewMediaItemRow): Promise<MediaItemRow>;
  list(pagination: Pagination): Promise<{ rows: MediaItemRow[]; total: number }>;
}
