/**
 * Archive Batch Types
 * A channel's recent archive videos are downloaded, sampled into one frame
 * folder per video and recorded in a ledger so later runs skip them.
 */

import type { NewProcessedVideoRow, ProcessedVideoRow } from '@/database/schema';
import type { ExtractionFailureStatus } from '@/modules/frame-extraction/frame-extraction.types';
import type { Pagination } from '@/utils/validation';

export interface ArchiveVideo {
  id: string;
  title: string;
  createdAt: string | null;
  url: string | null;
}

/**
 * Source of a channel's most recent archive videos, newest first
 */
export interface ArchiveVideoLister {
  listRecentArchives(): Promise<ArchiveVideo[]>;
}

export type DownloadResult =
  | { status: 'downloaded'; filePath: string }
  | { status: 'failed'; message: string };

export interface VideoDownloader {
  download(videoId: string, directory: string): Promise<DownloadResult>;
}

export interface ProcessedVideoLedger {
  findProcessedIds(videoIds: readonly string[]): Promise<Set<string>>;
  record(values: NewProcessedVideoRow): Promise<ProcessedVideoRow>;
  list(pagination: Pagination): Promise<{ rows: ProcessedVideoRow[]; total: number }>;
}

export interface ProcessedVideo {
  video_id: string;
  title: string;
  frame_directory: string;
  frames_produced: number;
  processed_at: string;
}

export interface ProcessedVideoPage {
  items: ProcessedVideo[];
  total: number;
  page: number;
  limit: number;
}

export type ArchiveVideoResult =
  | {
      status: 'processed';
      videoId: string;
      title: string;
      frameDirectory: string;
      framesProduced: number;
      downloadRemoved: boolean;
    }
  | {
      status: 'download-failed';
      videoId: string;
      title: string;
      message: string;
    }
  | {
      status: 'extraction-failed';
      videoId: string;
      title: string;
      reason: ExtractionFailureStatus;
      message: string;
    };

export interface ArchiveBatchReport {
  listed: number;
  skipped: string[];
  results: ArchiveVideoResult[];
  processedCount: number;
  failedCount: number;
  elapsedMs: number;
}
