/**
 * Archive Batch Service
 * Processes a channel's new archive videos one at a time: download with
 * yt-dlp, extract one frame every BATCH_INTERVAL_SECONDS into
 * `<BATCH_OUTPUT_DIR>/<videoId>/`, record the video in the ledger, then
 * delete the download. A video that fails stays out of the ledger and is
 * retried on the next run.
 */

import { rm } from 'fs/promises';
import { join } from 'path';
import { env } from '@/config/env';
import { getFrameExtractionService } from '@/modules/frame-extraction';
import type { FrameExtractionService } from '@/modules/frame-extraction';
import { ConflictError } from '@/utils/errors';
import { logger } from '@/utils/logger';
import type { Pagination } from '@/utils/validation';
import type { ProcessedVideoRow } from '@/database/schema';
import { YtDlpDownloader } from './archive-batch.downloader';
import { DrizzleProcessedVideoLedger } from './archive-batch.repository';
import { createTwitchArchiveLister } from './archive-batch.twitch';
import type {
  ArchiveBatchReport,
  ArchiveVideo,
  ArchiveVideoLister,
  ArchiveVideoResult,
  ProcessedVideo,
  ProcessedVideoLedger,
  ProcessedVideoPage,
  VideoDownloader,
} from './archive-batch.types';

export const TEMP_DOWNLOAD_DIRNAME = 'temp_downloads';

export interface ArchiveBatchDependencies {
  lister: ArchiveVideoLister;
  downloader: VideoDownloader;
  ledger: ProcessedVideoLedger;
  extraction: Pick<FrameExtractionService, 'extract'>;
}

export interface ArchiveBatchSettings {
  outputDir: string;
  intervalSeconds: number;
}

export class ArchiveBatchService {
  private running = false;
  private readonly settings: ArchiveBatchSettings;

  constructor(
    private readonly deps: ArchiveBatchDependencies,
    settings: Partial<ArchiveBatchSettings> = {},
    private readonly clock: () => Date = () => new Date(),
  ) {
    this.settings = {
      outputDir: settings.outputDir ?? env.BATCH_OUTPUT_DIR,
      intervalSeconds: settings.intervalSeconds ?? env.BATCH_INTERVAL_SECONDS,
    };
  }

  get busy(): boolean {
    return this.running;
  }

  async run(): Promise<ArchiveBatchReport> {
    if (this.running) {
      throw new ConflictError('An archive batch run is already in progress', 'busy');
    }

    this.running = true;
    try {
      return await this.processNewVideos();
    } finally {
      this.running = false;
    }
  }

  async listProcessed(pagination: Pagination): Promise<ProcessedVideoPage> {
    const { rows, total } = await this.deps.ledger.list(pagination);

    return {
      items: rows.map((row) => this.mapToSnakeCase(row)),
      total,
      page: pagination.page,
      limit: pagination.limit,
    };
  }

  private async processNewVideos(): Promise<ArchiveBatchReport> {
    const startTime = Date.now();

    const videos = await this.deps.lister.listRecentArchives();
    const processedIds = await this.deps.ledger.findProcessedIds(videos.map((video) => video.id));

    const skipped = videos.filter((video) => processedIds.has(video.id)).map((video) => video.id);
    const pending = videos.filter((video) => !processedIds.has(video.id));

    if (pending.length === 0) {
      logger.info({ listed: videos.length }, 'No new archive videos to process');
    }

    const tempDir = join(this.settings.outputDir, TEMP_DOWNLOAD_DIRNAME);
    const results: ArchiveVideoResult[] = [];

    for (const video of pending) {
      results.push(await this.processVideo(video, tempDir));
    }

    const processedCount = results.filter((result) => result.status === 'processed').length;
    const failedCount = results.length - processedCount;
    const elapsedMs = Date.now() - startTime;

    logger.info(
      { listed: videos.length, skipped: skipped.length, processedCount, failedCount, timeMs: elapsedMs },
      'Archive batch finished',
    );

    return {
      listed: videos.length,
      skipped,
      results,
      processedCount,
      failedCount,
      elapsedMs,
    };
  }

  private async processVideo(video: ArchiveVideo, tempDir: string): Promise<ArchiveVideoResult> {
    const { id: videoId, title } = video;
    logger.info({ videoId, title }, 'Processing archive video');

    const download = await this.deps.downloader.download(videoId, tempDir);
    if (download.status === 'failed') {
      logger.error({ videoId, message: download.message }, 'Download failed, will retry next run');
      return { status: 'download-failed', videoId, title, message: download.message };
    }

    const frameDirectory = join(this.settings.outputDir, videoId);
    const outcome = await this.deps.extraction.extract({
      sourcePath: download.filePath,
      destinationDirectory: frameDirectory,
      interval: this.settings.intervalSeconds,
    });

    if (outcome.status !== 'succeeded') {
      logger.error(
        { videoId, reason: outcome.status, message: outcome.message },
        'Frame extraction failed, will retry next run',
      );
      return {
        status: 'extraction-failed',
        videoId,
        title,
        reason: outcome.status,
        message: outcome.message,
      };
    }

    const framesProduced = outcome.producedFiles.length;
    await this.deps.ledger.record({
      videoId,
      title,
      frameDirectory,
      framesProduced,
      processedAt: this.clock(),
    });

    const downloadRemoved = await this.removeDownload(download.filePath);

    logger.info({ videoId, framesProduced, frameDirectory }, 'Archive video processed');

    return { status: 'processed', videoId, title, frameDirectory, framesProduced, downloadRemoved };
  }

  private async removeDownload(filePath: string): Promise<boolean> {
    try {
      await rm(filePath);
      logger.info({ filePath }, 'Removed temporary download');
      return true;
    } catch (error) {
      logger.error({ filePath, error }, 'Could not remove temporary download');
      return false;
    }
  }

  private mapToSnakeCase(row: ProcessedVideoRow): ProcessedVideo {
    return {
      video_id: row.videoId,
      title: row.title,
      frame_directory: row.frameDirectory,
      frames_produced: row.framesProduced,
      processed_at: row.processedAt.toISOString(),
    };
  }
}

// Singleton instance
let serviceInstance: ArchiveBatchService | null = null;

export function getArchiveBatchService(): ArchiveBatchService {
  if (!serviceInstance) {
    serviceInstance = new ArchiveBatchService({
      lister: createTwitchArchiveLister(),
      downloader: new YtDlpDownloader(),
      ledger: new DrizzleProcessedVideoLedger(),
      extraction: getFrameExtractionService(),
    });
  }
  return serviceInstance;
}
