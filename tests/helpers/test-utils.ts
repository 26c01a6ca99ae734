import type { FastifyInstance } from 'fastify';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { buildServer } from '@/server';
import type { ServerDependencies } from '@/server';
import type {
  MediaItemRow,
  NewMediaItemRow,
  NewProcessedVideoRow,
  ProcessedVideoRow,
} from '@/database/schema';
import type {
  ArchiveVideo,
  ArchiveVideoLister,
  DownloadResult,
  ProcessedVideoLedger,
  VideoDownloader,
} from '@/modules/archive-batch/archive-batch.types';
import { frameFilePath } from '@/modules/frame-extraction/frame-extraction.command';
import type {
  EngineResult,
  ExtractionCommand,
  FrameExtractionEngine,
  VideoDurationProbe,
} from '@/modules/frame-extraction/frame-extraction.types';
import type {
  MediaItem,
  MediaItemRepository,
  MediaLibraryWriter,
} from '@/modules/media-library/media-library.types';
import type {
  PermissionStatus,
  StoragePermissionGate,
} from '@/modules/storage-permission/storage-permission.types';
import type { Pagination } from '@/utils/validation';

export async function setupTestServer(
  dependencies: ServerDependencies,
): Promise<FastifyInstance> {
  const server = await buildServer(dependencies);
  await server.ready();
  return server;
}

export async function createTempDir(prefix = 'frame-extractor-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(directory: string): Promise<void> {
  await rm(directory, { recursive: true, force: true });
}

/**
 * Writes a small placeholder "video" so source checks pass
 */
export async function createFakeVideo(directory: string, name = 'clip.mp4'): Promise<string> {
  const videoPath = join(directory, name);
  await writeFile(videoPath, 'not really a video');
  return videoPath;
}

/**
 * Stands in for ffmpeg: records each command, writes the requested frame
 * indices into the output directory (the command's own unless one is given)
 * and reports a return code.
 */
export class FakeEngine implements FrameExtractionEngine {
  readonly commands: ExtractionCommand[] = [];
  returnCode = 0;
  stderr = '';
  framesToWrite: number[] = [];
  private gate: Promise<void> | null = null;
  private openGate: (() => void) | null = null;

  constructor(private readonly outputDirectory?: string) {}

  /**
   * Holds every execute() call until release()
   */
  hold(): void {
    this.gate = new Promise((resolve) => {
      this.openGate = resolve;
    });
  }

  release(): void {
    this.openGate?.();
    this.gate = null;
    this.openGate = null;
  }

  async execute(command: ExtractionCommand): Promise<EngineResult> {
    this.commands.push(command);

    if (this.gate) {
      await this.gate;
    }

    if (this.returnCode === 0) {
      const directory = this.outputDirectory ?? dirname(command.outputPattern).replace(/%%/g, '%');
      for (const index of this.framesToWrite) {
        await writeFile(frameFilePath(directory, index), `frame-${index}`);
      }
    }

    return { returnCode: this.returnCode, stderr: this.stderr };
  }
}

export class FakeProbe implements VideoDurationProbe {
  readonly probed: string[] = [];

  constructor(private readonly duration: number | null | Error = null) {}

  async probeDuration(videoPath: string): Promise<number | null> {
    this.probed.push(videoPath);
    if (this.duration instanceof Error) {
      throw this.duration;
    }
    return this.duration;
  }
}

export class FakePermissionGate implements StoragePermissionGate {
  statusCalls = 0;
  requestCalls = 0;
  private readonly onRequest: PermissionStatus;

  constructor(
    private current: PermissionStatus = 'granted',
    onRequest?: PermissionStatus,
  ) {
    this.onRequest = onRequest ?? current;
  }

  async status(): Promise<PermissionStatus> {
    this.statusCalls++;
    return this.current;
  }

  async request(): Promise<PermissionStatus> {
    this.requestCalls++;
    this.current = this.onRequest;
    return this.current;
  }
}

/**
 * Media library writer that only records what it was handed
 */
export class RecordingMediaLibrary implements MediaLibraryWriter {
  readonly saved: string[] = [];
  readonly failOn = new Set<string>();

  async save(filePath: string): Promise<MediaItem> {
    if (this.failOn.has(filePath)) {
      throw new Error(`Disk full while saving ${filePath}`);
    }

    this.saved.push(filePath);
    const id = this.saved.length;

    return {
      id,
      source_frame_path: filePath,
      file_path: `/library/${id}.jpg`,
      file_size_bytes: 7,
      width: null,
      height: null,
      content_hash: `hash-${id}`,
      saved_at: '2026-01-01T00:00:00.000Z',
    };
  }
}

export class InMemoryMediaItemRepository implements MediaItemRepository {
  readonly rows: MediaItemRow[] = [];

  async findByContentHash(contentHash: string): Promise<MediaItemRow | null> {
    return this.rows.find((row) => row.contentHash === contentHash) ?? null;
  }

  async insert(values: NewMediaItemRow): Promise<MediaItemRow> {
    const row: MediaItemRow = {
      id: this.rows.length + 1,
      sourceFramePath: values.sourceFramePath,
      filePath: values.filePath,
      fileSizeBytes: values.fileSizeBytes,
      width: values.width ?? null,
      height: values.height ?? null,
      contentHash: values.contentHash,
      savedAt: values.savedAt ?? new Date('2026-01-01T00:00:00.000Z'),
    };
    this.rows.push(row);
    return row;
  }

  async list(pagination: Pagination): Promise<{ rows: MediaItemRow[]; total: number }> {
    const sorted = [...this.rows].sort((a, b) => b.id - a.id);
    const start = (pagination.page - 1) * pagination.limit;
    return {
      rows: sorted.slice(start, start + pagination.limit),
      total: this.rows.length,
    };
  }
}

export function archiveVideo(id: string, title = `Stream ${id}`): ArchiveVideo {
  return {
    id,
    title,
    createdAt: '2026-02-01T20:00:00Z',
    url: `https://www.twitch.tv/videos/${id}`,
  };
}

export class FakeArchiveLister implements ArchiveVideoLister {
  calls = 0;

  constructor(public videos: ArchiveVideo[] = []) {}

  async listRecentArchives(): Promise<ArchiveVideo[]> {
    this.calls++;
    return this.videos;
  }
}

/**
 * Writes a placeholder `<id>.mp4` into the download directory
 */
export class FakeDownloader implements VideoDownloader {
  readonly downloads: string[] = [];
  readonly failOn = new Set<string>();

  async download(videoId: string, directory: string): Promise<DownloadResult> {
    this.downloads.push(videoId);

    if (this.failOn.has(videoId)) {
      return { status: 'failed', message: 'yt-dlp exited with code 1: ERROR: Video unavailable' };
    }

    await mkdir(directory, { recursive: true });
    const filePath = join(directory, `${videoId}.mp4`);
    await writeFile(filePath, `video-${videoId}`);
    return { status: 'downloaded', filePath };
  }
}

export class InMemoryProcessedVideoLedger implements ProcessedVideoLedger {
  readonly rows: ProcessedVideoRow[] = [];

  async findProcessedIds(videoIds: readonly string[]): Promise<Set<string>> {
    return new Set(
      this.rows.map((row) => row.videoId).filter((videoId) => videoIds.includes(videoId)),
    );
  }

  async record(values: NewProcessedVideoRow): Promise<ProcessedVideoRow> {
    const row: ProcessedVideoRow = {
      videoId: values.videoId,
      title: values.title,
      frameDirectory: values.frameDirectory,
      framesProduced: values.framesProduced,
      processedAt: values.processedAt ?? new Date('2026-01-01T00:00:00.000Z'),
    };
    this.rows.push(row);
    return row;
  }

  async list(pagination: Pagination): Promise<{ rows: ProcessedVideoRow[]; total: number }> {
    const sorted = [...this.rows].reverse();
    const start = (pagination.page - 1) * pagination.limit;
    return {
      rows: sorted.slice(start, start + pagination.limit),
      total: this.rows.length,
    };
  }
}
