/**
 * Frame Extraction Service
 * Samples one frame every N seconds from a video with ffmpeg, then hands the
 * frames that actually landed on disk to the media library.
 *
 * Only one extraction runs at a time per service instance; a second call made
 * while one is in flight is rejected with status "busy".
 */

import { env } from '@/config/env';
import { getMediaLibraryService } from '@/modules/media-library';
import type { MediaItem, MediaLibraryWriter } from '@/modules/media-library';
import { FileSystemPermissionGate } from '@/modules/storage-permission';
import type { StoragePermissionGate } from '@/modules/storage-permission';
import {
  ensureWritableDirectory,
  fileExists,
  isReadableFile,
  isVideoFile,
} from '@/utils/file-utils';
import { logger } from '@/utils/logger';
import { lastStderrLine } from '@/utils/process-utils';
import {
  buildExtractionCommand,
  candidateFramePaths,
  createExtractionRequest,
  expectedFrameCount,
  formatCommandLine,
  resolveIntervalSeconds,
} from './frame-extraction.command';
import { FfmpegEngine, FfprobeDurationProbe } from './frame-extraction.ffmpeg';
import type {
  ExtractionInput,
  ExtractionOutcome,
  ExtractionRejected,
  ExtractionRequest,
  FailedHandoff,
  FrameExtractionEngine,
  VideoDurationProbe,
} from './frame-extraction.types';

export interface FrameExtractionDependencies {
  engine: FrameExtractionEngine;
  probe: VideoDurationProbe;
  permissionGate: StoragePermissionGate;
  mediaLibrary: MediaLibraryWriter;
}

export interface FrameExtractionSettings {
  fallbackFrameCandidates: number;
  strictInterval: boolean;
  executable: string; // Only used to print the command line
}

function rejected(status: ExtractionRejected['status'], message: string): ExtractionRejected {
  return { status, message };
}

export class FrameExtractionService {
  private inFlight = false;
  private readonly settings: FrameExtractionSettings;

  constructor(
    private readonly deps: FrameExtractionDependencies,
    settings: Partial<FrameExtractionSettings> = {},
  ) {
    this.settings = {
      fallbackFrameCandidates: settings.fallbackFrameCandidates ?? env.FALLBACK_FRAME_CANDIDATES,
      strictInterval: settings.strictInterval ?? env.STRICT_INTERVAL,
      executable: settings.executable ?? env.FFMPEG_PATH,
    };
  }

  get busy(): boolean {
    return this.inFlight;
  }

  async extract(input: ExtractionInput): Promise<ExtractionOutcome> {
    if (this.inFlight) {
      logger.warn({ sourcePath: input.sourcePath }, 'Extraction rejected, another one is in progress');
      return rejected('busy', 'Another extraction is already in progress');
    }

    this.inFlight = true;
    try {
      return await this.run(input);
    } finally {
      this.inFlight = false;
    }
  }

  private async run(input: ExtractionInput): Promise<ExtractionOutcome> {
    const startTime = Date.now();

    if (!(await this.ensurePermission())) {
      logger.warn('Storage permission denied');
      return rejected('permission-denied', 'Storage permission was not granted');
    }

    const sourcePath = input.sourcePath?.trim() ?? '';
    if (sourcePath === '') {
      logger.debug('No video selected, nothing to extract');
      return rejected('selection-cancelled', 'No video file was selected');
    }

    if (!isVideoFile(sourcePath) || !(await isReadableFile(sourcePath))) {
      return rejected('invalid-source', `Not a readable video file: ${sourcePath}`);
    }

    const { intervalSeconds, usedFallback } = resolveIntervalSeconds(input.interval);
    if (usedFallback) {
      if (this.settings.strictInterval) {
        return rejected('invalid-interval', 'Interval must be a positive whole number of seconds');
      }
      logger.debug({ interval: input.interval, intervalSeconds }, 'Using default interval');
    }

    const destinationDirectory = input.destinationDirectory?.trim() ?? '';
    if (destinationDirectory === '') {
      return rejected('invalid-destination', 'Destination directory is required');
    }
    if (!(await ensureWritableDirectory(destinationDirectory))) {
      return rejected(
        'invalid-destination',
        `Destination directory is not writable: ${destinationDirectory}`,
      );
    }

    const request = createExtractionRequest({ sourcePath, destinationDirectory, intervalSeconds });
    const command = buildExtractionCommand(request);
    const commandLine = formatCommandLine(this.settings.executable, command.args);
    const candidateCount = await this.resolveCandidateCount(request);

    logger.info(
      { sourcePath, destinationDirectory, intervalSeconds, candidateCount },
      'Starting frame extraction',
    );

    const { returnCode, stderr } = await this.deps.engine.execute(command);

    if (returnCode !== 0) {
      const message = lastStderrLine(stderr) ?? `ffmpeg exited with code ${returnCode}`;
      logger.error({ returnCode, commandLine, message }, 'Frame extraction failed');
      return { status: 'engine-failed', request, commandLine, returnCode, message };
    }

    const checkedPaths = candidateFramePaths(destinationDirectory, candidateCount);
    const producedFiles: string[] = [];
    const savedItems: MediaItem[] = [];
    const failedHandoffs: FailedHandoff[] = [];

    for (const framePath of checkedPaths) {
      if (!(await fileExists(framePath))) {
        continue;
      }
      producedFiles.push(framePath);

      try {
        savedItems.push(await this.deps.mediaLibrary.save(framePath));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error({ framePath, error }, 'Failed to save frame to media library');
        failedHandoffs.push({ filePath: framePath, message });
      }
    }

    const elapsedMs = Date.now() - startTime;

    logger.info(
      {
        sourcePath,
        framesProduced: producedFiles.length,
        framesSaved: savedItems.length,
        timeMs: elapsedMs,
      },
      'Frame extraction completed',
    );

    return {
      status: 'succeeded',
      request,
      intervalFallback: usedFallback,
      commandLine,
      checkedPaths,
      producedFiles,
      savedItems,
      failedHandoffs,
      elapsedMs,
    };
  }

  private async ensurePermission(): Promise<boolean> {
    const { permissionGate } = this.deps;

    if ((await permissionGate.status()) === 'granted') {
      return true;
    }

    return (await permissionGate.request()) === 'granted';
  }

  /**
   * Candidates come from the probed duration; without one, the fixed fallback
   */
  private async resolveCandidateCount(request: ExtractionRequest): Promise<number> {
    let duration: number | null = null;

    try {
      duration = await this.deps.probe.probeDuration(request.sourcePath);
    } catch (error) {
      logger.warn(
        { sourcePath: request.sourcePath, error },
        'Could not probe video duration, using fallback frame count',
      );
    }

    return expectedFrameCount(duration, request.intervalSeconds, this.settings.fallbackFrameCandidates);
  }
}

// Singleton instance
let serviceInstance: FrameExtractionService | null = null;

export function getFrameExtractionService(): FrameExtractionService {
  if (!serviceInstance) {
    serviceInstance = new FrameExtractionService({
      engine: new FfmpegEngine(),
      probe: new FfprobeDurationProbe(),
      permissionGate: new FileSystemPermissionGate(),
      mediaLibrary: getMediaLibraryService(),
    });
  }
  return serviceInstance;
}
