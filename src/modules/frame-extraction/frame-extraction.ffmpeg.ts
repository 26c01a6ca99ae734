/**
 * FFmpeg adapters for frame extraction
 * The engine spawns ffmpeg and reports its exit code; the probe reads the
 * container duration through ffprobe.
 */
import ffmpeg from 'fluent-ffmpeg';
import { env } from '@/config/env';
import { logger } from '@/utils/logger';
import { runProcess } from '@/utils/process-utils';
import type {
  EngineResult,
  ExtractionCommand,
  FrameExtractionEngine,
  VideoDurationProbe,
} from './frame-extraction.types';

ffmpeg.setFfprobePath(env.FFPROBE_PATH);

export class FfmpegEngine implements FrameExtractionEngine {
  constructor(private readonly ffmpegPath: string = env.FFMPEG_PATH) {}

  execute(command: ExtractionCommand): Promise<EngineResult> {
    return runProcess(this.ffmpegPath, command.args, 'FFmpeg');
  }
}

const parseNullableNumber = (value: unknown): number | null => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number.parseFloat(value);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
};

export class FfprobeDurationProbe implements VideoDurationProbe {
  async probeDuration(videoPath: string): Promise<number | null> {
    const startTime = Date.now();

    return new Promise((resolve, reject) => {
      ffmpeg.ffprobe(videoPath, (err, metadata) => {
        const elapsed = Date.now() - startTime;

        if (err) {
          logger.warn({ videoPath, error: err, durationMs: elapsed }, 'ffprobe failed');
          return reject(err);
        }

        const duration = parseNullableNumber(metadata.format.duration);
        logger.debug({ videoPath, duration, durationMs: elapsed }, `ffprobe completed in ${elapsed}ms`);
        resolve(duration);
      });
    });
  }
}
