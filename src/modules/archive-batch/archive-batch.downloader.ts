/**
 * yt-dlp downloader for archive videos
 */
import { mkdir, readdir } from 'fs/promises';
import { join } from 'path';
import { env } from '@/config/env';
import { logger } from '@/utils/logger';
import { lastStderrLine, runProcess } from '@/utils/process-utils';
import type { DownloadResult, VideoDownloader } from './archive-batch.types';

const TWITCH_VIDEO_URL = 'https://www.twitch.tv/videos';

// Leftovers of an interrupted download
const PARTIAL_SUFFIXES = ['.part', '.ytdl'];

export function buildDownloadArgs(videoId: string, directory: string): string[] {
  return [
    '-o',
    join(directory, `${videoId}.%(ext)s`),
    '--no-playlist',
    '--restrict-filenames',
    `${TWITCH_VIDEO_URL}/${videoId}`,
  ];
}

export class YtDlpDownloader implements VideoDownloader {
  constructor(private readonly ytDlpPath: string = env.YT_DLP_PATH) {}

  async download(videoId: string, directory: string): Promise<DownloadResult> {
    await mkdir(directory, { recursive: true });

    logger.info({ videoId, directory }, 'Downloading archive video');
    const { returnCode, stderr } = await runProcess(
      this.ytDlpPath,
      buildDownloadArgs(videoId, directory),
      'yt-dlp',
    );

    if (returnCode !== 0) {
      const reason = lastStderrLine(stderr) ?? 'no error output';
      logger.error({ videoId, returnCode, stderr }, 'yt-dlp download failed');
      return { status: 'failed', message: `yt-dlp exited with code ${returnCode}: ${reason}` };
    }

    const entries = await readdir(directory);
    const downloaded = entries
      .filter((entry) => entry.startsWith(`${videoId}.`))
      .filter((entry) => !PARTIAL_SUFFIXES.some((suffix) => entry.endsWith(suffix)))
      .sort()[0];

    if (!downloaded) {
      logger.error({ videoId, directory }, 'yt-dlp succeeded but no downloaded file was found');
      return {
        status: 'failed',
        message: `yt-dlp finished but no file named ${videoId}.* was found in ${directory}`,
      };
    }

    const filePath = join(directory, downloaded);
    logger.info({ videoId, filePath }, 'Archive video downloaded');
    return { status: 'downloaded', filePath };
  }
}
