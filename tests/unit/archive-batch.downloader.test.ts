import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { chmod, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { buildDownloadArgs, YtDlpDownloader } from '@/modules/archive-batch/archive-batch.downloader';
import { createTempDir, removeTempDir } from '../helpers/test-utils';

// A shell script stands in for yt-dlp so its output and exit code are known
async function writeTool(directory: string, body: string): Promise<string> {
  const toolPath = join(directory, 'fake-yt-dlp');
  await writeFile(toolPath, `#!/bin/sh\n${body}\n`);
  await chmod(toolPath, 0o755);
  return toolPath;
}

describe('YtDlpDownloader', () => {
  let workDir: string;
  let downloadDir: string;

  beforeEach(async () => {
    workDir = await createTempDir();
    downloadDir = join(workDir, 'temp_downloads');
  });

  afterEach(async () => {
    await removeTempDir(workDir);
  });

  it('should build the yt-dlp arguments for a video id', () => {
    expect(buildDownloadArgs('2345678', '/tmp/dl')).toEqual([
      '-o',
      '/tmp/dl/2345678.%(ext)s',
      '--no-playlist',
      '--restrict-filenames',
      'https://www.twitch.tv/videos/2345678',
    ]);
  });

  it('should return the file yt-dlp wrote', async () => {
    const argsFile = join(workDir, 'args.txt');
    const tool = await writeTool(
      workDir,
      `printf '%s\\n' "$@" > '${argsFile}'\nprintf 'video' > '${downloadDir}/2345678.mp4'`,
    );

    const result = await new YtDlpDownloader(tool).download('2345678', downloadDir);

    expect(result).toEqual({ status: 'downloaded', filePath: join(downloadDir, '2345678.mp4') });
    expect((await readFile(argsFile, 'utf8')).split('\n')).toEqual([
      '-o',
      join(downloadDir, '2345678.%(ext)s'),
      '--no-playlist',
      '--restrict-filenames',
      'https://www.twitch.tv/videos/2345678',
      '',
    ]);
  });

  it('should ignore partial files and other ids', async () => {
    const tool = await writeTool(
      workDir,
      `printf 'x' > '${downloadDir}/23456789.mp4'\nprintf 'x' > '${downloadDir}/2345678.mp4.part'`,
    );

    const result = await new YtDlpDownloader(tool).download('2345678', downloadDir);

    expect(result).toEqual({
      status: 'failed',
      message: `yt-dlp finished but no file named 2345678.* was found in ${downloadDir}`,
    });
  });

  it('should report the exit code and last error line', async () => {
    const tool = await writeTool(
      workDir,
      "echo '[twitch:vod] 2345678: Downloading info' >&2\necho 'ERROR: Video unavailable' >&2\nexit 1",
    );

    const result = await new YtDlpDownloader(tool).download('2345678', downloadDir);

    expect(result).toEqual({
      status: 'failed',
      message: 'yt-dlp exited with code 1: ERROR: Video unavailable',
    });
  });

  it('should report -1 when yt-dlp is missing', async () => {
    const result = await new YtDlpDownloader(join(workDir, 'missing-yt-dlp')).download(
      '2345678',
      downloadDir,
    );

    expect(result.status).toBe('failed');
    if (result.status === 'failed') {
      expect(result.message).toMatch(/^yt-dlp exited with code -1: spawn .*ENOENT$/);
    }
  });
});
