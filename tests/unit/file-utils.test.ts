import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import {
  computeFileHash,
  ensureWritableDirectory,
  fileExists,
  formatBytes,
  isVideoFile,
} from '@/utils/file-utils';
import { createTempDir, removeTempDir } from '../helpers/test-utils';

describe('file-utils', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(workDir);
  });

  describe('isVideoFile', () => {
    it('should identify video files by extension', () => {
      expect(isVideoFile('video.mp4')).toBe(true);
      expect(isVideoFile('video.mkv')).toBe(true);
      expect(isVideoFile('video.mov')).toBe(true);
      expect(isVideoFile('video.webm')).toBe(true);
      expect(isVideoFile('video.3gp')).toBe(true);
    });

    it('should reject non-video files', () => {
      expect(isVideoFile('document.txt')).toBe(false);
      expect(isVideoFile('image.jpg')).toBe(false);
      expect(isVideoFile('no-extension')).toBe(false);
    });

    it('should be case insensitive', () => {
      expect(isVideoFile('VIDEO.MP4')).toBe(true);
      expect(isVideoFile('Video.MKV')).toBe(true);
    });
  });

  describe('formatBytes', () => {
    it('should format bytes correctly', () => {
      expect(formatBytes(0)).toBe('0 Bytes');
      expect(formatBytes(1024)).toBe('1 KB');
      expect(formatBytes(1024 * 1024)).toBe('1 MB');
      expect(formatBytes(1536)).toBe('1.5 KB');
    });
  });

  describe('fileExists', () => {
    it('should only report regular files', async () => {
      const file = join(workDir, 'frame.jpg');
      await writeFile(file, 'x');
      await mkdir(join(workDir, 'folder'));

      expect(await fileExists(file)).toBe(true);
      expect(await fileExists(join(workDir, 'folder'))).toBe(false);
      expect(await fileExists(join(workDir, 'missing.jpg'))).toBe(false);
      expect(await fileExists(join(file, 'below-a-file.jpg'))).toBe(false);
    });
  });

  describe('ensureWritableDirectory', () => {
    it('should create nested directories', async () => {
      expect(await ensureWritableDirectory(join(workDir, 'a', 'b'))).toBe(true);
    });

    it('should refuse a path that is a file', async () => {
      const file = join(workDir, 'taken');
      await writeFile(file, 'x');

      expect(await ensureWritableDirectory(file)).toBe(false);
    });
  });

  describe('computeFileHash', () => {
    it('should compute a consistent 64-bit hex hash', async () => {
      const file = join(workDir, 'small-test.txt');
      await writeFile(file, 'Hello, World!');

      const hash1 = await computeFileHash(file);
      const hash2 = await computeFileHash(file);

      expect(hash1).toBe(hash2);
      expect(hash1).toMatch(/^[0-9a-f]{16}$/);
    });

    it('should detect content changes', async () => {
      const file = join(workDir, 'change-test.txt');

      await writeFile(file, 'Content 1');
      const hash1 = await computeFileHash(file);

      await writeFile(file, 'Content 2');
      const hash2 = await computeFileHash(file);

      expect(hash1).not.toBe(hash2);
    });
  });
});
