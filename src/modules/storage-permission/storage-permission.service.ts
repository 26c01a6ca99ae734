import { constants } from 'fs';
import { access, stat } from 'fs/promises';
import { env } from '@/config/env';
import { ensureWritableDirectory } from '@/utils/file-utils';
import { logger } from '@/utils/logger';
import type { PermissionStatus, StoragePermissionGate } from './storage-permission.types';

/**
 * Storage is usable when the media library directory exists and is writable.
 * Requesting permission tries to create it.
 */
export class FileSystemPermissionGate implements StoragePermissionGate {
  constructor(private readonly directory: string = env.MEDIA_LIBRARY_DIR) {}

  async status(): Promise<PermissionStatus> {
    try {
      const stats = await stat(this.directory);
      if (!stats.isDirectory()) {
        return 'denied';
      }
      await access(this.directory, constants.W_OK);
      return 'granted';
    } catch {
      return 'denied';
    }
  }

  async request(): Promise<PermissionStatus> {
    const writable = await ensureWritableDirectory(this.directory);

    if (!writable) {
      logger.warn({ directory: this.directory }, 'Media library directory is not writable');
      return 'denied';
    }

    logger.debug({ directory: this.directory }, 'Media library directory ready');
    return 'granted';
  }
}
