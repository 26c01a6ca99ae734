/**
 * Twitch Archive Client
 * Lists a channel's most recent archive (past broadcast) videos through the Helix API
 */

import { z } from 'zod';
import { env } from '@/config/env';
import { AppError, BadGatewayError, NotFoundError, ServiceUnavailableError } from '@/utils/errors';
import { logger } from '@/utils/logger';
import type { ArchiveVideo, ArchiveVideoLister } from './archive-batch.types';

export interface TwitchArchiveConfig {
  apiUrl: string;
  channel?: string;
  clientId?: string;
  accessToken?: string;
  limit: number;
  timeoutMs: number;
}

const usersResponseSchema = z.object({
  data: z.array(z.object({ id: z.string() })),
});

const videosResponseSchema = z.object({
  data: z.array(
    z.object({
      id: z.string(),
      title: z.string().nullish(),
      created_at: z.string().nullish(),
      url: z.string().nullish(),
    }),
  ),
});

export class TwitchArchiveLister implements ArchiveVideoLister {
  private readonly baseUrl: string;

  constructor(private readonly config: TwitchArchiveConfig) {
    this.baseUrl = config.apiUrl.endsWith('/') ? config.apiUrl.slice(0, -1) : config.apiUrl;
  }

  async listRecentArchives(): Promise<ArchiveVideo[]> {
    const { channel, clientId, accessToken } = this.config;
    if (!channel || !clientId || !accessToken) {
      throw new ServiceUnavailableError(
        'Twitch channel and API credentials are not configured',
        'not-configured',
      );
    }

    const credentials = { clientId, accessToken };

    const users = await this.getJson(
      `/users?login=${encodeURIComponent(channel)}`,
      usersResponseSchema,
      credentials,
    );
    const user = users.data[0];
    if (!user) {
      throw new NotFoundError(`Twitch channel not found: ${channel}`, 'channel-not-found');
    }

    const params = new URLSearchParams({
      user_id: user.id,
      type: 'archive',
      sort: 'time',
      first: String(this.config.limit),
    });
    const videos = await this.getJson(`/videos?${params.toString()}`, videosResponseSchema, credentials);

    const archives = videos.data
      .filter((video) => video.id !== '')
      .map((video) => ({
        id: video.id,
        title: video.title || 'Untitled Video',
        createdAt: video.created_at ?? null,
        url: video.url ?? null,
      }));

    logger.info({ channel, userId: user.id, count: archives.length }, 'Listed archive videos');
    return archives;
  }

  private async getJson<T>(
    path: string,
    schema: z.ZodType<T>,
    credentials: { clientId: string; accessToken: string },
  ): Promise<T> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method: 'GET',
        headers: {
          'Client-ID': credentials.clientId,
          Authorization: `Bearer ${credentials.accessToken}`,
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorText = await response.text();
        logger.error({ path, status: response.status, body: errorText }, 'Twitch API request failed');
        throw new BadGatewayError(
          `Twitch API request failed: ${response.status} ${errorText}`.trim(),
          'upstream-failed',
        );
      }

      const parsed = schema.safeParse(await response.json());
      if (!parsed.success) {
        logger.error({ path, issues: parsed.error.issues }, 'Unexpected Twitch API response');
        throw new BadGatewayError('Unexpected Twitch API response', 'upstream-failed');
      }

      return parsed.data;
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      if (error instanceof Error && error.name === 'AbortError') {
        throw new BadGatewayError(
          `Twitch API timeout after ${this.config.timeoutMs}ms`,
          'upstream-failed',
        );
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new BadGatewayError(`Twitch API request failed: ${message}`, 'upstream-failed');
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

export function createTwitchArchiveLister(): TwitchArchiveLister {
  return new TwitchArchiveLister({
    apiUrl: env.TWITCH_API_URL,
    channel: env.TWITCH_CHANNEL,
    clientId: env.TWITCH_CLIENT_ID,
    accessToken: env.TWITCH_APP_ACCESS_TOKEN,
    limit: env.BATCH_RECENT_LIMIT,
    timeoutMs: env.TWITCH_API_TIMEOUT_MS,
  });
}
