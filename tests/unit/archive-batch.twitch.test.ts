import { describe, it, expect, afterEach, vi } from 'vitest';
import { TwitchArchiveLister } from '@/modules/archive-batch/archive-batch.twitch';
import type { TwitchArchiveConfig } from '@/modules/archive-batch/archive-batch.twitch';
import { BadGatewayError, NotFoundError, ServiceUnavailableError } from '@/utils/errors';

const CONFIG: TwitchArchiveConfig = {
  apiUrl: 'https://api.example.test/helix/',
  channel: 'some_streamer',
  clientId: 'test-client-id',
  accessToken: 'test-token',
  limit: 5,
  timeoutMs: 1000,
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function stubFetch(...responses: Response[]) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => {
    const next = responses.shift();
    if (!next) {
      throw new Error('Unexpected request');
    }
    return next;
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('TwitchArchiveLister', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should look up the channel and list its recent archives', async () => {
    const fetchMock = stubFetch(
      jsonResponse({ data: [{ id: '4242', login: 'some_streamer' }] }),
      jsonResponse({
        data: [
          {
            id: '900',
            title: 'Late stream',
            created_at: '2026-02-02T20:00:00Z',
            url: 'https://www.twitch.tv/videos/900',
          },
          { id: '899', title: '', created_at: null, url: null },
        ],
        pagination: {},
      }),
    );

    const videos = await new TwitchArchiveLister(CONFIG).listRecentArchives();

    expect(videos).toEqual([
      {
        id: '900',
        title: 'Late stream',
        createdAt: '2026-02-02T20:00:00Z',
        url: 'https://www.twitch.tv/videos/900',
      },
      { id: '899', title: 'Untitled Video', createdAt: null, url: null },
    ]);

    expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
      'https://api.example.test/helix/users?login=some_streamer',
      'https://api.example.test/helix/videos?user_id=4242&type=archive&sort=time&first=5',
    ]);
    expect(fetchMock.mock.calls[0][1]?.headers).toEqual({
      'Client-ID': 'test-client-id',
      Authorization: 'Bearer test-token',
    });
  });

  it('should refuse to run without credentials', async () => {
    const fetchMock = stubFetch();

    await expect(
      new TwitchArchiveLister({ ...CONFIG, accessToken: undefined }).listRecentArchives(),
    ).rejects.toBeInstanceOf(ServiceUnavailableError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should report an unknown channel', async () => {
    stubFetch(jsonResponse({ data: [] }));

    await expect(new TwitchArchiveLister(CONFIG).listRecentArchives()).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });

  it('should turn an HTTP error into a bad gateway error', async () => {
    stubFetch(new Response('invalid oauth token', { status: 401 }));

    const error = await new TwitchArchiveLister(CONFIG).listRecentArchives().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BadGatewayError);
    expect(error).toMatchObject({
      message: 'Twitch API request failed: 401 invalid oauth token',
      statusCode: 502,
    });
  });

  it('should reject a response of the wrong shape', async () => {
    stubFetch(jsonResponse({ users: [] }));

    await expect(new TwitchArchiveLister(CONFIG).listRecentArchives()).rejects.toThrow(
      'Unexpected Twitch API response',
    );
  });

  it('should turn a network failure into a bad gateway error', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      }),
    );

    await expect(new TwitchArchiveLister(CONFIG).listRecentArchives()).rejects.toThrow(
      'Twitch API request failed: fetch failed',
    );
  });
});
