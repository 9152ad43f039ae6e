import { describe, it, expect, vi } from 'vitest';
import { findRecentVideos, YouTubeClient } from '../src/pipeline/youtube';
import { QuotaExceededError } from '../src/pipeline/errors';

type Route = (url: URL) => Response;

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function fakeFetch(routes: Record<string, Route>) {
  return vi.fn(async (input: RequestInfo | URL) => {
    const url = new URL(input instanceof Request ? input.url : input.toString());
    const endpoint = url.pathname.split('/').pop() ?? '';
    const route = routes[endpoint];
    if (!route) return json({ error: { message: `no route ${endpoint}` } }, 404);
    return route(url);
  });
}

const happyRoutes: Record<string, Route> = {
  search: () => json({ items: [{ id: { channelId: 'UC123' } }] }),
  channels: () => json({ items: [{ contentDetails: { relatedPlaylists: { uploads: 'UU123' } } }] }),
  playlistItems: () =>
    json({
      items: [
        { snippet: { title: 'First video', resourceId: { videoId: 'vid00000001' } } },
        { snippet: { title: 'Second video', resourceId: { videoId: 'vid00000002' } } },
        { snippet: { title: 'Deleted video' } },
      ],
    }),
};

describe('YouTubeClient', () => {
  it('sends the key and query parameters', async () => {
    const fetch = fakeFetch(happyRoutes);
    const client = new YouTubeClient({ apiKey: 'test-key', fetch, maxRetries: 0 });
    await expect(client.findChannelId('Some Channel')).resolves.toBe('UC123');

    const [input] = fetch.mock.calls[0];
    const url = new URL(input instanceof Request ? input.url : input.toString());
    expect(url.pathname).toBe('/youtube/v3/search');
    expect(url.searchParams.get('key')).toBe('test-key');
    expect(url.searchParams.get('q')).toBe('Some Channel');
    expect(url.searchParams.get('type')).toBe('channel');
    expect(url.searchParams.get('maxResults')).toBe('1');
  });

  it('maps API errors', async () => {
    const fetch = fakeFetch({
      search: () => json({ error: { message: 'quota', errors: [{ reason: 'quotaExceeded' }] } }, 403),
    });
    const client = new YouTubeClient({ apiKey: 'test-key', fetch, maxRetries: 0 });
    await expect(client.findChannelId('x')).rejects.toBeInstanceOf(QuotaExceededError);
  });
});

describe('findRecentVideos', () => {
  it('returns uploads in playlist order and skips items without an id', async () => {
    const fetch = fakeFetch(happyRoutes);
    const result = await findRecentVideos('test-key', 'Some Channel', 5, { fetch, maxRetries: 0 });
    expect(result).toEqual({
      videos: [
        { videoId: 'vid00000001', title: 'First video' },
        { videoId: 'vid00000002', title: 'Second video' },
      ],
    });
    const last = fetch.mock.calls[2][0];
    const url = new URL(last instanceof Request ? last.url : last.toString());
    expect(url.searchParams.get('playlistId')).toBe('UU123');
    expect(url.searchParams.get('maxResults')).toBe('5');
  });

  it('reports an unknown channel', async () => {
    const fetch = fakeFetch({ ...happyRoutes, search: () => json({ items: [] }) });
    await expect(findRecentVideos('test-key', 'nobody', 25, { fetch, maxRetries: 0 })).resolves.toEqual({
      videos: [],
      error: "Channel 'nobody' not found",
    });
  });

  it('reports a channel without uploads', async () => {
    const fetch = fakeFetch({ ...happyRoutes, channels: () => json({ items: [{}] }) });
    await expect(findRecentVideos('test-key', 'empty', 25, { fetch, maxRetries: 0 })).resolves.toEqual({
      videos: [],
      error: "Channel 'empty' has no uploads playlist",
    });
  });

  it('turns API failures into a message instead of throwing', async () => {
    const fetch = fakeFetch({ search: () => json({ error: { message: 'API key not valid' } }, 401) });
    await expect(findRecentVideos('test-key', 'x', 25, { fetch, maxRetries: 0 })).resolves.toEqual({
      videos: [],
      error: 'Error accessing YouTube API: API key not valid',
    });
  });
});
