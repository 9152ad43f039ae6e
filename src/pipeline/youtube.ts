/**
 * Channel lookup against the YouTube Data API v3
 */

import ky, { type KyInstance, type Options as KyOptions } from 'ky';
import type { VideoSummary } from './types';
import { errorMessage, handleErrorResponse, NetworkError, TimeoutError } from './errors';
import { withRetry, DEFAULT_RETRY_CONFIG, type RetryConfig } from './retry';
import { info, warn } from './log';

export const YOUTUBE_API_BASE = 'https://www.googleapis.com/youtube/v3';
export const DEFAULT_MAX_VIDEOS = 25;

export interface YouTubeClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeout?: number;
  maxRetries?: number;
  retryDelay?: number;
  /** Injected in tests */
  fetch?: typeof fetch;
}

export interface LookupResult {
  videos: VideoSummary[];
  /** Human-readable reason when `videos` is empty because of a failure */
  error?: string;
}

interface SearchListResponse {
  items?: Array<{ id?: { channelId?: string } }>;
}

interface ChannelListResponse {
  items?: Array<{
    contentDetails?: { relatedPlaylists?: { uploads?: string } };
  }>;
}

interface PlaylistItemListResponse {
  items?: Array<{
    snippet?: { title?: string; resourceId?: { videoId?: string } };
  }>;
}

export class YouTubeClient {
  private client: KyInstance;
  private apiKey: string;
  private retryConfig: RetryConfig;

  constructor(options: YouTubeClientOptions) {
    const {
      apiKey,
      baseUrl = YOUTUBE_API_BASE,
      timeout = 30000,
      maxRetries = 3,
      retryDelay = 1000,
    } = options;

    const kyOptions: KyOptions = {
      prefixUrl: baseUrl,
      timeout,
      retry: 0, // We handle retries ourselves
      throwHttpErrors: false,
    };
    if (options.fetch) {
      kyOptions.fetch = options.fetch;
    }

    this.client = ky.create(kyOptions);
    this.apiKey = apiKey;
    this.retryConfig = {
      ...DEFAULT_RETRY_CONFIG,
      maxRetries,
      initialDelay: retryDelay,
    };
  }

  private async request<T>(path: string, params: Record<string, string | number>): Promise<T> {
    const searchParams: Record<string, string> = { key: this.apiKey };
    for (const [k, v] of Object.entries(params)) {
      searchParams[k] = String(v);
    }

    return withRetry(async () => {
      try {
        const response = await this.client(path, { searchParams });
        if (!response.ok) {
          let errorData: unknown;
          try {
            errorData = await response.json();
          } catch {
            // Body might not be JSON
          }
          handleErrorResponse(response, errorData);
        }
        return await response.json<T>();
      } catch (error) {
        if (error instanceof Error && error.name === 'TimeoutError') {
          throw new TimeoutError(`Request timeout: ${error.message}`);
        } else if (error instanceof TypeError && error.message.includes('fetch')) {
          throw new NetworkError(`Network error: ${error.message}`);
        }
        throw error;
      }
    }, this.retryConfig);
  }

  /** Resolves a free-text channel name to its channel id, or null. */
  async findChannelId(channelName: string): Promise<string | null> {
    const res = await this.request<SearchListResponse>('search', {
      q: channelName,
      type: 'channel',
      part: 'id,snippet',
      maxResults: 1,
    });
    return res.items?.[0]?.id?.channelId ?? null;
  }

  async getUploadsPlaylistId(channelId: string): Promise<string | null> {
    const res = await this.request<ChannelListResponse>('channels', {
      id: channelId,
      part: 'contentDetails',
    });
    return res.items?.[0]?.contentDetails?.relatedPlaylists?.uploads ?? null;
  }

  async listPlaylistVideos(playlistId: string, maxResults: number): Promise<VideoSummary[]> {
    const res = await this.request<PlaylistItemListResponse>('playlistItems', {
      playlistId,
      part: 'snippet',
      maxResults,
    });
    const videos: VideoSummary[] = [];
    for (const item of res.items ?? []) {
      const videoId = item.snippet?.resourceId?.videoId;
      if (!videoId) continue;
      videos.push({ videoId, title: item.snippet?.title ?? videoId });
    }
    return videos;
  }
}

/**
 * Latest uploads of the channel best matching `channelName`. Never throws:
 * failures come back as an empty list plus a message for the user.
 */
export async function findRecentVideos(
  apiKey: string,
  channelName: string,
  maxCount = DEFAULT_MAX_VIDEOS,
  opts: Omit<YouTubeClientOptions, 'apiKey'> = {}
): Promise<LookupResult> {
  const client = new YouTubeClient({ ...opts, apiKey });
  try {
    const channelId = await client.findChannelId(channelName);
    if (!channelId) {
      warn('youtube.channel.notFound', { channelName });
      return { videos: [], error: `Channel '${channelName}' not found` };
    }
    const uploads = await client.getUploadsPlaylistId(channelId);
    if (!uploads) {
      warn('youtube.uploads.missing', { channelName, channelId });
      return { videos: [], error: `Channel '${channelName}' has no uploads playlist` };
    }
    const videos = await client.listPlaylistVideos(uploads, maxCount);
    info('youtube.lookup', { channelName, channelId, count: videos.length });
    return { videos };
  } catch (e) {
    warn('youtube.lookup.fail', { channelName, error: errorMessage(e) });
    return { videos: [], error: `Error accessing YouTube API: ${errorMessage(e)}` };
  }
}
