import { z } from 'zod';
import { toCalendarDate } from '../../utils/dates.js';
import { fetchJson, HttpError } from '../../utils/http.js';
import { getLogger } from '../../utils/logger.js';
import { sleep } from '../../utils/retry.js';
import type { VideoRecord } from '../matching/types.js';
import { livestreamConfidence } from './livestream.js';
import { watchUrl, type ChannelRef } from './rss-feed.js';

const BASE_URL = 'https://www.googleapis.com/youtube/v3';
const MAX_RESULTS = 50;

export class YouTubeApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
  ) {
    super(message);
    this.name = 'YouTubeApiError';
  }
}

const ChannelListSchema = z.object({
  items: z
    .array(
      z.object({
        contentDetails: z.object({ relatedPlaylists: z.object({ uploads: z.string() }) }),
      }),
    )
    .default([]),
});

const PlaylistPageSchema = z.object({
  nextPageToken: z.string().optional(),
  items: z
    .array(z.object({ contentDetails: z.object({ videoId: z.string() }) }))
    .default([]),
});

export const VideoItemSchema = z.object({
  id: z.string(),
  snippet: z.object({
    title: z.string(),
    description: z.string().default(''),
    publishedAt: z.string().optional(),
    channelId: z.string().optional(),
    channelTitle: z.string().optional(),
  }),
  liveStreamingDetails: z
    .object({
      actualStartTime: z.string().optional(),
      scheduledStartTime: z.string().optional(),
    })
    .optional(),
});

export type VideoItem = z.infer<typeof VideoItemSchema>;

const VideoListSchema = z.object({ items: z.array(VideoItemSchema).default([]) });

/** Stream start beats scheduled start beats publish date. */
export function videoItemToRecord(item: VideoItem, channel: ChannelRef): VideoRecord {
  const live = item.liveStreamingDetails;
  const streamDate = toCalendarDate(live?.actualStartTime ?? live?.scheduledStartTime);
  const publishedDate = toCalendarDate(item.snippet.publishedAt);

  const video: VideoRecord = {
    videoId: item.id,
    title: item.snippet.title,
    url: watchUrl(item.id),
    date: streamDate ?? publishedDate,
    dateSource: streamDate ? 'stream' : publishedDate ? 'published' : 'none',
    channelId: item.snippet.channelId ?? channel.channelId,
    channelName: item.snippet.channelTitle ?? channel.channelName,
    livestreamConfidence: live ? 'high' : livestreamConfidence(item.snippet.title, item.snippet.description),
  };
  if (channel.committeeId) video.committeeId = channel.committeeId;
  return video;
}

export class YouTubeApi {
  private apiKey: string;
  private delayMs: number;
  private log = getLogger();

  constructor(apiKey: string, options: { delayMs?: number } = {}) {
    this.apiKey = apiKey;
    this.delayMs = options.delayMs ?? 100;
  }

  private async fetch(endpoint: string, params: Record<string, string>): Promise<unknown> {
    const query = new URLSearchParams({ ...params, key: this.apiKey });
    try {
      return await fetchJson(`${BASE_URL}${endpoint}?${query.toString()}`);
    } catch (err) {
      if (err instanceof HttpError) {
        throw new YouTubeApiError(`YouTube Data API ${err.status}: ${endpoint}`, err.status);
      }
      throw err;
    } finally {
      await sleep(this.delayMs);
    }
  }

  async getUploadsPlaylistId(channelId: string): Promise<string | null> {
    const data = ChannelListSchema.parse(
      await this.fetch('/channels', { part: 'contentDetails', id: channelId }),
    );
    return data.items[0]?.contentDetails.relatedPlaylists.uploads ?? null;
  }

  async listUploadIds(playlistId: string, maxVideos: number): Promise<string[]> {
    const ids: string[] = [];
    let pageToken: string | undefined;

    do {
      const params: Record<string, string> = {
        part: 'contentDetails',
        playlistId,
        maxResults: String(MAX_RESULTS),
      };
      if (pageToken) params.pageToken = pageToken;

      const page = PlaylistPageSchema.parse(await this.fetch('/playlistItems', params));
      ids.push(...page.items.map(i => i.contentDetails.videoId));
      pageToken = page.nextPageToken;
    } while (pageToken && ids.length < maxVideos);

    return ids.slice(0, maxVideos);
  }

  async getVideos(ids: string[]): Promise<VideoItem[]> {
    const items: VideoItem[] = [];
    for (let i = 0; i < ids.length; i += MAX_RESULTS) {
      const batch = ids.slice(i, i + MAX_RESULTS);
      const data = VideoListSchema.parse(
        await this.fetch('/videos', { part: 'snippet,liveStreamingDetails', id: batch.join(',') }),
      );
      items.push(...data.items);
    }
    return items;
  }

  /** Uploads of one channel, newest first, with stream start dates where YouTube has them. */
  async fetchChannelVideos(channel: ChannelRef, maxVideos = 500): Promise<VideoRecord[]> {
    const playlistId = await this.getUploadsPlaylistId(channel.channelId);
    if (!playlistId) {
      this.log.warn({ channel: channel.channelName }, 'Channel has no uploads playlist');
      return [];
    }

    const ids = await this.listUploadIds(playlistId, maxVideos);
    const items = await this.getVideos(ids);
    this.log.debug({ channel: channel.channelName, videos: items.length }, 'Channel uploads fetched');
    return items.map(item => videoItemToRecord(item, channel));
  }
}
