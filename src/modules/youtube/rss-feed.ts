import Parser from 'rss-parser';
import { toCalendarDate } from '../../utils/dates.js';
import { getLogger } from '../../utils/logger.js';
import type { VideoRecord } from '../matching/types.js';
import { livestreamConfidence } from './livestream.js';

const FEED_URL = 'https://www.youtube.com/feeds/videos.xml?channel_id=';

type FeedItem = {
  id?: string;
  'yt:videoId'?: string;
  'yt:channelId'?: string;
  'media:group'?: { 'media:description'?: string[] };
};

const parser: Parser<Record<string, unknown>, FeedItem> = new Parser({
  customFields: {
    item: ['yt:videoId', 'yt:channelId', 'media:group'],
  },
});

export interface ChannelRef {
  channelId: string;
  channelName: string;
  committeeId?: string;
}

export type ParsedFeedItem = Parser.Item & FeedItem;

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

function videoIdOf(item: ParsedFeedItem): string | null {
  if (item['yt:videoId']) return item['yt:videoId'];
  // Atom ids look like "yt:video:VIDEOID"
  const fromId = item.id?.split(':').pop();
  if (fromId) return fromId;
  return /[?&]v=([^&#]+)/.exec(item.link ?? '')?.[1] ?? null;
}

/** Map one feed entry to a video record; entries without an ID are dropped. */
export function feedItemToVideo(item: ParsedFeedItem, channel: ChannelRef): VideoRecord | null {
  const videoId = videoIdOf(item);
  if (!videoId) return null;

  const title = item.title?.trim() ?? '';
  const description = item['media:group']?.['media:description']?.[0] ?? '';
  const date = toCalendarDate(item.isoDate ?? item.pubDate);

  const video: VideoRecord = {
    videoId,
    title,
    url: item.link || watchUrl(videoId),
    date,
    dateSource: date ? 'published' : 'none',
    channelId: channel.channelId,
    channelName: channel.channelName,
    livestreamConfidence: livestreamConfidence(title, description),
  };
  if (channel.committeeId) video.committeeId = channel.committeeId;
  return video;
}

/**
 * Fetch the channel's Atom feed (the 15 most recent uploads).
 * A failing feed logs and yields no videos.
 */
export async function fetchChannelFeed(channel: ChannelRef): Promise<VideoRecord[]> {
  const log = getLogger();
  try {
    const feed = await parser.parseURL(`${FEED_URL}${channel.channelId}`);
    const videos: VideoRecord[] = [];
    for (const item of feed.items) {
      const video = feedItemToVideo(item, channel);
      if (video) videos.push(video);
    }
    log.debug({ channel: channel.channelName, videos: videos.length }, 'Feed fetched');
    return videos;
  } catch (err) {
    log.warn({ channel: channel.channelName, err: err instanceof Error ? err.message : String(err) }, 'Feed fetch failed');
    return [];
  }
}
