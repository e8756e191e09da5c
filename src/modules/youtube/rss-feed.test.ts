import { describe, expect, it } from 'vitest';
import { feedItemToVideo, type ParsedFeedItem } from './rss-feed.js';

const channel = { channelId: 'UC-test', channelName: 'Test Committee', committeeId: 'test-committee' };

describe('feedItemToVideo', () => {
  it('maps an Atom entry to a published-date video', () => {
    const item: ParsedFeedItem = {
      title: 'Full Committee Markup of H.R. 1234',
      link: 'https://www.youtube.com/watch?v=abc123',
      isoDate: '2024-03-05T18:30:00.000Z',
      'yt:videoId': 'abc123',
      'media:group': { 'media:description': ['Markup of pending bills'] },
    };

    expect(feedItemToVideo(item, channel)).toEqual({
      videoId: 'abc123',
      title: 'Full Committee Markup of H.R. 1234',
      url: 'https://www.youtube.com/watch?v=abc123',
      date: '2024-03-05',
      dateSource: 'published',
      channelId: 'UC-test',
      channelName: 'Test Committee',
      committeeId: 'test-committee',
      livestreamConfidence: 'medium',
    });
  });

  it('falls back to the Atom id and the watch URL', () => {
    const video = feedItemToVideo({ id: 'yt:video:xyz789', title: 'Remarks' }, channel);
    expect(video).toMatchObject({ videoId: 'xyz789', url: 'https://www.youtube.com/watch?v=xyz789', date: null, dateSource: 'none' });
  });

  it('drops entries without any id', () => {
    expect(feedItemToVideo({ title: 'Orphan' }, channel)).toBeNull();
  });
});
