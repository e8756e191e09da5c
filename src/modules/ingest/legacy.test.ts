import { describe, expect, it } from 'vitest';
import { adaptAll, adaptCongressEvent, adaptVideoRecord } from './legacy.js';

const now = new Date(2024, 5, 15, 12, 0, 0);

describe('adaptVideoRecord', () => {
  it('reads the scraper field names', () => {
    expect(
      adaptVideoRecord(
        {
          video_id: 'abc123',
          title: ' Full Committee Markup ',
          exact_date: '2024-03-05',
          approximate_date: '2024-03-01',
          channel_name: 'Energy and Commerce',
          livestream_confidence: 'high',
        },
        now,
      ),
    ).toEqual({
      videoId: 'abc123',
      title: 'Full Committee Markup',
      url: 'https://www.youtube.com/watch?v=abc123',
      date: '2024-03-05',
      dateSource: 'published',
      channelName: 'Energy and Commerce',
      livestreamConfidence: 'high',
    });
  });

  it('prefers the stream start from API-shaped records', () => {
    const video = adaptVideoRecord(
      {
        id: 'xyz',
        title: 'Hearing',
        publishedAt: '2024-03-07T10:00:00Z',
        liveStreamingDetails: { actualStartTime: '2024-03-05T14:00:00Z' },
      },
      now,
    );
    expect(video).toMatchObject({ date: '2024-03-05', dateSource: 'stream' });
  });

  it('derives an approximate date from relative text', () => {
    const video = adaptVideoRecord({ video_id: 'r1', title: 'Hearing', date_info: 'Streamed 3 days ago' }, now);
    expect(video).toMatchObject({ date: '2024-06-12', dateSource: 'relative' });
  });

  it('keeps undated videos and drops records without an id', () => {
    expect(adaptVideoRecord({ video_id: 'u1', title: 'Hearing' }, now)).toMatchObject({ date: null, dateSource: 'none' });
    expect(adaptVideoRecord({ title: 'No id' }, now)).toBeNull();
    expect(adaptVideoRecord('not an object', now)).toBeNull();
  });
});

describe('adaptCongressEvent', () => {
  it('reads the meeting dump shape', () => {
    expect(
      adaptCongressEvent({
        eventId: 115538,
        congress: '118',
        date: '2024-03-05T14:00:00Z',
        title: 'Markup',
        type: 'Markup',
        meetingStatus: 'Scheduled',
        location: { room: '2123' },
        committees: [{ name: 'Energy and Commerce Committee', systemCode: 'hsif00', chamber: 'House' }],
      }),
    ).toEqual({
      eventId: '115538',
      congress: 118,
      chamber: '',
      title: 'Markup',
      date: '2024-03-05',
      eventType: 'Markup',
      status: 'Scheduled',
      committeeName: 'Energy and Commerce Committee',
      committeeCode: 'hsif00',
      committees: [{ name: 'Energy and Commerce Committee', systemCode: 'hsif00' }],
    });
  });

  it('builds a committee list from flat fields', () => {
    const event = adaptCongressEvent({ event_id: 'e1', committee_name: 'Health Subcommittee', committee_code: 'hsif14' });
    expect(event?.committees).toEqual([{ name: 'Health Subcommittee', systemCode: 'hsif14' }]);
  });

  it('drops records without an event id', () => {
    expect(adaptCongressEvent({ title: 'Orphan' })).toBeNull();
  });
});

describe('adaptAll', () => {
  it('unwraps wrapper objects and counts skipped records', () => {
    const result = adaptAll(
      { metadata: { total: 3 }, meetings: [{ eventId: 'a' }, { title: 'no id' }, { eventId: 'b' }] },
      adaptCongressEvent,
    );
    expect(result.records.map(e => e.eventId)).toEqual(['a', 'b']);
    expect(result.skipped).toBe(1);
  });

  it('treats an unrecognised document as empty', () => {
    expect(adaptAll({ something: 'else' }, adaptCongressEvent)).toEqual({ records: [], skipped: 0 });
  });
});
