import { describe, expect, it } from 'vitest';
import { buildDateIndex, selectCandidates } from './candidates.js';
import type { CongressEvent, VideoRecord } from './types.js';

function event(eventId: string, date: string | null): CongressEvent {
  return {
    eventId,
    congress: 118,
    chamber: 'House',
    title: `Meeting ${eventId}`,
    date,
    eventType: 'Hearing',
    status: 'Scheduled',
    committeeName: '',
    committeeCode: '',
    committees: [],
  };
}

function video(date: string | null): VideoRecord {
  return { videoId: 'v1', title: 'Hearing', url: '', date, dateSource: date ? 'stream' : 'none' };
}

const events = [
  event('before-4', '2024-06-08'),
  event('before-3', '2024-06-09'),
  event('same-day', '2024-06-12'),
  event('after-1', '2024-06-13'),
  event('after-2', '2024-06-14'),
  event('undated', null),
];

describe('selectCandidates', () => {
  const index = buildDateIndex(events);

  it('returns events from three days before to one day after, same day first', () => {
    const { candidates, fallback } = selectCandidates(video('2024-06-12'), index);
    expect(fallback).toBe(false);
    expect(candidates.map(e => e.eventId)).toEqual(['same-day', 'before-3', 'after-1']);
  });

  it('falls back to every event when the window is empty', () => {
    const { candidates, fallback } = selectCandidates(video('2025-01-01'), index);
    expect(fallback).toBe(true);
    expect(candidates).toHaveLength(events.length);
  });

  it('falls back to every event for an undated video', () => {
    const { candidates, fallback } = selectCandidates(video(null), index);
    expect(fallback).toBe(true);
    expect(candidates.map(e => e.eventId)).toContain('undated');
  });

  it('honours a custom window', () => {
    const { candidates } = selectCandidates(video('2024-06-12'), index, { daysBefore: 4, daysAfter: 2 });
    expect(candidates.map(e => e.eventId)).toEqual(['same-day', 'before-4', 'before-3', 'after-1', 'after-2']);
  });

  it('leaves undated events out of the date index', () => {
    expect([...index.byDate.values()].flat().map(e => e.eventId)).not.toContain('undated');
  });
});
