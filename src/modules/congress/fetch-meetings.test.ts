import { describe, expect, it, vi } from 'vitest';
import type { CongressEvent } from '../matching/types.js';
import type { ProgressStore } from '../state/models/progress.js';
import type { MeetingDetail, MeetingPage } from './congress-api.js';
import { checkpointKey, fetchAllMeetings, type MeetingCheckpoint } from './fetch-meetings.js';

function memoryProgress(initial?: MeetingCheckpoint) {
  const states = new Map<string, MeetingCheckpoint>();
  if (initial) states.set(checkpointKey('house'), structuredClone(initial));
  const store: ProgressStore<MeetingCheckpoint> = {
    load: key => {
      const state = states.get(key);
      return state ? structuredClone(state) : null;
    },
    save: (key, state) => {
      states.set(key, structuredClone(state));
    },
    clear: key => {
      states.delete(key);
    },
  };
  return { store, states };
}

function memoryEvents(known: string[] = []) {
  const stored = new Map<string, CongressEvent>();
  const knownIds = new Set(known);
  return {
    stored,
    has: (id: string) => knownIds.has(id) || stored.has(id),
    upsert: (events: CongressEvent[]) => {
      for (const e of events) stored.set(e.eventId, e);
      return events.length;
    },
  };
}

function detail(eventId: string): MeetingDetail {
  return {
    eventId,
    date: '2024-03-05',
    title: `Meeting ${eventId}`,
    type: 'Hearing',
    meetingStatus: 'Scheduled',
    committees: [{ name: 'Judiciary Committee', systemCode: 'hsju00', chamber: 'House' }],
  };
}

function page(ids: string[], hasMore: boolean): MeetingPage {
  return { meetings: ids.map(eventId => ({ eventId })), hasMore };
}

describe('fetchAllMeetings', () => {
  it('pages through every congress, skips known events and clears the checkpoint', async () => {
    const listMeetings = vi.fn<(congress: number, chamber: string, offset: number) => Promise<MeetingPage>>()
      .mockResolvedValueOnce(page(['a', 'b'], true))
      .mockResolvedValueOnce(page(['c'], false))
      .mockResolvedValueOnce(page(['d'], false));
    const getMeeting = vi.fn(async (_congress: number, _chamber: string, id: string) => detail(id));
    const progress = memoryProgress();
    const events = memoryEvents(['b']);

    const result = await fetchAllMeetings({
      congresses: [117, 118],
      chamber: 'house',
      api: { listMeetings, getMeeting },
      events,
      progress: progress.store,
    });

    expect(result).toEqual({ stored: 3, skipped: 1, failed: 0, pages: 3, incomplete: [] });
    expect(listMeetings.mock.calls).toEqual([[117, 'house', 0], [117, 'house', 2], [118, 'house', 0]]);
    expect([...events.stored.keys()]).toEqual(['a', 'c', 'd']);
    expect(events.stored.get('a')).toMatchObject({ congress: 117, committeeCode: 'hsju00' });
    expect(progress.states.size).toBe(0);
  });

  it('resumes from the saved checkpoint', async () => {
    const listMeetings = vi.fn<(congress: number, chamber: string, offset: number) => Promise<MeetingPage>>()
      .mockResolvedValue(page(['x'], false));
    const progress = memoryProgress({ completed: [117], current: { congress: 118, offset: 500 } });

    await fetchAllMeetings({
      congresses: [117, 118],
      chamber: 'house',
      api: { listMeetings, getMeeting: async (_c, _ch, id) => detail(id) },
      events: memoryEvents(),
      progress: progress.store,
    });

    expect(listMeetings.mock.calls).toEqual([[118, 'house', 500]]);
  });

  it('counts failed details and keeps going', async () => {
    const getMeeting = vi.fn(async (_c: number, _ch: string, id: string) => {
      if (id === 'bad') throw new Error('Congress.gov API 500');
      if (id === 'gone') return null;
      return detail(id);
    });

    const result = await fetchAllMeetings({
      congresses: [118],
      chamber: 'house',
      api: { listMeetings: async () => page(['ok', 'bad', 'gone'], false), getMeeting },
      events: memoryEvents(),
      progress: memoryProgress().store,
    });

    expect(result).toMatchObject({ stored: 1, failed: 2 });
  });

  it('ends a congress early on a page error and keeps its checkpoint', async () => {
    const listMeetings = vi.fn<(congress: number, chamber: string, offset: number) => Promise<MeetingPage>>()
      .mockResolvedValueOnce(page(['a'], true))
      .mockRejectedValueOnce(new Error('Congress.gov API 503'))
      .mockResolvedValueOnce(page(['z'], false));
    const progress = memoryProgress();

    const result = await fetchAllMeetings({
      congresses: [117, 118],
      chamber: 'house',
      api: { listMeetings, getMeeting: async (_c, _ch, id) => detail(id) },
      events: memoryEvents(),
      progress: progress.store,
    });

    expect(result).toMatchObject({ stored: 2, incomplete: [117] });
    expect(progress.states.get(checkpointKey('house'))).toEqual({ completed: [118], current: null });
  });

  it('stops when the page budget is spent', async () => {
    const listMeetings = vi.fn<(congress: number, chamber: string, offset: number) => Promise<MeetingPage>>()
      .mockResolvedValue(page(['a'], true));
    const progress = memoryProgress();

    const result = await fetchAllMeetings({
      congresses: [118],
      chamber: 'house',
      api: { listMeetings, getMeeting: async (_c, _ch, id) => detail(id) },
      events: memoryEvents(),
      progress: progress.store,
      maxPages: 2,
    });

    expect(result.pages).toBe(2);
    expect(progress.states.get(checkpointKey('house'))).toEqual({ completed: [], current: { congress: 118, offset: 2 } });
  });
});
