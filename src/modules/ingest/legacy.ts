import { z } from 'zod';
import { toCalendarDate } from '../../utils/dates.js';
import {
  LivestreamConfidenceSchema,
  type CommitteeRef,
  type CongressEvent,
  type DateSource,
  type VideoRecord,
} from '../matching/types.js';
import { parseRelativeDate } from '../youtube/relative-date.js';
import { watchUrl } from '../youtube/rss-feed.js';

// Earlier scraper outputs used several names for the same field
const Id = z.union([z.string().min(1), z.number()]).transform(String);
const OptionalText = z.string().nullish();

const LegacyVideoSchema = z.object({
  video_id: Id.optional(),
  id: Id.optional(),
  title: OptionalText,
  url: OptionalText,
  exact_date: OptionalText,
  actual_date: OptionalText,
  approximate_date: OptionalText,
  publishedAt: OptionalText,
  date_info: OptionalText,
  liveStreamingDetails: z
    .object({ actualStartTime: OptionalText, scheduledStartTime: OptionalText })
    .nullish(),
  channelId: OptionalText,
  channel_id: OptionalText,
  channelName: OptionalText,
  channel_name: OptionalText,
  committeeId: OptionalText,
  committee_id: OptionalText,
  livestream_confidence: LivestreamConfidenceSchema.nullish(),
});

const LegacyEventSchema = z.object({
  eventId: Id.optional(),
  event_id: Id.optional(),
  congress: z.union([z.number(), z.string().regex(/^\d+$/).transform(Number)]).nullish(),
  chamber: OptionalText,
  title: OptionalText,
  date: OptionalText,
  type: OptionalText,
  eventType: OptionalText,
  meetingStatus: OptionalText,
  status: OptionalText,
  committeeName: OptionalText,
  committee_name: OptionalText,
  committeeCode: OptionalText,
  committee_code: OptionalText,
  committees: z
    .array(z.object({ name: OptionalText, systemCode: OptionalText }))
    .nullish(),
});

function pickDate(raw: z.infer<typeof LegacyVideoSchema>, now: Date): { date: string | null; dateSource: DateSource } {
  const candidates: Array<[string | null, DateSource]> = [
    [toCalendarDate(raw.liveStreamingDetails?.actualStartTime), 'stream'],
    [toCalendarDate(raw.liveStreamingDetails?.scheduledStartTime), 'stream'],
    [toCalendarDate(raw.exact_date), 'published'],
    [toCalendarDate(raw.actual_date), 'published'],
    [toCalendarDate(raw.publishedAt), 'published'],
    [toCalendarDate(raw.approximate_date), 'relative'],
    [parseRelativeDate(raw.date_info, now), 'relative'],
  ];
  for (const [date, dateSource] of candidates) {
    if (date) return { date, dateSource };
  }
  return { date: null, dateSource: 'none' };
}

/** Legacy scraper video → canonical record, or null when it has no usable ID. */
export function adaptVideoRecord(raw: unknown, now: Date = new Date()): VideoRecord | null {
  const parsed = LegacyVideoSchema.safeParse(raw);
  if (!parsed.success) return null;
  const v = parsed.data;

  const videoId = v.video_id ?? v.id;
  if (!videoId) return null;

  const video: VideoRecord = {
    videoId,
    title: v.title?.trim() ?? '',
    url: v.url || watchUrl(videoId),
    ...pickDate(v, now),
  };

  const channelId = v.channelId ?? v.channel_id;
  const channelName = v.channelName ?? v.channel_name;
  const committeeId = v.committeeId ?? v.committee_id;
  if (channelId) video.channelId = channelId;
  if (channelName) video.channelName = channelName;
  if (committeeId) video.committeeId = committeeId;
  if (v.livestream_confidence) video.livestreamConfidence = v.livestream_confidence;
  return video;
}

/** Legacy meeting dump entry → canonical event, or null when it has no event ID. */
export function adaptCongressEvent(raw: unknown): CongressEvent | null {
  const parsed = LegacyEventSchema.safeParse(raw);
  if (!parsed.success) return null;
  const e = parsed.data;

  const eventId = e.eventId ?? e.event_id;
  if (!eventId) return null;

  let committees: CommitteeRef[] = (e.committees ?? [])
    .filter(c => c.name || c.systemCode)
    .map(c => ({ name: c.name ?? '', systemCode: c.systemCode ?? '' }));

  const flatName = e.committeeName ?? e.committee_name ?? '';
  const flatCode = e.committeeCode ?? e.committee_code ?? '';
  if (committees.length === 0 && (flatName || flatCode)) {
    committees = [{ name: flatName, systemCode: flatCode }];
  }
  const primary = committees[0];

  return {
    eventId,
    congress: e.congress ?? 0,
    chamber: e.chamber ?? '',
    title: e.title?.trim() ?? '',
    date: toCalendarDate(e.date),
    eventType: e.type ?? e.eventType ?? '',
    status: e.meetingStatus ?? e.status ?? '',
    committeeName: primary?.name ?? '',
    committeeCode: primary?.systemCode ?? '',
    committees,
  };
}

export interface AdaptResult<T> {
  records: T[];
  skipped: number;
}

/**
 * Apply an adapter to a list of raw records. Accepts a bare array or the
 * wrapper objects earlier runs wrote (`{ videos: [...] }`, `{ meetings: [...] }`).
 */
export function adaptAll<T>(raw: unknown, adapt: (item: unknown) => T | null): AdaptResult<T> {
  const items = unwrapList(raw);
  const records: T[] = [];
  let skipped = 0;
  for (const item of items) {
    const record = adapt(item);
    if (record) records.push(record);
    else skipped++;
  }
  return { records, skipped };
}

const WRAPPER_KEYS = ['videos', 'meetings', 'events', 'committeeMeetings', 'items'];

function unwrapList(raw: unknown): unknown[] {
  if (Array.isArray(raw)) return raw;
  if (typeof raw === 'object' && raw !== null) {
    for (const key of WRAPPER_KEYS) {
      const value: unknown = Reflect.get(raw, key);
      if (Array.isArray(value)) return value;
    }
  }
  return [];
}
