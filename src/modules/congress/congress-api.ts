import { z } from 'zod';
import { fetchJson, HttpError } from '../../utils/http.js';
import { getLogger } from '../../utils/logger.js';
import { sleep } from '../../utils/retry.js';

const BASE_URL = 'https://api.congress.gov/v3';
export const PAGE_LIMIT = 250;

export class CongressApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
  ) {
    super(message);
    this.name = 'CongressApiError';
  }
}

// Event IDs come back as strings in listings and occasionally as numbers in details
const EventIdSchema = z.union([z.string(), z.number()]).transform(String);

const MeetingSummarySchema = z.object({
  eventId: EventIdSchema,
  chamber: z.string().optional(),
  congress: z.number().optional(),
  url: z.string().optional(),
  updateDate: z.string().optional(),
});

export type MeetingSummary = z.infer<typeof MeetingSummarySchema>;

const MeetingListSchema = z.object({
  committeeMeetings: z.array(MeetingSummarySchema).default([]),
  pagination: z.object({ count: z.number().optional(), next: z.string().optional() }).optional(),
});

export const MeetingDetailSchema = z.object({
  eventId: EventIdSchema,
  congress: z.number().optional(),
  chamber: z.string().optional(),
  date: z.string().nullish(),
  title: z.string().nullish(),
  type: z.string().nullish(),
  meetingStatus: z.string().nullish(),
  committees: z
    .array(
      z.object({
        name: z.string().nullish(),
        systemCode: z.string().nullish(),
        chamber: z.string().nullish(),
      }),
    )
    .default([]),
});

export type MeetingDetail = z.infer<typeof MeetingDetailSchema>;

const MeetingDetailResponseSchema = z.object({ committeeMeeting: MeetingDetailSchema });

export interface MeetingPage {
  meetings: MeetingSummary[];
  hasMore: boolean;
}

export interface CongressApiOptions {
  /** Pause after every request */
  delayMs?: number;
  timeoutMs?: number;
  maxAttempts?: number;
}

export class CongressApi {
  private apiKey: string;
  private delayMs: number;
  private timeoutMs: number | undefined;
  private maxAttempts: number | undefined;
  private log = getLogger();

  constructor(apiKey: string, options: CongressApiOptions = {}) {
    this.apiKey = apiKey;
    this.delayMs = options.delayMs ?? 350;
    this.timeoutMs = options.timeoutMs;
    this.maxAttempts = options.maxAttempts;
  }

  private async fetch(endpoint: string, params: Record<string, string | number> = {}): Promise<unknown> {
    const query = new URLSearchParams({ format: 'json', ...Object.fromEntries(Object.entries(params).map(([k, v]) => [k, String(v)])) });
    query.set('api_key', this.apiKey);
    const url = `${BASE_URL}${endpoint}?${query.toString()}`;

    try {
      return await fetchJson(url, { nullOn: [404], timeoutMs: this.timeoutMs, maxAttempts: this.maxAttempts });
    } catch (err) {
      if (err instanceof HttpError) {
        throw new CongressApiError(`Congress.gov API ${err.status}: ${endpoint}`, err.status);
      }
      throw err;
    } finally {
      await sleep(this.delayMs);
    }
  }

  /** One page of committee meetings for a congress and chamber. */
  async listMeetings(congress: number, chamber: string, offset: number): Promise<MeetingPage> {
    const endpoint = `/committee-meeting/${congress}/${chamber.toLowerCase()}`;
    this.log.debug({ congress, chamber, offset }, 'Listing committee meetings');

    const data = await this.fetch(endpoint, { limit: PAGE_LIMIT, offset });
    if (data === null) return { meetings: [], hasMore: false };

    const parsed = MeetingListSchema.safeParse(data);
    if (!parsed.success) {
      throw new CongressApiError(`Unexpected meeting list shape: ${parsed.error.message}`, 200);
    }

    const meetings = parsed.data.committeeMeetings;
    const hasMore = parsed.data.pagination ? Boolean(parsed.data.pagination.next) : meetings.length === PAGE_LIMIT;
    return { meetings, hasMore };
  }

  /** Meeting detail, or null when Congress.gov has no record of it. */
  async getMeeting(congress: number, chamber: string, eventId: string): Promise<MeetingDetail | null> {
    const endpoint = `/committee-meeting/${congress}/${chamber.toLowerCase()}/${eventId}`;
    const data = await this.fetch(endpoint);
    if (data === null) return null;

    const parsed = MeetingDetailResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new CongressApiError(`Unexpected meeting detail shape for ${eventId}: ${parsed.error.message}`, 200);
    }
    return parsed.data.committeeMeeting;
  }
}
