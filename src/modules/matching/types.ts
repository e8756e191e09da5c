import { z } from 'zod';

// ============================================================================
// Canonical records
// ============================================================================

const CalendarDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

export const LivestreamConfidenceSchema = z.enum(['high', 'medium', 'low']);
export type LivestreamConfidence = z.infer<typeof LivestreamConfidenceSchema>;

/**
 * One committee video, whatever source it came from.
 * `dateSource` records how `date` was obtained so reports can flag approximate dates.
 */
export const VideoRecordSchema = z.object({
  videoId: z.string().min(1),
  title: z.string(),
  url: z.string(),
  date: CalendarDateSchema.nullable(),
  dateSource: z.enum(['stream', 'published', 'relative', 'none']),
  channelId: z.string().optional(),
  channelName: z.string().optional(),
  committeeId: z.string().optional(),
  livestreamConfidence: LivestreamConfidenceSchema.optional(),
});

export type VideoRecord = z.infer<typeof VideoRecordSchema>;
export type DateSource = VideoRecord['dateSource'];

export const CommitteeRefSchema = z.object({
  name: z.string(),
  systemCode: z.string(),
});

export type CommitteeRef = z.infer<typeof CommitteeRefSchema>;

/** A Congress.gov committee meeting. `eventType` and `status` are free text in the source data. */
export const CongressEventSchema = z.object({
  eventId: z.string().min(1),
  congress: z.number().int(),
  chamber: z.string(),
  title: z.string(),
  date: CalendarDateSchema.nullable(),
  eventType: z.string(),
  status: z.string(),
  committeeName: z.string(),
  committeeCode: z.string(),
  committees: z.array(CommitteeRefSchema),
});

export type CongressEvent = z.infer<typeof CongressEventSchema>;

// ============================================================================
// Match output
// ============================================================================

export const MatchMethodSchema = z.enum(['algorithmic', 'adjudicated']);
export type MatchMethod = z.infer<typeof MatchMethodSchema>;

export const MatchResultSchema = z.object({
  kind: z.literal('matched'),
  video: VideoRecordSchema,
  event: CongressEventSchema,
  score: z.number(),
  reasons: z.array(z.string()),
  titleSimilarity: z.number(),
  method: MatchMethodSchema,
  adjudication: z
    .object({
      confidence: LivestreamConfidenceSchema,
      reasoning: z.string(),
    })
    .optional(),
});

export type MatchResult = z.infer<typeof MatchResultSchema>;

export const UnmatchedDispositionSchema = z.enum([
  'low-confidence',
  'adjudication-declined',
  'adjudication-unavailable',
  'no-referral-candidates',
  'no-events',
]);

export type UnmatchedDisposition = z.infer<typeof UnmatchedDispositionSchema>;

export const UnmatchedResultSchema = z.object({
  kind: z.literal('unmatched'),
  video: VideoRecordSchema,
  bestScore: z.number().nullable(),
  bestMatchTitle: z.string().nullable(),
  bestMatchEventId: z.string().nullable(),
  reasons: z.array(z.string()),
  disposition: UnmatchedDispositionSchema,
});

export type UnmatchedResult = z.infer<typeof UnmatchedResultSchema>;

export type MatchOutcome = MatchResult | UnmatchedResult;

export const MatchReportSchema = z.object({
  metadata: z.object({
    totalVideos: z.number().int(),
    totalEvents: z.number().int(),
    matched: z.number().int(),
    unmatched: z.number().int(),
    matchRate: z.string(),
    algorithmicMatches: z.number().int(),
    adjudicatedMatches: z.number().int(),
    thresholds: z.object({ high: z.number(), low: z.number() }),
    generatedAt: z.string(),
  }),
  matches: z.array(MatchResultSchema),
  unmatched: z.array(UnmatchedResultSchema),
});

export type MatchReport = z.infer<typeof MatchReportSchema>;
